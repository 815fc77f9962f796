// hostpace — adaptive concurrency and per-host request pacing

// Factory
export { createThrottleContext } from "./createContext.js";

// Context class
export { ThrottleContext } from "./context.js";
export type { RequestWait } from "./context.js";

// Building blocks
export { AdaptiveWorkerPool, PoolShutdownError } from "./pools/worker.js";
export type { ShutdownOptions } from "./pools/worker.js";
export { SlidingWindowLimiter, DEFAULT_SCOPE } from "./pools/rate.js";
export type { SlidingWindowConfig } from "./pools/rate.js";
export { ResourceSampler, createOsProbe } from "./sampler.js";
export type { SamplerTarget } from "./sampler.js";
export { TaskScheduler } from "./scheduler.js";
export type { ScheduleOptions } from "./scheduler.js";
export { AdaptiveRateController } from "./adaptive.js";
export { DelayInjector } from "./delay.js";

// Helpers
export { decideResize, optimalThreadCount } from "./sizing.js";
export { retryWithBackoff, backoffDelay } from "./retry.js";
export type { BackoffOptions } from "./retry.js";
export { MemorySettingsStore, THREAD_COUNT_KEY } from "./settings.js";
export type { SettingsStore } from "./settings.js";

// Observability
export { formatEvent, formatSnapshot, createLogHandler } from "./format.js";
export type { LogSink } from "./format.js";
export { createStatsCollector } from "./stats.js";
export type { StatsCollector, StatsSnapshot } from "./stats.js";

// Presets
export { presets } from "./presets.js";

// Testing utilities
export { createTestClock } from "./utils/time.js";
export type { Clock } from "./utils/time.js";

// Types
export type {
  ThrottleConfig,
  WorkerPoolConfig,
  SamplerConfig,
  RateControlConfig,
  DelayConfig,
  ResourceSnapshot,
  ResourceProbe,
  WorkerPoolState,
  ResizeDecision,
  ResizeDirection,
  TaskHandle,
  Work,
  ThrottleSnapshot,
  ThrottleEvent,
  ThrottleEventType,
  ThrottleEventHandler,
} from "./types.js";
