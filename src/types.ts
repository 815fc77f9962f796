// ---------------------------------------------------------------------------
// Public configuration
// ---------------------------------------------------------------------------

export interface WorkerPoolConfig {
  /** Lower bound on concurrent workers (default 2). */
  minWorkers?: number;
  /** Upper bound on concurrent workers (default 20). */
  maxWorkers?: number;
  /** Starting worker count, clamped to the bounds (default minWorkers). */
  initialWorkers?: number;
  /** CPU percent above which the pool shrinks (default 80). */
  cpuThreshold?: number;
  /** Memory percent above which the pool shrinks (default 80). */
  memoryThreshold?: number;
}

export interface SamplerConfig {
  /** CPU observation window per cycle in ms (default 1 000). */
  sampleWindowMs?: number;
  /** Pause between cycles in ms (default 2 000). */
  intervalMs?: number;
  /** Source of CPU/memory readings (default: node:os probe). */
  probe?: ResourceProbe;
}

export interface RateControlConfig {
  /** Starting per-host request rate (default 10). */
  initialRate?: number;
  /** Floor for the adaptive rate (default 1). */
  minRate?: number;
  /** Ceiling for the adaptive rate (default 50). */
  maxRate?: number;
  /** Rollover period for the success/failure counters in ms (default 10 000). */
  windowSizeMs?: number;
  /** Sliding window of each per-host limiter in ms (default 1 000). */
  limiterWindowMs?: number;
}

export interface DelayConfig {
  /** Pause before each request in ms (default 100). */
  baseDelayMs?: number;
  /** Symmetric random jitter in ms (default 50). */
  jitterMs?: number;
  /** Uniform [0, 1) source (default Math.random). */
  random?: () => number;
}

export interface ThrottleConfig {
  pool?: WorkerPoolConfig;
  /**
   * Background resource sampling. Set to `false` to disable (the pool then
   * keeps its initial size unless `adjust()` is called by hand).
   */
  sampler?: boolean | SamplerConfig;
  rate?: RateControlConfig;
  delay?: DelayConfig;
  /** Optional event handler. Receives structured events. No logging by default. */
  onEvent?: ThrottleEventHandler;
}

// ---------------------------------------------------------------------------
// Resources
// ---------------------------------------------------------------------------

/** One reading of host load and pool depth. Frozen once created. */
export interface ResourceSnapshot {
  readonly cpuPercent: number;
  readonly memoryPercent: number;
  readonly activeWorkers: number;
  readonly pendingQueueDepth: number;
  readonly timestamp: number;
}

export interface ResourceProbe {
  /** CPU utilisation (0–100) observed over `windowMs`; 0 means since boot. */
  cpuPercent(windowMs: number, signal?: AbortSignal): Promise<number>;
  /** Memory utilisation (0–100). */
  memoryPercent(): number;
}

// ---------------------------------------------------------------------------
// Pool state
// ---------------------------------------------------------------------------

export interface WorkerPoolState {
  minWorkers: number;
  maxWorkers: number;
  currentWorkers: number;
  cpuThreshold: number;
  memoryThreshold: number;
}

export type ResizeDirection = "grow" | "shrink" | "hold";

export interface ResizeDecision {
  direction: ResizeDirection;
  workers: number;
}

export interface TaskHandle<T> {
  id: string;
  /** Pool generation the task was submitted under. */
  generation: number;
  result: Promise<T>;
}

export type Work<T> = () => T | Promise<T>;

// ---------------------------------------------------------------------------
// Snapshot (read-only state view)
// ---------------------------------------------------------------------------

export interface ThrottleSnapshot {
  timestamp: number;
  pool: WorkerPoolState & {
    active: number;
    pending: number;
    generation: number;
  };
  /** Most recent resource reading, if the sampler produced one. */
  resources: ResourceSnapshot | null;
  rate: {
    current: number;
    min: number;
    max: number;
    successCount: number;
    failureCount: number;
    hosts: number;
  };
  closed: boolean;
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export type ThrottleEventType =
  | "sample"
  | "sample-error"
  | "resize"
  | "task-error"
  | "retry"
  | "retune"
  | "shutdown";

export interface ThrottleEvent {
  type: ThrottleEventType;
  timestamp: number;
  taskId?: string;
  host?: string;
  cpuPercent?: number;
  memoryPercent?: number;
  /** Worker counts before and after a resize. */
  workers?: { from: number; to: number };
  /** Rates before and after a retune. */
  rate?: { from: number; to: number };
  successRate?: number;
  /** Zero-indexed attempt that failed (only for "retry" events). */
  attempt?: number;
  delayMs?: number;
  error?: unknown;
  message?: string;
}

export type ThrottleEventHandler = (event: ThrottleEvent) => void;
