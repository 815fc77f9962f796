import type {
  ResourceSnapshot,
  TaskHandle,
  ThrottleConfig,
  ThrottleSnapshot,
  Work,
} from "./types.js";
import { AdaptiveWorkerPool, type ShutdownOptions } from "./pools/worker.js";
import { ResourceSampler } from "./sampler.js";
import { TaskScheduler, type ScheduleOptions } from "./scheduler.js";
import { AdaptiveRateController } from "./adaptive.js";
import { DelayInjector } from "./delay.js";
import { optimalThreadCount } from "./sizing.js";
import {
  DEFAULT_THREAD_COUNT,
  THREAD_COUNT_KEY,
  type SettingsStore,
} from "./settings.js";
import { createEmitter, type Emit } from "./utils/emit.js";
import { now } from "./utils/time.js";

export interface RequestWait {
  /** Jittered pause applied before the rate check. */
  delayMs: number;
  /** Time spent waiting for the host's rate window. */
  rateWaitMs: number;
}

/**
 * Everything the scanner needs to pace its work, created once at start-up and
 * passed to whoever issues requests.
 *
 * Owns the worker pool and its resource sampler, the task scheduler, the
 * adaptive per-host rate controller and the delay injector. `shutdown()` tears
 * all of it down.
 */
export class ThrottleContext {
  readonly pool: AdaptiveWorkerPool;
  readonly scheduler: TaskScheduler;
  readonly sampler: ResourceSampler | null;
  readonly rate: AdaptiveRateController;
  readonly delays: DelayInjector;

  private readonly _emit: Emit;
  private _shutdown: Promise<void> | null = null;

  constructor(config: ThrottleConfig = {}) {
    const onEvent = config.onEvent;
    this._emit = createEmitter(onEvent);

    this.pool = new AdaptiveWorkerPool(config.pool, onEvent);
    this.scheduler = new TaskScheduler(this.pool, onEvent);
    this.rate = new AdaptiveRateController(config.rate, onEvent);
    this.delays = new DelayInjector(config.delay);

    // Resource sampler (on unless explicitly disabled)
    if (config.sampler === false) {
      this.sampler = null;
    } else {
      const samplerConfig =
        typeof config.sampler === "object" ? config.sampler : {};
      this.sampler = new ResourceSampler(this.pool, samplerConfig, onEvent);
      this.sampler.start();
    }
  }

  // ---------------------------------------------------------------------------
  // Work
  // ---------------------------------------------------------------------------

  submit<T>(work: Work<T>): TaskHandle<T> {
    return this.pool.submit(work);
  }

  map<I, R>(
    fn: (item: I) => R | Promise<R>,
    items: Iterable<I>,
  ): Promise<Array<R | null>> {
    return this.pool.map(fn, items);
  }

  scheduleWithBackoff<T>(work: Work<T>, options?: ScheduleOptions): Promise<T> {
    return this.scheduler.scheduleWithBackoff(work, options);
  }

  scheduleBatch<T>(
    tasks: ReadonlyArray<Work<T>>,
    maxConcurrent?: number,
  ): Promise<Array<T | null>> {
    return this.scheduler.scheduleBatch(tasks, maxConcurrent);
  }

  get workerCount(): number {
    return this.pool.workerCount;
  }

  // ---------------------------------------------------------------------------
  // Resources
  // ---------------------------------------------------------------------------

  /** Latest resource reading; an instant one when sampling is off or hasn't run. */
  async resourceSnapshot(): Promise<ResourceSnapshot> {
    if (this.sampler) return this.sampler.current();
    return instantSnapshot(this.pool);
  }

  /** Scale `baseCount` to current load. See {@link optimalThreadCount}. */
  async optimalThreadCount(baseCount = DEFAULT_THREAD_COUNT): Promise<number> {
    return optimalThreadCount(await this.resourceSnapshot(), baseCount);
  }

  /**
   * Read the configured thread count, replace it with the load-adjusted one,
   * and report both.
   */
  async tuneThreadSetting(
    settings: SettingsStore,
    key = THREAD_COUNT_KEY,
  ): Promise<{ previous: number; next: number }> {
    const previous = settings.get<number>(key, DEFAULT_THREAD_COUNT);
    const next = await this.optimalThreadCount(previous);
    settings.set(key, next);
    return { previous, next };
  }

  // ---------------------------------------------------------------------------
  // Request pacing
  // ---------------------------------------------------------------------------

  /** Jittered delay first, then the host's rate window. */
  async waitBeforeRequest(host: string): Promise<RequestWait> {
    const delayMs = await this.delays.applyDelay(host);
    const rateWaitMs = await this.rate.waitIfNeeded(host);
    return { delayMs, rateWaitMs };
  }

  reportResult(host: string, success: boolean): void {
    this.rate.reportResult(host, success);
  }

  setHostRate(host: string, rate: number): void {
    this.rate.setHostRate(host, rate);
  }

  setHostDelay(host: string, delayMs: number): void {
    this.delays.setHostDelay(host, delayMs);
  }

  applyDelay(host: string): Promise<number> {
    return this.delays.applyDelay(host);
  }

  shouldDelayRequest(host: string): boolean {
    return this.rate.shouldDelay(host);
  }

  // ---------------------------------------------------------------------------
  // Snapshot
  // ---------------------------------------------------------------------------

  /** Return a read-only snapshot of current state. */
  snapshot(): ThrottleSnapshot {
    return {
      timestamp: now(),
      pool: {
        ...this.pool.state,
        active: this.pool.activeCount,
        pending: this.pool.pendingCount,
        generation: this.pool.generation,
      },
      resources: this.sampler?.latest ?? null,
      rate: {
        current: this.rate.currentRate,
        min: this.rate.minRate,
        max: this.rate.maxRate,
        successCount: this.rate.successCount,
        failureCount: this.rate.failureCount,
        hosts: this.rate.hosts.length,
      },
      closed: this.pool.closed,
    };
  }

  // ---------------------------------------------------------------------------
  // Cleanup
  // ---------------------------------------------------------------------------

  /**
   * Stop sampling (waiting for the loop to exit), then shut the pool down.
   * Later calls return the first call's promise.
   */
  shutdown(options?: ShutdownOptions): Promise<void> {
    if (!this._shutdown) {
      this._shutdown = this._teardown(options);
    }
    return this._shutdown;
  }

  private async _teardown(options?: ShutdownOptions): Promise<void> {
    if (this.sampler) {
      await this.sampler.stop();
    }
    await this.pool.shutdown(options);
    this._emit({
      type: "shutdown",
      timestamp: now(),
      message: `stopped at ${this.pool.workerCount} workers`,
    });
  }
}

function instantSnapshot(pool: AdaptiveWorkerPool): Promise<ResourceSnapshot> {
  const probeOnly = new ResourceSampler(pool, { sampleWindowMs: 0 });
  return probeOnly.current();
}
