import type { ThrottleEventHandler, Work } from "./types.js";
import type { AdaptiveWorkerPool } from "./pools/worker.js";
import { settleOrNull } from "./pools/worker.js";
import { retryWithBackoff, type BackoffOptions } from "./retry.js";
import { createEmitter, errorMessage, type Emit } from "./utils/emit.js";
import { now } from "./utils/time.js";

export type ScheduleOptions = Omit<BackoffOptions, "onRetry">;

/**
 * Higher-level scheduling on top of an {@link AdaptiveWorkerPool}: sequential
 * retry of one task, and wave-by-wave batches.
 */
export class TaskScheduler {
  private readonly _pool: AdaptiveWorkerPool;
  private readonly _emit: Emit;

  constructor(pool: AdaptiveWorkerPool, onEvent?: ThrottleEventHandler) {
    this._pool = pool;
    this._emit = createEmitter(onEvent);
  }

  /**
   * Run `work` on the pool, retrying failures with exponential backoff.
   * Rejects with the last error once the retry budget is spent.
   */
  scheduleWithBackoff<T>(work: Work<T>, options?: ScheduleOptions): Promise<T> {
    return retryWithBackoff(() => this._pool.submit(work).result, {
      ...options,
      onRetry: ({ attempt, delayMs, error }) => {
        this._emit({
          type: "retry",
          timestamp: now(),
          attempt,
          delayMs,
          error,
          message: errorMessage(error),
        });
      },
    });
  }

  /**
   * Run `tasks` in waves of `maxConcurrent` (default: current worker count).
   * Each wave drains before the next starts. Slot `i` holds task `i`'s result,
   * or `null` if it threw.
   */
  async scheduleBatch<T>(
    tasks: ReadonlyArray<Work<T>>,
    maxConcurrent?: number,
  ): Promise<Array<T | null>> {
    const waveSize = Math.max(1, Math.trunc(maxConcurrent ?? this._pool.workerCount));
    const results: Array<T | null> = [];

    for (let i = 0; i < tasks.length; i += waveSize) {
      const wave = tasks.slice(i, i + waveSize).map((task) => this._pool.submit(task));
      const settled = await Promise.all(
        wave.map((handle) => settleOrNull(handle, this._emit)),
      );
      results.push(...settled);
    }

    return results;
  }
}
