import type {
  TaskHandle,
  ThrottleEventHandler,
  Work,
  WorkerPoolConfig,
  WorkerPoolState,
} from "../types.js";
import { decideResize } from "../sizing.js";
import { createEmitter, errorMessage, type Emit } from "../utils/emit.js";
import { newTaskId } from "../utils/id.js";
import { now } from "../utils/time.js";

const DEFAULT_MIN_WORKERS = 2;
const DEFAULT_MAX_WORKERS = 20;
const DEFAULT_CPU_THRESHOLD = 80;
const DEFAULT_MEMORY_THRESHOLD = 80;

/** Rejection for work submitted after shutdown, or queued work cancelled by it. */
export class PoolShutdownError extends Error {
  constructor(message = "Worker pool is shut down") {
    super(message);
    this.name = "PoolShutdownError";
  }
}

export interface ShutdownOptions {
  /** Resolve only once queued and running work has settled (default true). */
  wait?: boolean;
  /** Reject queued work that hasn't started yet (default false). */
  cancelPending?: boolean;
}

interface QueuedTask {
  id: string;
  start: () => Promise<void>;
  cancel: (error: Error) => void;
}

/**
 * Resizable pool of concurrency slots for async work.
 *
 * At most `currentWorkers` tasks are started at once. `adjust()` moves
 * `currentWorkers` by ±2 within [minWorkers, maxWorkers]; each change is a
 * rebuild that bumps `generation`. Running tasks are never interrupted by a
 * rebuild; after a shrink, new starts wait until running work is below the
 * new count.
 */
export class AdaptiveWorkerPool {
  private readonly _minWorkers: number;
  private readonly _maxWorkers: number;
  private readonly _cpuThreshold: number;
  private readonly _memoryThreshold: number;
  private readonly _emit: Emit;

  private _currentWorkers: number;
  private _generation = 0;
  private _active = 0;
  private _closed = false;
  private readonly _queue: QueuedTask[] = [];
  private _idleWaiters: Array<() => void> = [];

  constructor(config: WorkerPoolConfig = {}, onEvent?: ThrottleEventHandler) {
    this._minWorkers = config.minWorkers ?? DEFAULT_MIN_WORKERS;
    this._maxWorkers = config.maxWorkers ?? DEFAULT_MAX_WORKERS;
    this._cpuThreshold = config.cpuThreshold ?? DEFAULT_CPU_THRESHOLD;
    this._memoryThreshold = config.memoryThreshold ?? DEFAULT_MEMORY_THRESHOLD;
    this._emit = createEmitter(onEvent);

    if (!Number.isInteger(this._minWorkers) || this._minWorkers < 1) {
      throw new Error(`minWorkers (${this._minWorkers}) must be a positive integer`);
    }
    if (!Number.isInteger(this._maxWorkers) || this._maxWorkers < this._minWorkers) {
      throw new Error(
        `maxWorkers (${this._maxWorkers}) must be an integer >= minWorkers (${this._minWorkers})`,
      );
    }
    for (const [name, value] of [
      ["cpuThreshold", this._cpuThreshold],
      ["memoryThreshold", this._memoryThreshold],
    ] as const) {
      if (!(value > 0 && value <= 100)) {
        throw new Error(`${name} (${value}) must be in (0, 100]`);
      }
    }

    const initial = Math.trunc(config.initialWorkers ?? this._minWorkers);
    this._currentWorkers = Math.max(
      this._minWorkers,
      Math.min(this._maxWorkers, initial),
    );
  }

  // ---------------------------------------------------------------------------
  // Submission
  // ---------------------------------------------------------------------------

  /**
   * Queue one unit of work. Returns immediately; `handle.result` settles with
   * the work's outcome.
   */
  submit<T>(work: Work<T>): TaskHandle<T> {
    if (this._closed) {
      throw new PoolShutdownError();
    }

    const id = newTaskId();
    const result = new Promise<T>((resolve, reject) => {
      this._queue.push({
        id,
        start: () => Promise.resolve().then(work).then(resolve, reject),
        cancel: reject,
      });
    });

    const handle: TaskHandle<T> = { id, generation: this._generation, result };
    this._dispatch();
    return handle;
  }

  /**
   * Run `fn` over every item. Slot `i` holds item `i`'s result, or `null` when
   * that item threw (reported as a "task-error" event). Never rejects because
   * of an item; rejects with `PoolShutdownError` on a closed pool.
   */
  async map<I, R>(
    fn: (item: I) => R | Promise<R>,
    items: Iterable<I>,
  ): Promise<Array<R | null>> {
    const handles = Array.from(items, (item) => this.submit<R>(() => fn(item)));
    return Promise.all(handles.map((handle) => settleOrNull(handle, this._emit)));
  }

  // ---------------------------------------------------------------------------
  // Sizing
  // ---------------------------------------------------------------------------

  /**
   * Sizing step for one CPU/memory reading.
   * @returns The worker count after the step.
   */
  adjust(cpuPercent: number, memoryPercent: number): number {
    if (this._closed) return this._currentWorkers;

    const decision = decideResize(this.state, {
      cpuPercent,
      memoryPercent,
      pendingQueueDepth: this._queue.length,
    });

    if (decision.direction !== "hold") {
      this._rebuild(decision.workers, cpuPercent, memoryPercent);
    }
    return this._currentWorkers;
  }

  // ---------------------------------------------------------------------------
  // Status
  // ---------------------------------------------------------------------------

  get workerCount(): number {
    return this._currentWorkers;
  }

  /** Tasks currently running. */
  get activeCount(): number {
    return this._active;
  }

  /** Tasks queued and not yet started. */
  get pendingCount(): number {
    return this._queue.length;
  }

  /** Number of rebuilds so far. */
  get generation(): number {
    return this._generation;
  }

  get closed(): boolean {
    return this._closed;
  }

  get state(): WorkerPoolState {
    return {
      minWorkers: this._minWorkers,
      maxWorkers: this._maxWorkers,
      currentWorkers: this._currentWorkers,
      cpuThreshold: this._cpuThreshold,
      memoryThreshold: this._memoryThreshold,
    };
  }

  // ---------------------------------------------------------------------------
  // Cleanup
  // ---------------------------------------------------------------------------

  /** Stop accepting work. Safe to call more than once. */
  async shutdown(options: ShutdownOptions = {}): Promise<void> {
    this._closed = true;

    if (options.cancelPending) {
      const cancelled = this._queue.splice(0, this._queue.length);
      for (const task of cancelled) {
        task.cancel(new PoolShutdownError(`Task ${task.id} cancelled by shutdown`));
      }
      this._notifyIfIdle();
    }

    if (options.wait ?? true) {
      await this._whenIdle();
    }
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  private _rebuild(workers: number, cpuPercent: number, memoryPercent: number): void {
    const from = this._currentWorkers;
    this._currentWorkers = workers;
    this._generation++;

    this._emit({
      type: "resize",
      timestamp: now(),
      workers: { from, to: workers },
      cpuPercent,
      memoryPercent,
      message: workers < from ? "high resource usage" : "low resource usage",
    });

    this._dispatch();
  }

  private _dispatch(): void {
    while (this._active < this._currentWorkers) {
      const task = this._queue.shift();
      if (!task) break;

      this._active++;
      void task.start().finally(() => {
        this._active--;
        this._dispatch();
        this._notifyIfIdle();
      });
    }
  }

  private _whenIdle(): Promise<void> {
    if (this._active === 0 && this._queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this._idleWaiters.push(resolve));
  }

  private _notifyIfIdle(): void {
    if (this._active !== 0 || this._queue.length !== 0) return;
    const waiters = this._idleWaiters;
    this._idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}

/** Await a task, turning a failure into `null` plus a "task-error" event. */
export async function settleOrNull<T>(
  handle: TaskHandle<T>,
  emit: Emit,
): Promise<T | null> {
  try {
    return await handle.result;
  } catch (error) {
    emit({
      type: "task-error",
      timestamp: now(),
      taskId: handle.id,
      error,
      message: errorMessage(error),
    });
    return null;
  }
}
