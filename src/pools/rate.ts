import { now, sleep } from "../utils/time.js";

export const DEFAULT_SCOPE = "default";

export interface SlidingWindowConfig {
  /** Requests allowed within the rolling window. */
  maxRequests: number;
  /** Rolling window size in ms (default 1_000). */
  timeWindowMs?: number;
  /** One shared window instead of one per scope (default false). */
  global?: boolean;
}

/**
 * Timestamps of one scope, oldest first.
 *
 * We keep an index pointer instead of shift() to avoid O(n²) behavior under
 * large windows.
 */
class RequestWindow {
  private readonly _timestamps: number[] = [];
  private _head = 0;

  get size(): number {
    return this._timestamps.length - this._head;
  }

  /** i-th retained timestamp, 0 = oldest. */
  at(i: number): number {
    return this._timestamps[this._head + i] ?? Number.NEGATIVE_INFINITY;
  }

  /** Insert keeping order; reservations may already sit in the future. */
  push(timestamp: number): void {
    let i = this._timestamps.length;
    while (i > this._head && this._timestamps[i - 1] > timestamp) {
      i--;
    }
    this._timestamps.splice(i, 0, timestamp);
  }

  values(): number[] {
    return this._timestamps.slice(this._head);
  }

  prune(cutoff: number): void {
    while (
      this._head < this._timestamps.length &&
      this._timestamps[this._head] <= cutoff
    ) {
      this._head++;
    }

    // Compact occasionally to avoid unbounded growth when the head advances.
    if (this._head > 1024 && this._head > (this._timestamps.length >> 1)) {
      this._timestamps.splice(0, this._head);
      this._head = 0;
    }
  }
}

/**
 * Sliding-window request limiter, global or partitioned by scope (host).
 *
 * Every public method runs its check-and-mutate without yielding, so two
 * callers can never both see the last free slot.
 */
export class SlidingWindowLimiter {
  private _maxRequests: number;
  private readonly _windowMs: number;
  private readonly _global: boolean;
  private readonly _shared = new RequestWindow();
  private readonly _scoped = new Map<string, RequestWindow>();

  constructor(config: SlidingWindowConfig) {
    this._maxRequests = validateMax(config.maxRequests);
    this._windowMs = config.timeWindowMs ?? 1_000;
    this._global = config.global ?? false;

    if (!(this._windowMs > 0)) {
      throw new Error(`timeWindowMs (${this._windowMs}) must be positive`);
    }
  }

  canMakeRequest(scope?: string): boolean {
    const window = this._prunedWindow(scope);
    return window.size < this._maxRequests;
  }

  recordRequest(scope?: string): void {
    this._window(scope).push(now());
  }

  /**
   * Wait until a request is allowed, then count it.
   *
   * The slot is reserved before sleeping (stamped at the moment it becomes
   * free), so concurrent waiters queue up behind each other instead of
   * sharing one slot.
   *
   * @returns ms waited (0 when capacity was available).
   */
  async waitIfNeeded(scope?: string): Promise<number> {
    const t = now();
    const window = this._prunedWindow(scope, t);

    if (window.size < this._maxRequests) {
      window.push(t);
      return 0;
    }

    // The entry that has to expire before this request fits in the window.
    const blocking = window.at(window.size - this._maxRequests);
    const waitMs = Math.max(0, blocking + this._windowMs - t);
    window.push(t + waitMs);

    if (waitMs > 0) {
      await sleep(waitMs);
    }
    return waitMs;
  }

  /** Requests counted in the current window (reservations included). */
  currentCount(scope?: string): number {
    return this._prunedWindow(scope).size;
  }

  /** Retained timestamps, oldest first. */
  timestamps(scope?: string): number[] {
    return this._prunedWindow(scope).values();
  }

  /** Forget recorded requests for one scope, or for all when omitted. */
  reset(scope?: string): void {
    if (this._global || scope === undefined) {
      this._scoped.clear();
      this._shared.prune(Number.POSITIVE_INFINITY);
      return;
    }
    this._scoped.delete(scope);
  }

  get maxRequests(): number {
    return this._maxRequests;
  }

  set maxRequests(value: number) {
    this._maxRequests = validateMax(value);
  }

  get timeWindowMs(): number {
    return this._windowMs;
  }

  get global(): boolean {
    return this._global;
  }

  /** Scopes with a window (always 1 in global mode). */
  get scopes(): number {
    return this._global ? 1 : this._scoped.size;
  }

  private _window(scope?: string): RequestWindow {
    if (this._global) return this._shared;

    const key = scope ?? DEFAULT_SCOPE;
    let window = this._scoped.get(key);
    if (!window) {
      window = new RequestWindow();
      this._scoped.set(key, window);
    }
    return window;
  }

  private _prunedWindow(scope?: string, t = now()): RequestWindow {
    const window = this._window(scope);
    window.prune(t - this._windowMs);
    return window;
  }
}

function validateMax(value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`maxRequests (${value}) must be a positive integer`);
  }
  return value;
}
