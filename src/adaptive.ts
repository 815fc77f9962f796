/**
 * AdaptiveRateController — per-host sliding-window limiters driven by one
 * shared success signal.
 *
 * - Counts successes and failures in fixed rollover windows
 * - At rollover: success rate > 0.9 → rate +10%, < 0.7 → rate −10%
 * - The new rate is pushed to every host's limiter
 * - minRate/maxRate bound the rate at all times
 */

import type { RateControlConfig, ThrottleEventHandler } from "./types.js";
import { SlidingWindowLimiter } from "./pools/rate.js";
import { now } from "./utils/time.js";
import { createEmitter, type Emit } from "./utils/emit.js";

const DEFAULT_INITIAL_RATE = 10;
const DEFAULT_MIN_RATE = 1;
const DEFAULT_MAX_RATE = 50;
const DEFAULT_WINDOW_SIZE_MS = 10_000;
const DEFAULT_LIMITER_WINDOW_MS = 1_000;

/** Above this success rate the controller speeds up. */
export const HEALTHY_SUCCESS_RATE = 0.9;
/** Below this success rate the controller backs off. */
export const UNHEALTHY_SUCCESS_RATE = 0.7;

export class AdaptiveRateController {
  private readonly _minRate: number;
  private readonly _maxRate: number;
  private readonly _windowSizeMs: number;
  private readonly _limiterWindowMs: number;
  private readonly _limiters = new Map<string, SlidingWindowLimiter>();
  private readonly _emit: Emit;

  private _currentRate: number;
  private _successCount = 0;
  private _failureCount = 0;
  private _windowStart: number;

  constructor(config: RateControlConfig = {}, onEvent?: ThrottleEventHandler) {
    this._minRate = config.minRate ?? DEFAULT_MIN_RATE;
    this._maxRate = config.maxRate ?? DEFAULT_MAX_RATE;
    this._windowSizeMs = config.windowSizeMs ?? DEFAULT_WINDOW_SIZE_MS;
    this._limiterWindowMs = config.limiterWindowMs ?? DEFAULT_LIMITER_WINDOW_MS;
    this._emit = createEmitter(onEvent);

    if (!Number.isInteger(this._minRate) || this._minRate < 1) {
      throw new Error(`minRate (${this._minRate}) must be a positive integer`);
    }
    if (!Number.isInteger(this._maxRate) || this._maxRate < this._minRate) {
      throw new Error(
        `maxRate (${this._maxRate}) must be at least minRate (${this._minRate})`,
      );
    }

    this._currentRate = this._clamp(config.initialRate ?? DEFAULT_INITIAL_RATE);
    this._windowStart = now();
  }

  /** Limiter for `host`, created on first use with the current rate. */
  getLimiter(host: string): SlidingWindowLimiter {
    let limiter = this._limiters.get(host);
    if (!limiter) {
      limiter = new SlidingWindowLimiter({
        maxRequests: this._currentRate,
        timeWindowMs: this._limiterWindowMs,
      });
      this._limiters.set(host, limiter);
    }
    return limiter;
  }

  /** Feed one request outcome; may roll the window over and retune every host. */
  reportResult(host: string, success: boolean): void {
    if (success) {
      this._successCount++;
    } else {
      this._failureCount++;
    }

    const t = now();
    if (t - this._windowStart >= this._windowSizeMs) {
      this._rollover(t, host);
    }
  }

  /** Wait for a slot on `host`'s limiter. Resolves the ms waited. */
  waitIfNeeded(host: string): Promise<number> {
    return this.getLimiter(host).waitIfNeeded(host);
  }

  canMakeRequest(host: string): boolean {
    return this.getLimiter(host).canMakeRequest(host);
  }

  /** True when a request to `host` right now would have to wait. */
  shouldDelay(host: string): boolean {
    return !this.canMakeRequest(host);
  }

  /**
   * Override one host's allowed rate. The next rollover replaces it with the
   * shared rate again.
   */
  setHostRate(host: string, rate: number): void {
    this.getLimiter(host).maxRequests = rate;
  }

  get currentRate(): number {
    return this._currentRate;
  }

  get minRate(): number {
    return this._minRate;
  }

  get maxRate(): number {
    return this._maxRate;
  }

  get successCount(): number {
    return this._successCount;
  }

  get failureCount(): number {
    return this._failureCount;
  }

  get windowStart(): number {
    return this._windowStart;
  }

  get hosts(): string[] {
    return [...this._limiters.keys()];
  }

  private _rollover(t: number, host: string): void {
    const total = this._successCount + this._failureCount;
    const successRate = total > 0 ? this._successCount / total : 1;
    const previous = this._currentRate;

    if (successRate > HEALTHY_SUCCESS_RATE) {
      this._currentRate = this._clamp(Math.trunc(previous * 1.1));
    } else if (successRate < UNHEALTHY_SUCCESS_RATE) {
      this._currentRate = this._clamp(Math.trunc(previous * 0.9));
    }

    this._windowStart = t;
    this._successCount = 0;
    this._failureCount = 0;

    for (const limiter of this._limiters.values()) {
      limiter.maxRequests = this._currentRate;
    }

    this._emit({
      type: "retune",
      timestamp: t,
      host,
      rate: { from: previous, to: this._currentRate },
      successRate,
    });
  }

  private _clamp(rate: number): number {
    return Math.max(this._minRate, Math.min(this._maxRate, rate));
  }
}
