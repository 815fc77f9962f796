import type { DelayConfig } from "./types.js";
import { sleep } from "./utils/time.js";

const DEFAULT_BASE_DELAY_MS = 100;
const DEFAULT_JITTER_MS = 50;

/**
 * Jittered pause before each request, independent of rate limiting.
 *
 * Spreads requests out so a scan doesn't arrive in perfectly regular bursts.
 */
export class DelayInjector {
  private readonly _baseDelayMs: number;
  private readonly _jitterMs: number;
  private readonly _random: () => number;
  private readonly _hostDelays = new Map<string, number>();

  constructor(config: DelayConfig = {}) {
    this._baseDelayMs = config.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
    this._jitterMs = Math.abs(config.jitterMs ?? DEFAULT_JITTER_MS);
    this._random = config.random ?? Math.random;
  }

  /** Base (or per-host override) plus uniform jitter in ±jitterMs, never negative. */
  getDelay(host: string): number {
    const base = this._hostDelays.get(host) ?? this._baseDelayMs;
    const jitter = (this._random() * 2 - 1) * this._jitterMs;
    return Math.max(0, base + jitter);
  }

  setHostDelay(host: string, delayMs: number): void {
    this._hostDelays.set(host, delayMs);
  }

  clearHostDelay(host: string): void {
    this._hostDelays.delete(host);
  }

  /** Sleep for `getDelay(host)`. Resolves the ms slept. */
  async applyDelay(host: string): Promise<number> {
    const delayMs = this.getDelay(host);
    if (delayMs > 0) {
      await sleep(delayMs);
    }
    return delayMs;
  }

  get baseDelayMs(): number {
    return this._baseDelayMs;
  }

  get jitterMs(): number {
    return this._jitterMs;
  }
}
