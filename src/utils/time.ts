/**
 * Internal clock abstraction.
 *
 * Production code uses `now()` which defaults to `Date.now()`.
 * Tests inject a fake clock via `setNow()` for deterministic behavior.
 */

/** Clock interface — a function that returns the current time in ms. */
export type Clock = () => number;

/** Injectable clock — defaults to `Date.now()`. Swap in tests for deterministic time. */
let _now: Clock = () => Date.now();

export function now(): number {
  return _now();
}

/** Replace the clock function (for tests). */
export function setNow(fn: Clock): void {
  _now = fn;
}

/** Reset to real `Date.now()`. Always call in afterEach. */
export function resetNow(): void {
  _now = () => Date.now();
}

/**
 * Create a test clock with a mutable `time` property.
 *
 * ```ts
 * const clock = createTestClock(100_000);
 * setNow(clock.fn);
 * clock.advance(5_000);
 * ```
 */
export function createTestClock(startMs = 100_000): {
  time: number;
  fn: Clock;
  advance: (ms: number) => void;
} {
  const clock = {
    time: startMs,
    fn: () => clock.time,
    advance: (ms: number) => { clock.time += ms; },
  };
  return clock;
}

export interface SleepOptions {
  /** Resolve early when this signal aborts. */
  signal?: AbortSignal;
  /** Don't keep the process alive for this timer. */
  unref?: boolean;
}

/**
 * Resolve after `ms`. Never rejects: an aborted signal just ends the wait early.
 */
export function sleep(ms: number, options?: SleepOptions): Promise<void> {
  const signal = options?.signal;
  if (signal?.aborted) return Promise.resolve();

  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));
    if (options?.unref && typeof timer.unref === "function") {
      timer.unref();
    }
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
