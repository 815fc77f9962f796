import type { ThrottleConfig } from "./types.js";

/**
 * Presets — opinionated config objects for common scan profiles.
 *
 * Each preset returns a plain `ThrottleConfig` you can spread/override:
 *
 * ```ts
 * const ctx = createThrottleContext(presets.standard());
 * // or override one field:
 * const ctx = createThrottleContext({ ...presets.standard(), sampler: false });
 * ```
 */
export const presets = {
  /**
   * **Gentle** — low footprint on both ends.
   *
   * Best for: fragile targets, shared machines, hosts behind a WAF.
   * - pool: 1–4 workers, shrinks above 70% CPU/memory
   * - rate: starts at 3 req/s per host, 1–10
   * - delay: 500 ms ± 250 ms
   */
  gentle(): ThrottleConfig {
    return {
      pool: { minWorkers: 1, maxWorkers: 4, cpuThreshold: 70, memoryThreshold: 70 },
      rate: { initialRate: 3, minRate: 1, maxRate: 10 },
      delay: { baseDelayMs: 500, jitterMs: 250 },
    };
  },

  /**
   * **Standard** — the scanner's stock settings.
   *
   * - pool: 2–15 workers, shrinks above 85% CPU/memory
   * - rate: starts at 10 req/s per host, 1–50
   * - delay: 100 ms ± 50 ms
   */
  standard(): ThrottleConfig {
    return {
      pool: { minWorkers: 2, maxWorkers: 15, cpuThreshold: 85, memoryThreshold: 85 },
      rate: { initialRate: 10, minRate: 1, maxRate: 50 },
      delay: { baseDelayMs: 100, jitterMs: 50 },
    };
  },

  /**
   * **Aggressive** — throughput first.
   *
   * Best for: internal ranges you own, lab targets.
   * - pool: 4–50 workers, shrinks above 90% CPU/memory
   * - rate: starts at 25 req/s per host, 5–100
   * - no delay
   */
  aggressive(): ThrottleConfig {
    return {
      pool: { minWorkers: 4, maxWorkers: 50, cpuThreshold: 90, memoryThreshold: 90 },
      rate: { initialRate: 25, minRate: 5, maxRate: 100 },
      delay: { baseDelayMs: 0, jitterMs: 0 },
    };
  },
} as const;
