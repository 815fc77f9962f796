import type { ThrottleConfig } from "./types.js";
import { ThrottleContext } from "./context.js";

/**
 * Create the process-wide throttle context. Call once at start-up and pass the
 * result to whatever issues requests.
 *
 * @example
 * ```ts
 * const ctx = createThrottleContext({
 *   pool: { minWorkers: 2, maxWorkers: 15, cpuThreshold: 85, memoryThreshold: 85 },
 *   rate: { initialRate: 10, minRate: 1, maxRate: 50 },
 *   delay: { baseDelayMs: 100, jitterMs: 50 },
 * });
 * // ...
 * await ctx.shutdown();
 * ```
 */
export function createThrottleContext(config: ThrottleConfig = {}): ThrottleContext {
  return new ThrottleContext(config);
}
