/**
 * Lightweight stats collector — subscribe to `onEvent`, get numbers.
 *
 * Zero dependencies. No timers.
 *
 * ```ts
 * import { createThrottleContext, createStatsCollector } from "hostpace";
 *
 * const stats = createStatsCollector();
 * const ctx = createThrottleContext({ ...config, onEvent: stats.handler });
 *
 * // Later:
 * console.log(stats.snapshot());
 * // { samples: 30, resizes: { grow: 2, shrink: 1 }, taskErrors: 3, ... }
 * ```
 *
 * @module
 */

import type { ThrottleEvent, ThrottleEventHandler } from "./types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Point-in-time stats snapshot. */
export interface StatsSnapshot {
  /** Successful sampling cycles. */
  samples: number;
  /** Failed sampling cycles. */
  sampleErrors: number;
  /** Pool rebuilds by direction. */
  resizes: { grow: number; shrink: number };
  /** Units of work that failed in map/batch runs. */
  taskErrors: number;
  /** Backoff sleeps taken by retried tasks. */
  retries: number;
  /** Rate rollovers, and how many changed the rate. */
  retunes: { total: number; up: number; down: number };
  /** Rate after the most recent rollover. NaN before the first one. */
  lastRate: number;
  /** Average CPU over all samples. NaN if no samples yet. */
  avgCpuPercent: number;
  /** Highest CPU seen. -Infinity if no samples. */
  peakCpuPercent: number;
  /** Total events processed. */
  totalEvents: number;
}

/** A stats collector that can be wired to `onEvent`. */
export interface StatsCollector {
  /** Pass this to `onEvent` in your context config. */
  handler: ThrottleEventHandler;
  /** Get a point-in-time snapshot of all stats. */
  snapshot: () => StatsSnapshot;
  /** Reset all counters to zero. */
  reset: () => void;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Create a stats collector for throttle events.
 *
 * If you already have an `onEvent` handler, compose them:
 * ```ts
 * const stats = createStatsCollector();
 * const log = createLogHandler(console);
 * const ctx = createThrottleContext({
 *   onEvent: (e) => { stats.handler(e); log(e); },
 * });
 * ```
 */
export function createStatsCollector(): StatsCollector {
  let samples = 0;
  let sampleErrors = 0;
  let grow = 0;
  let shrink = 0;
  let taskErrors = 0;
  let retries = 0;
  let retunes = 0;
  let retunesUp = 0;
  let retunesDown = 0;
  let lastRate = NaN;
  let cpuSum = 0;
  let cpuPeak = -Infinity;
  let totalEvents = 0;

  function handler(event: ThrottleEvent): void {
    totalEvents++;

    switch (event.type) {
      case "sample":
        samples++;
        if (event.cpuPercent !== undefined) {
          cpuSum += event.cpuPercent;
          if (event.cpuPercent > cpuPeak) cpuPeak = event.cpuPercent;
        }
        break;

      case "sample-error":
        sampleErrors++;
        break;

      case "resize":
        if (event.workers) {
          if (event.workers.to > event.workers.from) grow++;
          else if (event.workers.to < event.workers.from) shrink++;
        }
        break;

      case "task-error":
        taskErrors++;
        break;

      case "retry":
        retries++;
        break;

      case "retune":
        retunes++;
        if (event.rate) {
          if (event.rate.to > event.rate.from) retunesUp++;
          else if (event.rate.to < event.rate.from) retunesDown++;
          lastRate = event.rate.to;
        }
        break;

      // "shutdown" — counted in totalEvents but no special tracking
    }
  }

  function snapshot(): StatsSnapshot {
    return {
      samples,
      sampleErrors,
      resizes: { grow, shrink },
      taskErrors,
      retries,
      retunes: { total: retunes, up: retunesUp, down: retunesDown },
      lastRate,
      avgCpuPercent: samples > 0 ? cpuSum / samples : NaN,
      peakCpuPercent: cpuPeak,
      totalEvents,
    };
  }

  function reset(): void {
    samples = 0;
    sampleErrors = 0;
    grow = 0;
    shrink = 0;
    taskErrors = 0;
    retries = 0;
    retunes = 0;
    retunesUp = 0;
    retunesDown = 0;
    lastRate = NaN;
    cpuSum = 0;
    cpuPeak = -Infinity;
    totalEvents = 0;
  }

  return { handler, snapshot, reset };
}
