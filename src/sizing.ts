import type { ResizeDecision, WorkerPoolState } from "./types.js";

/** Workers added or removed per resize. */
export const RESIZE_STEP = 2;

/** Below this fraction of both thresholds the pool may grow. */
export const GROW_HEADROOM = 0.6;

export interface LoadSample {
  cpuPercent: number;
  memoryPercent: number;
  pendingQueueDepth: number;
}

/**
 * Decide how the pool should react to one load sample.
 *
 * Shrinks under pressure on either resource; grows only when both are well
 * under their thresholds and work is queueing up behind the current workers.
 */
export function decideResize(
  state: WorkerPoolState,
  sample: LoadSample,
): ResizeDecision {
  const { minWorkers, maxWorkers, currentWorkers, cpuThreshold, memoryThreshold } = state;

  if (
    sample.cpuPercent > cpuThreshold ||
    sample.memoryPercent > memoryThreshold
  ) {
    const workers = Math.max(minWorkers, currentWorkers - RESIZE_STEP);
    return {
      direction: workers < currentWorkers ? "shrink" : "hold",
      workers,
    };
  }

  if (
    sample.cpuPercent < cpuThreshold * GROW_HEADROOM &&
    sample.memoryPercent < memoryThreshold * GROW_HEADROOM &&
    sample.pendingQueueDepth > currentWorkers
  ) {
    const workers = Math.min(maxWorkers, currentWorkers + RESIZE_STEP);
    return {
      direction: workers > currentWorkers ? "grow" : "hold",
      workers,
    };
  }

  return { direction: "hold", workers: currentWorkers };
}

/**
 * Scale a base thread count to current load.
 *
 * ```ts
 * optimalThreadCount({ cpuPercent: 20, memoryPercent: 40 }, 10); // 20
 * optimalThreadCount({ cpuPercent: 95, memoryPercent: 40 }, 10); // 5
 * ```
 */
export function optimalThreadCount(
  load: { cpuPercent: number; memoryPercent: number },
  baseCount = 10,
): number {
  if (load.cpuPercent > 80 || load.memoryPercent > 80) {
    return Math.max(1, Math.floor(baseCount / 2));
  }
  if (load.cpuPercent < 30 && load.memoryPercent < 50) {
    return Math.min(50, baseCount * 2);
  }
  return baseCount;
}
