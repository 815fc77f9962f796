import { describe, it, expect } from "vitest";
import { decideResize, optimalThreadCount } from "../src/sizing.js";
import type { WorkerPoolState } from "../src/types.js";

function state(currentWorkers: number, overrides: Partial<WorkerPoolState> = {}): WorkerPoolState {
  return {
    minWorkers: 2,
    maxWorkers: 20,
    currentWorkers,
    cpuThreshold: 80,
    memoryThreshold: 80,
    ...overrides,
  };
}

describe("decideResize", () => {
  it("shrinks by 2 when CPU is over its threshold", () => {
    expect(
      decideResize(state(6), { cpuPercent: 90, memoryPercent: 40, pendingQueueDepth: 0 }),
    ).toEqual({ direction: "shrink", workers: 4 });
  });

  it("shrinks when memory alone is over its threshold", () => {
    expect(
      decideResize(state(6), { cpuPercent: 10, memoryPercent: 81, pendingQueueDepth: 50 }),
    ).toEqual({ direction: "shrink", workers: 4 });
  });

  it("does not shrink below minWorkers", () => {
    expect(
      decideResize(state(3), { cpuPercent: 90, memoryPercent: 40, pendingQueueDepth: 0 }),
    ).toEqual({ direction: "shrink", workers: 2 });
    expect(
      decideResize(state(2), { cpuPercent: 90, memoryPercent: 40, pendingQueueDepth: 0 }),
    ).toEqual({ direction: "hold", workers: 2 });
  });

  it("grows by 2 with headroom and a backlog", () => {
    expect(
      decideResize(state(6), { cpuPercent: 40, memoryPercent: 40, pendingQueueDepth: 7 }),
    ).toEqual({ direction: "grow", workers: 8 });
  });

  it("does not grow without a backlog deeper than the pool", () => {
    expect(
      decideResize(state(6), { cpuPercent: 10, memoryPercent: 10, pendingQueueDepth: 6 }),
    ).toEqual({ direction: "hold", workers: 6 });
  });

  it("does not grow at 60% of a threshold or above", () => {
    expect(
      decideResize(state(6), { cpuPercent: 48, memoryPercent: 10, pendingQueueDepth: 50 }),
    ).toEqual({ direction: "hold", workers: 6 });
    expect(
      decideResize(state(6), { cpuPercent: 10, memoryPercent: 48, pendingQueueDepth: 50 }),
    ).toEqual({ direction: "hold", workers: 6 });
  });

  it("does not grow above maxWorkers", () => {
    expect(
      decideResize(state(19), { cpuPercent: 10, memoryPercent: 10, pendingQueueDepth: 50 }),
    ).toEqual({ direction: "grow", workers: 20 });
    expect(
      decideResize(state(20), { cpuPercent: 10, memoryPercent: 10, pendingQueueDepth: 50 }),
    ).toEqual({ direction: "hold", workers: 20 });
  });

  it("keeps min <= workers <= max for every sample", () => {
    const loads = [0, 20, 47.9, 48, 60, 80, 80.1, 100];
    const depths = [0, 1, 5, 30];

    for (let current = 2; current <= 20; current++) {
      for (const cpuPercent of loads) {
        for (const memoryPercent of loads) {
          for (const pendingQueueDepth of depths) {
            const { workers } = decideResize(state(current), {
              cpuPercent,
              memoryPercent,
              pendingQueueDepth,
            });
            expect(workers).toBeGreaterThanOrEqual(2);
            expect(workers).toBeLessThanOrEqual(20);
            expect(Math.abs(workers - current)).toBeLessThanOrEqual(2);
          }
        }
      }
    }
  });
});

describe("optimalThreadCount", () => {
  it("halves under heavy CPU or memory", () => {
    expect(optimalThreadCount({ cpuPercent: 90, memoryPercent: 10 }, 10)).toBe(5);
    expect(optimalThreadCount({ cpuPercent: 10, memoryPercent: 90 }, 10)).toBe(5);
    expect(optimalThreadCount({ cpuPercent: 90, memoryPercent: 10 }, 7)).toBe(3);
  });

  it("never halves below 1", () => {
    expect(optimalThreadCount({ cpuPercent: 99, memoryPercent: 99 }, 1)).toBe(1);
  });

  it("doubles on an idle machine, capped at 50", () => {
    expect(optimalThreadCount({ cpuPercent: 20, memoryPercent: 40 }, 10)).toBe(20);
    expect(optimalThreadCount({ cpuPercent: 20, memoryPercent: 40 }, 30)).toBe(50);
  });

  it("leaves the count alone in between", () => {
    expect(optimalThreadCount({ cpuPercent: 50, memoryPercent: 50 }, 10)).toBe(10);
    expect(optimalThreadCount({ cpuPercent: 29, memoryPercent: 50 }, 10)).toBe(10);
    expect(optimalThreadCount({ cpuPercent: 80, memoryPercent: 80 }, 10)).toBe(10);
  });

  it("defaults the base count to 10", () => {
    expect(optimalThreadCount({ cpuPercent: 50, memoryPercent: 50 })).toBe(10);
  });
});
