import { describe, it, expect, vi } from "vitest";
import { formatEvent, formatSnapshot, createLogHandler } from "../src/format.js";
import type { ThrottleSnapshot } from "../src/types.js";

describe("formatEvent", () => {
  it("formats a sample", () => {
    expect(
      formatEvent({ type: "sample", timestamp: 1, cpuPercent: 42.5, memoryPercent: 61 }),
    ).toBe("[sample] cpu=42.5% mem=61.0%");
  });

  it("formats a resize with its reason", () => {
    expect(
      formatEvent({
        type: "resize",
        timestamp: 1,
        workers: { from: 6, to: 4 },
        cpuPercent: 91,
        memoryPercent: 40,
        message: "high resource usage",
      }),
    ).toBe("[resize] workers=6->4 cpu=91.0% mem=40.0% — high resource usage");
  });

  it("shortens task ids", () => {
    expect(
      formatEvent({
        type: "task-error",
        timestamp: 1,
        taskId: "task-1234abcd-0000",
        message: "boom",
      }),
    ).toBe("[task-error] task=task-1234 — boom");
  });

  it("formats a retry", () => {
    expect(
      formatEvent({ type: "retry", timestamp: 1, attempt: 1, delayMs: 2_000, message: "timeout" }),
    ).toBe("[retry] attempt=1 delayMs=2000 — timeout");
  });

  it("formats a retune with host first", () => {
    expect(
      formatEvent({
        type: "retune",
        timestamp: 1,
        host: "example.test",
        rate: { from: 10, to: 11 },
        successRate: 0.95,
      }),
    ).toBe("[retune] host=example.test rate=10->11 success=95.0%");
  });

  it("formats message-only events", () => {
    expect(formatEvent({ type: "shutdown", timestamp: 1, message: "stopped at 4 workers" })).toBe(
      "[shutdown] — stopped at 4 workers",
    );
    expect(formatEvent({ type: "sample-error", timestamp: 1 })).toBe("[sample-error]");
  });
});

describe("formatSnapshot", () => {
  const snap: ThrottleSnapshot = {
    timestamp: 1,
    pool: {
      minWorkers: 2,
      maxWorkers: 15,
      currentWorkers: 4,
      cpuThreshold: 85,
      memoryThreshold: 85,
      active: 4,
      pending: 12,
      generation: 3,
    },
    resources: null,
    rate: { current: 11, min: 1, max: 50, successCount: 0, failureCount: 0, hosts: 7 },
    closed: false,
  };

  it("lists pool and rate state", () => {
    expect(formatSnapshot(snap)).toBe(
      "workers=4/2..15 active=4 pending=12 gen=3 rate=11/1..50 hosts=7",
    );
  });

  it("adds load and the closed flag when present", () => {
    expect(
      formatSnapshot({
        ...snap,
        resources: {
          cpuPercent: 38,
          memoryPercent: 52.14,
          activeWorkers: 4,
          pendingQueueDepth: 12,
          timestamp: 1,
        },
        closed: true,
      }),
    ).toBe("workers=4/2..15 active=4 pending=12 gen=3 rate=11/1..50 hosts=7 cpu=38.0% mem=52.1% closed");
  });
});

describe("createLogHandler", () => {
  it("sends failures to error and everything else to info", () => {
    const sink = { info: vi.fn(), error: vi.fn() };
    const log = createLogHandler(sink);

    log({ type: "sample", timestamp: 1, cpuPercent: 10, memoryPercent: 20 });
    log({ type: "task-error", timestamp: 1, taskId: "task-1", message: "boom" });
    log({ type: "sample-error", timestamp: 1, message: "Resource monitor error: x" });

    expect(sink.info.mock.calls).toEqual([["[sample] cpu=10.0% mem=20.0%"]]);
    expect(sink.error.mock.calls).toEqual([
      ["[task-error] task=task-1 — boom"],
      ["[sample-error] — Resource monitor error: x"],
    ]);
  });

  it("filters to the included event types", () => {
    const sink = { info: vi.fn(), error: vi.fn() };
    const log = createLogHandler(sink, ["resize"]);

    log({ type: "sample", timestamp: 1 });
    log({ type: "resize", timestamp: 1, workers: { from: 2, to: 4 } });

    expect(sink.info.mock.calls).toEqual([["[resize] workers=2->4"]]);
    expect(sink.error).not.toHaveBeenCalled();
  });
});
