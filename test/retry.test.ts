import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { backoffDelay, retryWithBackoff } from "../src/retry.js";

describe("backoffDelay", () => {
  it("doubles from the factor per attempt", () => {
    expect([0, 1, 2, 3].map((n) => backoffDelay(n, 1_000))).toEqual([1_000, 2_000, 4_000, 8_000]);
    expect(backoffDelay(2, 50)).toBe(200);
  });
});

describe("retryWithBackoff", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(100_000);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns the first success without sleeping", async () => {
    const run = vi.fn(() => "ok");
    await expect(retryWithBackoff(run)).resolves.toBe("ok");
    expect(run).toHaveBeenCalledTimes(1);
  });

  it("retries until a later attempt succeeds", async () => {
    let calls = 0;
    const pending = retryWithBackoff(async () => {
      calls++;
      if (calls < 3) throw new Error(`fail ${calls}`);
      return calls;
    });

    await vi.advanceTimersByTimeAsync(3_000);
    await expect(pending).resolves.toBe(3);
  });

  it("spaces attempts 1s, 2s, 4s apart and rethrows the last error", async () => {
    const startedAt: number[] = [];
    const pending = retryWithBackoff(() => {
      startedAt.push(Date.now());
      throw new Error(`attempt ${startedAt.length} failed`);
    });
    const rejected = expect(pending).rejects.toThrow("attempt 4 failed");

    await vi.advanceTimersByTimeAsync(7_000);
    await rejected;

    expect(startedAt).toEqual([100_000, 101_000, 103_000, 107_000]);
  });

  it("reports each retry before sleeping", async () => {
    const onRetry = vi.fn();
    const pending = retryWithBackoff(
      () => { throw new Error("nope"); },
      { maxRetries: 2, backoffFactorMs: 10, onRetry },
    );
    const rejected = expect(pending).rejects.toThrow("nope");

    await vi.advanceTimersByTimeAsync(30);
    await rejected;

    expect(onRetry.mock.calls.map(([info]) => [info.attempt, info.delayMs])).toEqual([
      [0, 10],
      [1, 20],
    ]);
  });

  it("makes a single attempt with maxRetries 0", async () => {
    const run = vi.fn(() => { throw new Error("once"); });
    await expect(retryWithBackoff(run, { maxRetries: 0 })).rejects.toThrow("once");
    expect(run).toHaveBeenCalledTimes(1);
  });

  it("rejects a retry budget or backoff factor that is not a usable number", async () => {
    const run = vi.fn(() => "never");

    await expect(retryWithBackoff(run, { maxRetries: Number.NaN })).rejects.toThrow(
      "maxRetries (NaN) must be a non-negative integer",
    );
    await expect(retryWithBackoff(run, { maxRetries: -1 })).rejects.toThrow(
      "maxRetries (-1) must be a non-negative integer",
    );
    await expect(retryWithBackoff(run, { backoffFactorMs: Number.NaN })).rejects.toThrow(
      "backoffFactorMs (NaN) must be a non-negative number",
    );
    expect(run).not.toHaveBeenCalled();
  });
});
