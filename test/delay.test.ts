import { describe, it, expect, afterEach, vi } from "vitest";
import { DelayInjector } from "../src/delay.js";

describe("DelayInjector", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("adds symmetric jitter around the base delay", () => {
    const at = (r: number) =>
      new DelayInjector({ baseDelayMs: 100, jitterMs: 50, random: () => r }).getDelay("a.test");

    expect(at(0)).toBe(50);
    expect(at(0.5)).toBe(100);
    expect(at(0.75)).toBe(125);
  });

  it("uses a per-host override instead of the base", () => {
    const delays = new DelayInjector({ baseDelayMs: 100, jitterMs: 0 });
    delays.setHostDelay("slow.test", 2_000);

    expect(delays.getDelay("slow.test")).toBe(2_000);
    expect(delays.getDelay("fast.test")).toBe(100);

    delays.clearHostDelay("slow.test");
    expect(delays.getDelay("slow.test")).toBe(100);
  });

  it("never returns a negative delay", () => {
    const delays = new DelayInjector({ baseDelayMs: 10, jitterMs: 50, random: () => 0 });
    expect(delays.getDelay("a.test")).toBe(0);
  });

  it("stays within base ± jitter for any random draw", () => {
    const delays = new DelayInjector({ baseDelayMs: 200, jitterMs: 30 });
    for (let i = 0; i < 200; i++) {
      const d = delays.getDelay("a.test");
      expect(d).toBeGreaterThanOrEqual(170);
      expect(d).toBeLessThanOrEqual(230);
    }
  });

  it("applyDelay sleeps for the computed delay", async () => {
    vi.useFakeTimers();
    const delays = new DelayInjector({ baseDelayMs: 100, jitterMs: 0 });

    let done = false;
    const pending = delays.applyDelay("a.test").then((ms) => {
      done = true;
      return ms;
    });

    await vi.advanceTimersByTimeAsync(99);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await expect(pending).resolves.toBe(100);
  });

  it("applyDelay resolves at once when the delay is zero", async () => {
    const delays = new DelayInjector({ baseDelayMs: 0, jitterMs: 0 });
    await expect(delays.applyDelay("a.test")).resolves.toBe(0);
  });
});
