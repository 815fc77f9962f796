import os from "node:os";
import type {
  ResourceProbe,
  ResourceSnapshot,
  SamplerConfig,
  ThrottleEventHandler,
} from "./types.js";
import { createEmitter, errorMessage, type Emit } from "./utils/emit.js";
import { now, sleep } from "./utils/time.js";

const DEFAULT_SAMPLE_WINDOW_MS = 1_000;
const DEFAULT_INTERVAL_MS = 2_000;

/** History length that triggers a trim. */
export const HISTORY_CAPACITY = 100;
/** Entries kept after a trim. */
export const HISTORY_RETAIN = 50;

/** The pool side of sampling: what it reports, and what it resizes. */
export interface SamplerTarget {
  readonly activeCount: number;
  readonly pendingCount: number;
  adjust(cpuPercent: number, memoryPercent: number): number;
}

// ---------------------------------------------------------------------------
// node:os probe
// ---------------------------------------------------------------------------

interface CpuTotals {
  idle: number;
  total: number;
}

function readCpuTotals(): CpuTotals {
  let idle = 0;
  let total = 0;
  for (const cpu of os.cpus()) {
    const { user, nice, sys, irq } = cpu.times;
    idle += cpu.times.idle;
    total += user + nice + sys + irq + cpu.times.idle;
  }
  return { idle, total };
}

function busyPercent(start: CpuTotals, end: CpuTotals): number {
  const total = end.total - start.total;
  if (total <= 0) return 0;
  const idle = end.idle - start.idle;
  return clampPercent(((total - idle) / total) * 100);
}

function clampPercent(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(100, value));
}

/**
 * Probe backed by `node:os`.
 *
 * CPU is the busy share of all cores across the observation window (since
 * boot when the window is 0); memory is the used share of physical memory.
 */
export function createOsProbe(): ResourceProbe {
  return {
    async cpuPercent(windowMs, signal) {
      const start = readCpuTotals();
      if (windowMs <= 0) {
        return busyPercent({ idle: 0, total: 0 }, start);
      }
      await sleep(windowMs, { signal, unref: true });
      return busyPercent(start, readCpuTotals());
    },
    memoryPercent() {
      const total = os.totalmem();
      if (total <= 0) return 0;
      return clampPercent(((total - os.freemem()) / total) * 100);
    },
  };
}

// ---------------------------------------------------------------------------
// Sampler
// ---------------------------------------------------------------------------

/**
 * Background loop that reads CPU and memory, keeps a bounded history, and
 * hands every reading to the pool's sizing step.
 *
 * Errors from the probe or the sizing step are reported as "sample-error"
 * events and never end the loop.
 */
export class ResourceSampler {
  private readonly _probe: ResourceProbe;
  private readonly _sampleWindowMs: number;
  private readonly _intervalMs: number;
  private readonly _target: SamplerTarget;
  private readonly _emit: Emit;

  private _history: ResourceSnapshot[] = [];
  private _abort: AbortController | null = null;
  private _loop: Promise<void> | null = null;

  constructor(
    target: SamplerTarget,
    config: SamplerConfig = {},
    onEvent?: ThrottleEventHandler,
  ) {
    this._target = target;
    this._probe = config.probe ?? createOsProbe();
    this._sampleWindowMs = config.sampleWindowMs ?? DEFAULT_SAMPLE_WINDOW_MS;
    this._intervalMs = config.intervalMs ?? DEFAULT_INTERVAL_MS;
    this._emit = createEmitter(onEvent);
  }

  /** Start the loop. No-op if already running. */
  start(): void {
    if (this._loop) return;
    const abort = new AbortController();
    this._abort = abort;
    this._loop = this._run(abort.signal);
  }

  /** Signal the loop and resolve once it has exited. */
  async stop(): Promise<void> {
    const loop = this._loop;
    this._abort?.abort();
    this._abort = null;
    this._loop = null;
    if (loop) await loop;
  }

  get running(): boolean {
    return this._loop !== null;
  }

  /**
   * One sampling cycle: observe, record, resize.
   * @returns The new snapshot, or `null` when sampling failed or was stopped.
   */
  async sampleOnce(signal?: AbortSignal): Promise<ResourceSnapshot | null> {
    try {
      const cpuPercent = await this._probe.cpuPercent(this._sampleWindowMs, signal);
      if (signal?.aborted) return null;

      const snapshot = this._record(cpuPercent, this._probe.memoryPercent());

      this._emit({
        type: "sample",
        timestamp: snapshot.timestamp,
        cpuPercent: snapshot.cpuPercent,
        memoryPercent: snapshot.memoryPercent,
      });

      this._target.adjust(snapshot.cpuPercent, snapshot.memoryPercent);
      return snapshot;
    } catch (error) {
      this._emit({
        type: "sample-error",
        timestamp: now(),
        error,
        message: `Resource monitor error: ${errorMessage(error)}`,
      });
      return null;
    }
  }

  /** Latest snapshot, or an instant reading if nothing was sampled yet. */
  async current(): Promise<ResourceSnapshot> {
    const latest = this.latest;
    if (latest) return latest;
    const cpuPercent = await this._probe.cpuPercent(0);
    return this._snapshot(cpuPercent, this._probe.memoryPercent());
  }

  get latest(): ResourceSnapshot | null {
    return this._history.at(-1) ?? null;
  }

  get history(): ResourceSnapshot[] {
    return [...this._history];
  }

  private async _run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await this.sampleOnce(signal);
      await sleep(this._intervalMs, { signal, unref: true });
    }
  }

  private _record(cpuPercent: number, memoryPercent: number): ResourceSnapshot {
    const snapshot = this._snapshot(cpuPercent, memoryPercent);
    this._history.push(snapshot);
    if (this._history.length > HISTORY_CAPACITY) {
      this._history = this._history.slice(-HISTORY_RETAIN);
    }
    return snapshot;
  }

  private _snapshot(cpuPercent: number, memoryPercent: number): ResourceSnapshot {
    return Object.freeze({
      cpuPercent,
      memoryPercent,
      activeWorkers: this._target.activeCount,
      pendingQueueDepth: this._target.pendingCount,
      timestamp: now(),
    });
  }
}
