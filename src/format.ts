import type {
  ThrottleEvent,
  ThrottleEventHandler,
  ThrottleEventType,
  ThrottleSnapshot,
} from "./types.js";

/**
 * Format a throttle event as a single human-readable log line.
 *
 * Does not log by itself — just returns a string.
 *
 * Example output:
 * ```
 * [sample] cpu=42.5% mem=61.0%
 * [resize] workers=6->4 cpu=91.0% mem=40.0% — high resource usage
 * [task-error] task=task-3f2a — connect ECONNREFUSED
 * [retry] attempt=1 delayMs=2000 — timeout
 * [retune] host=example.test rate=10->11 success=95.0%
 * ```
 */
export function formatEvent(event: ThrottleEvent): string {
  const parts: string[] = [`[${event.type}]`];

  if (event.host) parts.push(`host=${event.host}`);
  if (event.taskId) parts.push(`task=${event.taskId.slice(0, 9)}`);

  switch (event.type) {
    case "sample":
      pushLoad(parts, event);
      break;
    case "resize":
      if (event.workers) parts.push(`workers=${event.workers.from}->${event.workers.to}`);
      pushLoad(parts, event);
      break;
    case "retry":
      if (event.attempt !== undefined) parts.push(`attempt=${event.attempt}`);
      if (event.delayMs !== undefined) parts.push(`delayMs=${event.delayMs}`);
      break;
    case "retune":
      if (event.rate) parts.push(`rate=${event.rate.from}->${event.rate.to}`);
      if (event.successRate !== undefined) parts.push(`success=${percent(event.successRate * 100)}`);
      break;
    case "sample-error":
    case "task-error":
    case "shutdown":
      break;
  }

  if (event.message) parts.push(`— ${event.message}`);

  return parts.join(" ");
}

/**
 * Format a context snapshot as a compact human-readable string.
 *
 * ```ts
 * console.log(formatSnapshot(ctx.snapshot()));
 * // workers=4/2..15 active=4 pending=12 gen=3 rate=11/1..50 hosts=7 cpu=38.0% mem=52.1%
 * ```
 */
export function formatSnapshot(snap: ThrottleSnapshot): string {
  const parts: string[] = [
    `workers=${snap.pool.currentWorkers}/${snap.pool.minWorkers}..${snap.pool.maxWorkers}`,
    `active=${snap.pool.active}`,
    `pending=${snap.pool.pending}`,
    `gen=${snap.pool.generation}`,
    `rate=${snap.rate.current}/${snap.rate.min}..${snap.rate.max}`,
    `hosts=${snap.rate.hosts}`,
  ];

  if (snap.resources) {
    parts.push(`cpu=${percent(snap.resources.cpuPercent)}`);
    parts.push(`mem=${percent(snap.resources.memoryPercent)}`);
  }
  if (snap.closed) parts.push("closed");

  return parts.join(" ");
}

/** Leveled text sink. `console` satisfies it. */
export interface LogSink {
  info(message: string): void;
  error(message: string): void;
}

const ERROR_EVENTS: ReadonlySet<ThrottleEventType> = new Set<ThrottleEventType>([
  "sample-error",
  "task-error",
]);

/**
 * Route formatted events to a leveled logger: failures to `error`, everything
 * else to `info`. Pass `include` to log only some event types.
 *
 * ```ts
 * const ctx = createThrottleContext({ onEvent: createLogHandler(console) });
 * ```
 */
export function createLogHandler(
  logger: LogSink = console,
  include?: ReadonlyArray<ThrottleEventType>,
): ThrottleEventHandler {
  const allowed = include ? new Set(include) : null;
  return (event) => {
    if (allowed && !allowed.has(event.type)) return;
    const line = formatEvent(event);
    if (ERROR_EVENTS.has(event.type)) {
      logger.error(line);
    } else {
      logger.info(line);
    }
  };
}

function pushLoad(parts: string[], event: ThrottleEvent): void {
  if (event.cpuPercent !== undefined) parts.push(`cpu=${percent(event.cpuPercent)}`);
  if (event.memoryPercent !== undefined) parts.push(`mem=${percent(event.memoryPercent)}`);
}

function percent(value: number): string {
  return `${value.toFixed(1)}%`;
}
