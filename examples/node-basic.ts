/**
 * Basic Node.js example
 *
 * Probes a handful of simulated hosts through one throttle context: a
 * resource-sized pool, per-host pacing, and logged events.
 * Run: npx tsx examples/node-basic.ts
 */

import {
  createThrottleContext,
  createLogHandler,
  createStatsCollector,
  formatSnapshot,
  presets,
} from "../src/index.js";

const stats = createStatsCollector();
const log = createLogHandler(console, ["resize", "retune", "task-error", "shutdown"]);

const ctx = createThrottleContext({
  ...presets.standard(),
  sampler: { intervalMs: 1_000, sampleWindowMs: 250 },
  onEvent: (e) => {
    stats.handler(e);
    log(e);
  },
});

const hosts = ["alpha.test", "beta.test", "gamma.test"];

async function simulateProbe(host: string, path: string): Promise<number> {
  const { delayMs, rateWaitMs } = await ctx.waitBeforeRequest(host);
  const latency = 50 + Math.random() * 200;
  await new Promise((r) => setTimeout(r, latency));

  // Roughly one request in ten answers 503
  const status = Math.random() < 0.1 ? 503 : 200;
  ctx.reportResult(host, status < 500);
  if (status >= 500) {
    throw new Error(`${host}${path} returned ${status}`);
  }
  console.log(
    `${host}${path} ${status} (delay ${Math.round(delayMs)}ms, rate wait ${rateWaitMs}ms)`,
  );
  return status;
}

async function main() {
  console.log("Basic Example");
  console.log("=============\n");

  const targets = hosts.flatMap((host) =>
    ["/", "/login", "/admin", "/robots.txt"].map((path) => ({ host, path })),
  );

  const statuses = await ctx.map(({ host, path }) => simulateProbe(host, path), targets);
  console.log(`\n${statuses.filter((s) => s !== null).length}/${targets.length} probes answered.`);

  const tuned = await ctx.optimalThreadCount();
  console.log(`Suggested thread count for this machine: ${tuned}`);
  console.log(formatSnapshot(ctx.snapshot()));

  await ctx.shutdown();
  console.log(stats.snapshot());
}

main().catch(console.error);
