/**
 * Shared types for hostpace adapters.
 *
 * Adapters live in separate entrypoints so bundlers can tree-shake them.
 * Core hostpace never imports from adapters.
 */

import type { ThrottleContext } from "../context.js";

/** Minimal context interface that adapters depend on. */
export interface AdapterContext {
  waitBeforeRequest: ThrottleContext["waitBeforeRequest"];
  reportResult: ThrottleContext["reportResult"];
}

export type RequestOutcome = "success" | "failure";

/**
 * Classify a request for the rate controller.
 *
 * A call that threw (whatever it threw), 429 and 5xx count against the host;
 * any other status is a normal answer (a 404 is a valid answer, not a
 * sign of overload).
 */
export function classifyOutcome(
  threw: boolean,
  statusCode?: number,
): RequestOutcome {
  if (threw) return "failure";
  if (statusCode === 429) return "failure";
  if (statusCode !== undefined && statusCode >= 500) return "failure";
  return "success";
}
