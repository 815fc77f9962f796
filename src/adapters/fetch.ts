/**
 * hostpace fetch adapter — wraps any fetch-compatible function.
 *
 * Works with the global `fetch`, `undici`, or any custom fetch.
 * Paces each call per host and reports the outcome back to the context.
 *
 * @module hostpace/adapters/fetch
 */

export type { AdapterContext, RequestOutcome } from "./types.js";

export { classifyOutcome } from "./types.js";

import type { AdapterContext, RequestOutcome } from "./types.js";
import { classifyOutcome } from "./types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Any function with the standard fetch signature. */
export type FetchFn = (
  input: string | URL | Request,
  init?: RequestInit,
) => Promise<Response>;

/** Options for `wrapFetch`. */
export interface WrapFetchOptions {
  /** Throttle context (or anything with the same pacing methods). */
  context: AdapterContext;
  /** Derive the rate-limit key from the request (default: URL host). */
  hostOf?: (input: string | URL | Request) => string;
  /** Override outcome classification (default: `classifyOutcome`). */
  classify?: (threw: boolean, statusCode?: number) => RequestOutcome;
}

// ---------------------------------------------------------------------------
// wrapFetch
// ---------------------------------------------------------------------------

/**
 * Wrap a fetch function with per-host pacing.
 *
 * Returns a function with the same signature that waits for the host's delay
 * and rate window, calls fetch, and reports success or failure.
 *
 * ```ts
 * import { createThrottleContext, presets } from "hostpace";
 * import { wrapFetch } from "hostpace/adapters/fetch";
 *
 * const ctx = createThrottleContext(presets.standard());
 * const pacedFetch = wrapFetch(fetch, { context: ctx });
 *
 * const res = await pacedFetch("https://target.example/login");
 * ```
 */
export function wrapFetch(fetchFn: FetchFn, options: WrapFetchOptions): FetchFn {
  const { context, hostOf = deriveHost, classify = classifyOutcome } = options;

  return async (input, init?) => {
    const host = hostOf(input);
    await context.waitBeforeRequest(host);

    let threw = false;
    let response: Response | undefined;

    try {
      response = await fetchFn(input, init);
      return response;
    } catch (err) {
      threw = true;
      throw err;
    } finally {
      const outcome = classify(threw, response?.status);
      context.reportResult(host, outcome === "success");
    }
  };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Derive the host (with port) from a fetch input. */
export function deriveHost(input: string | URL | Request): string {
  try {
    if (typeof input === "string") {
      return new URL(input).host;
    }
    if (input instanceof URL) {
      return input.host;
    }
    // Request object
    return new URL(input.url).host;
  } catch {
    return "default";
  }
}
