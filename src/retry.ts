import { sleep } from "./utils/time.js";

export interface BackoffOptions {
  /** Retries after the first attempt (default 3, so 4 attempts in total). */
  maxRetries?: number;
  /** Base pause in ms; attempt n waits `backoffFactorMs * 2^n` (default 1_000). */
  backoffFactorMs?: number;
  /** Called after a failed attempt, before the backoff sleep. */
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

/** Pause after the zero-indexed failed `attempt`. */
export function backoffDelay(attempt: number, backoffFactorMs: number): number {
  return backoffFactorMs * 2 ** attempt;
}

/**
 * Run with exponential backoff between attempts.
 *
 * Resolves with the first successful result. After the last attempt fails,
 * rejects with that attempt's error unchanged.
 *
 * ```ts
 * // waits 1s, 2s, 4s between the four attempts
 * const body = await retryWithBackoff(() => probe(url), { maxRetries: 3 });
 * ```
 */
export async function retryWithBackoff<T>(
  run: () => T | Promise<T>,
  options?: BackoffOptions,
): Promise<T> {
  const maxRetries = options?.maxRetries ?? 3;
  const backoffFactorMs = options?.backoffFactorMs ?? 1_000;

  if (!Number.isInteger(maxRetries) || maxRetries < 0) {
    throw new Error(`maxRetries (${maxRetries}) must be a non-negative integer`);
  }
  if (!Number.isFinite(backoffFactorMs) || backoffFactorMs < 0) {
    throw new Error(`backoffFactorMs (${backoffFactorMs}) must be a non-negative number`);
  }

  for (let attempt = 0; ; attempt++) {
    try {
      return await run();
    } catch (error) {
      // Last attempt — surface the failure
      if (attempt >= maxRetries) throw error;

      const delayMs = backoffDelay(attempt, backoffFactorMs);
      options?.onRetry?.({ attempt, delayMs, error });
      await sleep(delayMs);
    }
  }
}
