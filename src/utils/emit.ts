import type { ThrottleEvent, ThrottleEventHandler } from "../types.js";

export type Emit = (event: ThrottleEvent) => void;

/** Wrap a user-supplied handler so a throwing handler can't break the caller. */
export function createEmitter(handler?: ThrottleEventHandler): Emit {
  if (!handler) return () => undefined;
  return (event) => {
    try {
      handler(event);
    } catch {
      // A logging callback must not take down sampling or scheduling.
    }
  };
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
