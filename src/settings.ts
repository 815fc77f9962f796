/**
 * Minimal key/value settings seam. The scanner's own config store implements
 * this; `MemorySettingsStore` covers tests and standalone use.
 */
export interface SettingsStore {
  get<T>(key: string, fallback: T): T;
  set(key: string, value: unknown): void;
}

/** Setting read and rewritten by `tuneThreadSetting`. */
export const THREAD_COUNT_KEY = "THREADNUM";
export const DEFAULT_THREAD_COUNT = 10;

export class MemorySettingsStore implements SettingsStore {
  private readonly _values = new Map<string, unknown>();

  constructor(initial?: Record<string, unknown>) {
    if (initial) {
      for (const [key, value] of Object.entries(initial)) {
        this._values.set(key, value);
      }
    }
  }

  /**
   * Stored value, or `fallback` when the key is missing or holds a value of a
   * different primitive type than the fallback.
   */
  get<T>(key: string, fallback: T): T {
    if (!this._values.has(key)) return fallback;
    const value = this._values.get(key);
    return isSameKind(value, fallback) ? value : fallback;
  }

  set(key: string, value: unknown): void {
    this._values.set(key, value);
  }

  has(key: string): boolean {
    return this._values.has(key);
  }

  delete(key: string): boolean {
    return this._values.delete(key);
  }
}

function isSameKind<T>(value: unknown, fallback: T): value is T {
  if (fallback === null || fallback === undefined) return true;
  return typeof value === typeof fallback;
}
