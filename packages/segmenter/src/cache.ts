/**
 * Explicit TTL cache.
 * Owned by whichever component needs it and passed in, never module state,
 * so two pipelines never see each other's entries and tests can clear it.
 */

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

/** Default time-to-live: 10 minutes */
export const DEFAULT_CACHE_TTL_MS = 10 * 60 * 1000;

export class ResultCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly ttlMs: number;

  constructor(ttlMs: number = DEFAULT_CACHE_TTL_MS) {
    this.ttlMs = ttlMs;
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    if (Date.now() > entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }

    return entry.value;
  }

  set(key: string, value: T, ttlMs: number = this.ttlMs): void {
    this.entries.set(key, {
      value,
      expiresAt: Date.now() + ttlMs,
    });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Number of stored entries, including expired ones not yet evicted.
   */
  get size(): number {
    return this.entries.size;
  }
}
