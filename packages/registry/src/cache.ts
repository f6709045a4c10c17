import type { TrialTable } from "./types.js";

export const DEFAULT_CACHE_TTL_MS = 60 * 60 * 1000;

interface CacheEntry<V> {
  value: V;
  insertedAt: number;
}

export interface TtlCacheOptions {
  ttlMs?: number;
  now?: () => number;
}

/**
 * Wall-clock TTL cache. Stale entries are dropped when looked up; there is no
 * explicit invalidation.
 */
export class TtlCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  readonly ttlMs: number;
  private readonly now: () => number;

  constructor({ ttlMs = DEFAULT_CACHE_TTL_MS, now = Date.now }: TtlCacheOptions = {}) {
    if (!(ttlMs >= 0)) throw new RangeError(`ttlMs must be >= 0, got ${ttlMs}`);
    this.ttlMs = ttlMs;
    this.now = now;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.now() - entry.insertedAt >= this.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  /** Also sweeps every expired entry, so keys that are never read again do not pile up. */
  set(key: string, value: V): void {
    const now = this.now();
    for (const [k, entry] of this.entries) {
      if (now - entry.insertedAt >= this.ttlMs) this.entries.delete(k);
    }
    this.entries.set(key, { value, insertedAt: now });
  }

  get size(): number {
    return this.entries.size;
  }
}

export type TrialsFetcher = (condition: string, maxRecords: number) => Promise<TrialTable>;

export function cacheKey(condition: string, maxRecords: number): string {
  return JSON.stringify([condition, maxRecords]);
}

/**
 * Memoize `fetcher` by (condition, maxRecords). Concurrent callers for a key
 * already being fetched share one request; failures are not stored.
 */
export function createCachedFetch(
  fetcher: TrialsFetcher,
  cache: TtlCache<TrialTable> = new TtlCache<TrialTable>()
): TrialsFetcher {
  const inflight = new Map<string, Promise<TrialTable>>();

  return async (condition, maxRecords) => {
    const key = cacheKey(condition, maxRecords);
    const hit = cache.get(key);
    if (hit !== undefined) return hit;

    const pending = inflight.get(key);
    if (pending) return pending;

    const request = fetcher(condition, maxRecords)
      .then((table) => {
        cache.set(key, table);
        return table;
      })
      .finally(() => {
        inflight.delete(key);
      });
    inflight.set(key, request);
    return request;
  };
}
