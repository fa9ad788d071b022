/**
 * Snapshot Cache
 *
 * Holds one frozen snapshot of all forecast records per backend id, loaded
 * on first use and refreshed after CACHE_TTL_SECONDS. This is the only
 * shared mutable state on the request path.
 *
 * Concurrent misses for the same backend are coalesced onto a single
 * in-flight load. A failed load is not cached; every waiter receives the
 * error and the next call retries.
 */

import { LRUCache } from 'lru-cache';
import type { ForecastRecord } from '@shared/forecast-types';

export type Snapshot = ReadonlyArray<Readonly<ForecastRecord>>;

export interface CacheEntry {
  readonly records: Snapshot;
  /** Epoch ms when the load finished */
  readonly loadedAt: number;
  /** Increases with every entry this cache stores, across all keys */
  readonly generation: number;
}

export interface SnapshotCacheOptions {
  ttlMs: number;
  maxEntries: number;
  /** Injected for tests; defaults to Date.now */
  now?: () => number;
}

function freezeSnapshot(records: readonly ForecastRecord[]): Snapshot {
  for (const record of records) {
    Object.freeze(record.metrics);
    Object.freeze(record);
  }
  return Object.freeze([...records]);
}

export class SnapshotCache {
  private readonly entries: LRUCache<string, CacheEntry>;
  private readonly inFlight = new Map<string, Promise<CacheEntry>>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private generation = 0;

  constructor(options: SnapshotCacheOptions) {
    this.entries = new LRUCache<string, CacheEntry>({ max: options.maxEntries });
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  /**
   * Return the live entry for `backendId`, loading it with `loader` when it is
   * missing or expired.
   */
  async getOrLoad(
    backendId: string,
    loader: () => Promise<readonly ForecastRecord[]>
  ): Promise<CacheEntry> {
    const cached = this.peek(backendId);
    if (cached) return cached;

    // No await between get() and set(): the first caller registers the
    // in-flight load before any concurrent caller reaches this check.
    const inflight = this.inFlight.get(backendId);
    if (inflight !== undefined) return inflight;

    const promise: Promise<CacheEntry> = loader()
      .then((records) => {
        const entry: CacheEntry = Object.freeze({
          records: freezeSnapshot(records),
          loadedAt: this.now(),
          generation: ++this.generation,
        });
        // clear() drops the in-flight registration; a load it superseded
        // still answers its own callers but must not become the live entry.
        if (this.inFlight.get(backendId) === promise) {
          this.entries.set(backendId, entry);
        }
        return entry;
      })
      .finally(() => {
        if (this.inFlight.get(backendId) === promise) {
          this.inFlight.delete(backendId);
        }
      });

    this.inFlight.set(backendId, promise);
    return promise;
  }

  /** Live (unexpired) entry for `backendId`, without loading. */
  peek(backendId: string): CacheEntry | undefined {
    const entry = this.entries.get(backendId);
    if (!entry) return undefined;
    if (this.now() - entry.loadedAt >= this.ttlMs) {
      this.entries.delete(backendId);
      return undefined;
    }
    return entry;
  }

  /** Drop one backend's entry, or every entry when no id is given. */
  clear(backendId?: string): void {
    if (backendId === undefined) {
      this.entries.clear();
      this.inFlight.clear();
      return;
    }
    this.entries.delete(backendId);
    this.inFlight.delete(backendId);
  }

  get size(): number {
    return this.entries.size;
  }
}
