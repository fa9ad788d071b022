import { describe, it, expect, vi } from 'vitest';
import type { ForecastRecord } from '@shared/forecast-types';
import { SnapshotCache } from '../snapshot-cache';
import { makeRecord } from './helpers/forecast-fixtures';

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (err: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('SnapshotCache', () => {
  it('should coalesce concurrent misses onto one load', async () => {
    const cache = new SnapshotCache({ ttlMs: 60_000, maxEntries: 4 });
    const pending = deferred<ForecastRecord[]>();
    const loader = vi.fn(() => pending.promise);

    const calls = Array.from({ length: 5 }, () => cache.getOrLoad('b1', loader));
    pending.resolve([makeRecord()]);
    const entries = await Promise.all(calls);

    expect(loader).toHaveBeenCalledTimes(1);
    for (const entry of entries) expect(entry).toBe(entries[0]);
    expect(entries[0].records).toHaveLength(1);
  });

  it('should serve later calls from the cache', async () => {
    const cache = new SnapshotCache({ ttlMs: 60_000, maxEntries: 4 });
    const loader = vi.fn(async () => [makeRecord()]);
    const first = await cache.getOrLoad('b1', loader);
    const second = await cache.getOrLoad('b1', loader);
    expect(second).toBe(first);
    expect(loader).toHaveBeenCalledTimes(1);
  });

  it('should not cache a failed load and rethrow to every waiter', async () => {
    const cache = new SnapshotCache({ ttlMs: 60_000, maxEntries: 4 });
    const pending = deferred<ForecastRecord[]>();
    const a = cache.getOrLoad('b1', () => pending.promise);
    const b = cache.getOrLoad('b1', () => pending.promise);
    pending.reject(new Error('disk on fire'));

    await expect(a).rejects.toThrow('disk on fire');
    await expect(b).rejects.toThrow('disk on fire');
    expect(cache.peek('b1')).toBeUndefined();

    const entry = await cache.getOrLoad('b1', async () => [makeRecord()]);
    expect(entry.records).toHaveLength(1);
  });

  it('should reload once the TTL has elapsed', async () => {
    let now = 1_000;
    const cache = new SnapshotCache({ ttlMs: 500, maxEntries: 4, now: () => now });
    const loader = vi.fn(async () => [makeRecord()]);

    const first = await cache.getOrLoad('b1', loader);
    now += 499;
    expect(await cache.getOrLoad('b1', loader)).toBe(first);
    now += 1;
    const second = await cache.getOrLoad('b1', loader);

    expect(loader).toHaveBeenCalledTimes(2);
    expect(second.generation).toBeGreaterThan(first.generation);
  });

  it('should drop entries on clear', async () => {
    const cache = new SnapshotCache({ ttlMs: 60_000, maxEntries: 4 });
    await cache.getOrLoad('b1', async () => [makeRecord()]);
    await cache.getOrLoad('b2', async () => [makeRecord()]);

    cache.clear('b1');
    expect(cache.peek('b1')).toBeUndefined();
    expect(cache.peek('b2')).toBeDefined();

    cache.clear();
    expect(cache.size).toBe(0);
  });

  it('should not let a load superseded by clear repopulate the cache', async () => {
    const cache = new SnapshotCache({ ttlMs: 60_000, maxEntries: 4 });
    const stale = deferred<ForecastRecord[]>();
    const staleCall = cache.getOrLoad('b1', () => stale.promise);

    cache.clear('b1');
    const fresh = await cache.getOrLoad('b1', async () => [makeRecord({ grid_id: 2 })]);

    stale.resolve([makeRecord({ grid_id: 1 })]);
    const staleEntry = await staleCall;

    expect(staleEntry.records[0].grid_id).toBe(1);
    expect(cache.peek('b1')).toBe(fresh);
  });

  it('should evict the least recently used backend beyond maxEntries', async () => {
    const cache = new SnapshotCache({ ttlMs: 60_000, maxEntries: 2 });
    await cache.getOrLoad('b1', async () => []);
    await cache.getOrLoad('b2', async () => []);
    cache.peek('b1');
    await cache.getOrLoad('b3', async () => []);

    expect(cache.peek('b1')).toBeDefined();
    expect(cache.peek('b2')).toBeUndefined();
    expect(cache.peek('b3')).toBeDefined();
  });

  it('should freeze snapshots', async () => {
    const cache = new SnapshotCache({ ttlMs: 60_000, maxEntries: 4 });
    const entry = await cache.getOrLoad('b1', async () => [makeRecord()]);
    expect(Object.isFrozen(entry.records)).toBe(true);
    expect(Object.isFrozen(entry.records[0])).toBe(true);
    expect(Object.isFrozen(entry.records[0].metrics)).toBe(true);
  });
});
