import { describe, it, expect, vi } from 'vitest';
import type { Redis } from 'ioredis';
import { RedisDedupCache } from '../../src/infrastructure/redis/redis-dedup-cache.js';

/**
 * In-process stand-in for the commands the cache uses.
 * `SET … NX` only writes when the key is absent; expiry is not modelled,
 * tests drop a key from `store` to expire it. `eval` runs the release
 * script's compare-and-delete.
 */
function fakeRedis() {
  const store = new Map<string, string>();
  const set = vi.fn(async (key: string, value: string, ..._args: unknown[]) => {
    if (store.has(key)) return null;
    store.set(key, value);
    return 'OK';
  });
  const evalScript = vi.fn(async (_script: string, _numKeys: number, key: string, token: string) => {
    if (store.get(key) !== token) return 0;
    store.delete(key);
    return 1;
  });
  return { store, set, evalScript, client: { set, eval: evalScript } as unknown as Redis };
}

describe('RedisDedupCache', () => {
  it('reports the redis backend', () => {
    expect(new RedisDedupCache(fakeRedis().client).backend).toBe('redis');
  });

  it('claims with SET PX NX under the alert_dedup prefix', async () => {
    const redis = fakeRedis();
    const cache = new RedisDedupCache(redis.client);

    const token = await cache.claim('fp-1', 300_000);

    expect(token).toEqual(expect.any(String));
    expect(redis.set).toHaveBeenCalledWith('alert_dedup:fp-1', token, 'PX', 300_000, 'NX');
    expect(redis.store.get('alert_dedup:fp-1')).toBe(token);
  });

  it('refuses a second claim while the key exists', async () => {
    const cache = new RedisDedupCache(fakeRedis().client);

    await cache.claim('fp-1', 1000);
    expect(await cache.claim('fp-1', 1000)).toBeNull();
  });

  it('rounds a fractional TTL up to whole milliseconds', async () => {
    const redis = fakeRedis();
    await new RedisDedupCache(redis.client).claim('fp-1', 0.4);
    expect(redis.set).toHaveBeenCalledWith('alert_dedup:fp-1', expect.any(String), 'PX', 1, 'NX');
  });

  it('release deletes the key through a compare-and-delete script', async () => {
    const redis = fakeRedis();
    const cache = new RedisDedupCache(redis.client);

    const token = await cache.claim('fp-1', 1000);
    await cache.release('fp-1', token ?? '');

    expect(redis.evalScript).toHaveBeenCalledWith(expect.stringContaining("redis.call('del', KEYS[1])"), 1, 'alert_dedup:fp-1', token);
    expect(redis.store.has('alert_dedup:fp-1')).toBe(false);
    expect(await cache.claim('fp-1', 1000)).not.toBeNull();
  });

  it('release with a stale token leaves a newer claim in place', async () => {
    const redis = fakeRedis();
    const cache = new RedisDedupCache(redis.client);

    const stale = await cache.claim('fp-1', 1000);
    redis.store.delete('alert_dedup:fp-1');
    const current = await cache.claim('fp-1', 1000);

    await cache.release('fp-1', stale ?? '');

    expect(redis.store.get('alert_dedup:fp-1')).toBe(current);
    expect(await cache.claim('fp-1', 1000)).toBeNull();
  });

  it('grants exactly one of many concurrent claims', async () => {
    const cache = new RedisDedupCache(fakeRedis().client);
    const results = await Promise.all(Array.from({ length: 10 }, () => cache.claim('fp-burst', 1000)));
    expect(results.filter((r) => r !== null)).toHaveLength(1);
  });
});
