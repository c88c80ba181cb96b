import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryDedupCache } from '../../src/application/dedup-cache.js';

// ── Helpers ──────────────────────────────────────────────────

const T0 = new Date('2026-03-02T09:00:00Z').getTime();

describe('InMemoryDedupCache', () => {
  let now: number;
  let cache: InMemoryDedupCache;

  beforeEach(() => {
    now = T0;
    cache = new InMemoryDedupCache(() => now);
  });

  it('reports the memory backend', () => {
    expect(cache.backend).toBe('memory');
  });

  it('grants the first claim and refuses the second within the window', async () => {
    expect(await cache.claim('fp-1', 1000)).toEqual(expect.any(String));
    expect(await cache.claim('fp-1', 1000)).toBeNull();
  });

  it('tracks fingerprints independently', async () => {
    expect(await cache.claim('fp-1', 1000)).not.toBeNull();
    expect(await cache.claim('fp-2', 1000)).not.toBeNull();
  });

  it('treats an entry as expired exactly at expiresAt', async () => {
    await cache.claim('fp-1', 1000);

    now = T0 + 999;
    expect(cache.isLive('fp-1')).toBe(true);

    now = T0 + 1000;
    expect(cache.isLive('fp-1')).toBe(false);
    expect(await cache.claim('fp-1', 1000)).not.toBeNull();
  });

  it('release makes the fingerprint claimable again', async () => {
    const token = await cache.claim('fp-1', 1000);
    await cache.release('fp-1', token ?? '');
    expect(await cache.claim('fp-1', 1000)).not.toBeNull();
  });

  it('release with a stale token leaves a newer claim in place', async () => {
    const stale = await cache.claim('fp-1', 1000);
    now = T0 + 1000;
    const current = await cache.claim('fp-1', 1000);

    await cache.release('fp-1', stale ?? '');

    expect(current).not.toBe(stale);
    expect(cache.isLive('fp-1')).toBe(true);
    now = T0 + 1500;
    expect(await cache.claim('fp-1', 1000)).toBeNull();
  });

  it('release of an unknown fingerprint is a no-op', async () => {
    await cache.release('never-seen', 'token');
    expect(cache.size).toBe(0);
  });

  it('sweep drops only expired entries', async () => {
    await cache.claim('short', 100);
    await cache.claim('long', 10_000);

    now = T0 + 500;
    expect(cache.sweep()).toBe(1);
    expect(cache.size).toBe(1);
    expect(cache.isLive('long')).toBe(true);
  });

  it('grants exactly one of many concurrent claims', async () => {
    const results = await Promise.all(
      Array.from({ length: 20 }, () => cache.claim('fp-burst', 1000)),
    );
    expect(results.filter((r) => r !== null)).toHaveLength(1);
  });
});
