import { randomUUID } from 'node:crypto';
import type { Redis } from 'ioredis';
import type { DedupCache } from '../../application/dedup-cache.js';

const KEY_PREFIX = 'alert_dedup:';

/** Deletes KEYS[1] only while it still holds ARGV[1]. */
const RELEASE_SCRIPT = `
if redis.call('get', KEYS[1]) == ARGV[1] then
  return redis.call('del', KEYS[1])
end
return 0
`;

/**
 * Dedup cache shared by every intake instance through Redis.
 *
 * `SET key token PX ttl NX` is the atomic check-and-insert: Redis applies
 * it as one command, so across instances exactly one claim per live window
 * succeeds. Expiry is left to Redis. Release is a compare-and-delete script
 * on the claim token.
 */
export class RedisDedupCache implements DedupCache {
  readonly backend = 'redis';
  private readonly redis: Redis;

  constructor(redis: Redis) {
    this.redis = redis;
  }

  async claim(fingerprint: string, ttlMs: number): Promise<string | null> {
    const token = randomUUID();
    const reply = await this.redis.set(
      KEY_PREFIX + fingerprint,
      token,
      'PX',
      Math.max(1, Math.ceil(ttlMs)),
      'NX',
    );
    return reply === 'OK' ? token : null;
  }

  async release(fingerprint: string, token: string): Promise<void> {
    await this.redis.eval(RELEASE_SCRIPT, 1, KEY_PREFIX + fingerprint, token);
  }
}
