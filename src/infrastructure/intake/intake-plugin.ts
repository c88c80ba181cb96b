import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { AlertIntake } from '../../application/alert-intake.js';
import { InMemoryDedupCache } from '../../application/dedup-cache.js';
import type { DedupCache } from '../../application/dedup-cache.js';
import type { IntakeConfig } from '../config/index.js';
import { RedisDedupCache } from '../redis/index.js';
import { HttpInvestigator } from '../investigator/index.js';

export interface IntakePluginOptions {
  config: IntakeConfig;
}

/**
 * Fastify plugin that wires the alert intake gate.
 *
 * - Picks the dedup backend: shared Redis (requires the `redis` plugin) or
 *   the in-process cache with a periodic sweep of expired entries.
 * - Decorates `fastify.intake` for the webhook routes.
 */
async function intakePlugin(fastify: FastifyInstance, opts: IntakePluginOptions): Promise<void> {
  const { dedup, investigator } = opts.config;

  let cache: DedupCache;
  let sweepTimer: NodeJS.Timeout | null = null;

  if (dedup.backend === 'redis') {
    if (!fastify.hasDecorator('redis')) {
      throw new Error('dedup.backend is "redis" but the redis plugin is not registered');
    }
    cache = new RedisDedupCache(fastify.redis);
  } else {
    const memory = new InMemoryDedupCache();
    cache = memory;

    if (dedup.sweep_interval_seconds > 0) {
      sweepTimer = setInterval(() => {
        const removed = memory.sweep();
        if (removed > 0) {
          fastify.log.debug({ removed, remaining: memory.size }, 'Swept expired dedup entries');
        }
      }, dedup.sweep_interval_seconds * 1000);
      sweepTimer.unref();
    }
  }

  const intake = new AlertIntake(
    {
      cache,
      investigator: new HttpInvestigator(investigator, fastify.log),
      log: fastify.log,
    },
    dedup.ttl_seconds * 1000,
  );

  fastify.log.info(
    { backend: cache.backend, ttl_seconds: dedup.ttl_seconds, investigator_url: investigator.url },
    'Alert intake ready',
  );

  fastify.decorate('intake', intake);

  fastify.addHook('onClose', async () => {
    if (sweepTimer !== null) clearInterval(sweepTimer);
  });
}

export default fp(intakePlugin, {
  name: 'intake',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    intake: AlertIntake;
  }
}
