import Fastify from 'fastify';
import { pino } from 'pino';

import {
  redisPlugin,
  dbPlugin,
  intakePlugin,
  loadIntakeConfig,
} from './infrastructure/index.js';

import {
  webhookRoutes,
  evidenceRoutes,
  revisionRoutes,
} from './interfaces/http/index.js';

const LOG_LEVEL = process.env['LOG_LEVEL'] ?? 'info';

// Fatal startup errors may occur before Fastify's logger exists.
const log = pino({ level: LOG_LEVEL });

/**
 * Bootstrap Fastify server.
 *
 * Order:
 * 1) Configuration
 * 2) Infrastructure plugins (redis and db only when configured)
 * 3) HTTP routes
 * 4) Shutdown signals
 * 5) listen()
 */
async function main(): Promise<void> {

  const fastify = Fastify({
    logger: {
      level: LOG_LEVEL,
    },
  });

  // --------------------------------------------------
  // Configuration
  // --------------------------------------------------

  const config = loadIntakeConfig(process.env['INTAKE_CONFIG']);
  fastify.log.info({ config }, 'Intake config loaded');

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  if (config.dedup.backend === 'redis') {
    await fastify.register(redisPlugin, {
      redisUrl: process.env['REDIS_URL'] ?? 'redis://localhost:6379',
    });
  }

  await fastify.register(intakePlugin, { config });

  const databaseUrl = process.env['DATABASE_URL'];
  if (databaseUrl !== undefined && databaseUrl !== '') {
    await fastify.register(dbPlugin, { databaseUrl });
  } else {
    fastify.log.warn('DATABASE_URL not set, revision store disabled');
  }

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(webhookRoutes);
  await fastify.register(evidenceRoutes);
  if (fastify.hasDecorator('db')) {
    await fastify.register(revisionRoutes);
  }

  // --------------------------------------------------
  // Shutdown
  // --------------------------------------------------

  const shutdown = (signal: NodeJS.Signals): void => {
    fastify.log.info({ signal }, 'Shutting down');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  const host = process.env['HOST'] ?? '0.0.0.0';
  const port = Number(process.env['PORT'] ?? 8080);

  await fastify.listen({
    host,
    port,
  });
}

main().catch((err: unknown) => {

  log.fatal({ err }, 'Failed to start server');

  process.exit(1);

});
