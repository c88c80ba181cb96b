import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import type { BaseLogger } from 'pino';
import * as schema from './schema.js';

export interface DbClientOptions {
  /** Pool size. The revision store sees little traffic. */
  maxConnections?: number;
  /** Receives server NOTICE messages, e.g. from the bootstrap DDL. */
  log?: BaseLogger;
}

/**
 * Creates a Drizzle client backed by postgres.js.
 *
 * Returns the raw `sql` connection (lifecycle and bootstrap DDL) and the
 * typed `db` instance (revision queries).
 */
export function createDbClient(databaseUrl: string, options: DbClientOptions = {}) {
  const { log } = options;

  const sql = postgres(databaseUrl, {
    max: options.maxConnections ?? 5,
    idle_timeout: 20,
    connect_timeout: 10,
    connection: { application_name: 'evidence-pipeline' },
    onnotice: (notice) => {
      log?.debug({ code: notice['code'], notice: notice['message'] }, 'Postgres notice');
    },
  });

  const db = drizzle(sql, { schema });

  return { sql, db };
}

export type Database = ReturnType<typeof createDbClient>['db'];
export type Sql = ReturnType<typeof createDbClient>['sql'];
