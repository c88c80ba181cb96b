import type { Sql } from './client.js';

/** Raw DDL applied at startup, mirroring the Drizzle schema in schema.ts. */
const BOOTSTRAP_DDL: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS release_revisions (
    id            UUID         PRIMARY KEY,
    namespace     VARCHAR(253) NOT NULL,
    release       VARCHAR(253) NOT NULL,
    revision      INTEGER      NOT NULL,
    chart         VARCHAR(255),
    app_version   VARCHAR(255),
    status        VARCHAR(64),
    config_values JSONB        NOT NULL DEFAULT '{}',
    recorded_at   TIMESTAMPTZ  NOT NULL DEFAULT NOW()
  )`,
  `CREATE UNIQUE INDEX IF NOT EXISTS uq_release_revisions_identity
    ON release_revisions (namespace, release, revision)`,
  `CREATE INDEX IF NOT EXISTS idx_release_revisions_recorded_at ON release_revisions (recorded_at)`,
];

/**
 * Creates the tables and indexes if they do not exist yet.
 *
 * In production this would be handled by drizzle-kit migrate; this keeps
 * a fresh local database usable on first start.
 */
export async function ensureSchema(sql: Sql): Promise<void> {
  for (const statement of BOOTSTRAP_DDL) {
    await sql.unsafe(statement);
  }
}
