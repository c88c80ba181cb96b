import { pgTable, uuid, varchar, integer, timestamp, jsonb, index, uniqueIndex } from 'drizzle-orm/pg-core';

/**
 * Drizzle schema for the `release_revisions` table.
 *
 * One row per captured revision of a deployed release. `config_values` holds
 * the revision's configuration tree as JSONB. The unique index on
 * (namespace, release, revision) gives idempotent inserts via
 * ON CONFLICT DO NOTHING.
 */
export const releaseRevisions = pgTable('release_revisions', {
  id: uuid('id').primaryKey(),
  namespace: varchar('namespace', { length: 253 }).notNull(),
  release: varchar('release', { length: 253 }).notNull(),
  revision: integer('revision').notNull(),
  chart: varchar('chart', { length: 255 }),
  app_version: varchar('app_version', { length: 255 }),
  status: varchar('status', { length: 64 }),
  config_values: jsonb('config_values').notNull().default({}),
  recorded_at: timestamp('recorded_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  uniqueIndex('uq_release_revisions_identity').on(table.namespace, table.release, table.revision),
  index('idx_release_revisions_recorded_at').on(table.recorded_at),
]);
