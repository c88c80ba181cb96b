import { randomUUID } from 'node:crypto';
import { and, desc, eq } from 'drizzle-orm';
import type { Database } from './client.js';
import { releaseRevisions } from './schema.js';

/** Row shape returned by revision queries. */
export type RevisionRow = typeof releaseRevisions.$inferSelect;

export interface ReleaseRef {
  namespace: string;
  release: string;
}

/** Fields accepted when recording a revision (server assigns id + recorded_at). */
export interface InsertRevisionInput extends ReleaseRef {
  revision: number;
  chart?: string | undefined;
  app_version?: string | undefined;
  status?: string | undefined;
  config_values: Record<string, unknown>;
}

/**
 * Inserts a revision snapshot idempotently.
 *
 * Returns true if a row was inserted, false if that revision was already
 * recorded (snapshots are immutable once captured).
 */
export async function insertRevision(db: Database, input: InsertRevisionInput): Promise<boolean> {
  const inserted = await db
    .insert(releaseRevisions)
    .values({
      id: randomUUID(),
      namespace: input.namespace,
      release: input.release,
      revision: input.revision,
      chart: input.chart ?? null,
      app_version: input.app_version ?? null,
      status: input.status ?? null,
      config_values: input.config_values,
    })
    .onConflictDoNothing()
    .returning({ id: releaseRevisions.id });

  return inserted.length > 0;
}

export async function findRevision(
  db: Database,
  ref: ReleaseRef,
  revision: number,
): Promise<RevisionRow | undefined> {
  const rows = await db
    .select()
    .from(releaseRevisions)
    .where(and(
      eq(releaseRevisions.namespace, ref.namespace),
      eq(releaseRevisions.release, ref.release),
      eq(releaseRevisions.revision, revision),
    ))
    .limit(1);
  return rows[0];
}

/** Newest revision first. */
export async function listRevisions(db: Database, ref: ReleaseRef, limit: number): Promise<RevisionRow[]> {
  return db
    .select()
    .from(releaseRevisions)
    .where(and(
      eq(releaseRevisions.namespace, ref.namespace),
      eq(releaseRevisions.release, ref.release),
    ))
    .orderBy(desc(releaseRevisions.revision))
    .limit(limit);
}
