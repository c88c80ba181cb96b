import type { ChangeRecord } from '../domain/index.js';
import type { Database, ReleaseRef, RevisionRow } from '../infrastructure/db/index.js';
import { findRevision, insertRevision, listRevisions } from '../infrastructure/db/index.js';
import type { RecordRevisionInput } from './revision-schema.js';
import { diffRevisions } from './revision-diff.js';

export type { RevisionRow, ReleaseRef };

export interface RevisionSummary {
  revision: number;
  chart: string | null;
  app_version: string | null;
  status: string | null;
  recorded_at: string;
}

export interface RevisionComparison {
  namespace: string;
  release: string;
  from: number;
  to: number;
  changes: ChangeRecord[];
}

/**
 * Record a revision snapshot.
 * Returns true if stored, false if that revision already existed.
 */
export async function recordRevision(
  db: Database,
  ref: ReleaseRef,
  input: RecordRevisionInput,
): Promise<boolean> {
  return insertRevision(db, {
    namespace: ref.namespace,
    release: ref.release,
    revision: input.revision,
    chart: input.chart,
    app_version: input.app_version,
    status: input.status,
    config_values: input.values,
  });
}

/** Revision history, newest first, without the values payload. */
export async function getRevisionHistory(
  db: Database,
  ref: ReleaseRef,
  limit: number,
): Promise<RevisionSummary[]> {
  const rows = await listRevisions(db, ref, limit);
  return rows.map((row) => ({
    revision: row.revision,
    chart: row.chart,
    app_version: row.app_version,
    status: row.status,
    recorded_at: row.recorded_at.toISOString(),
  }));
}

/**
 * Diff the values of two stored revisions (`from` is the old side).
 * Returns null if either revision is missing.
 *
 * @throws DiffInputError when a stored snapshot is not a configuration tree.
 */
export async function compareRevisions(
  db: Database,
  ref: ReleaseRef,
  from: number,
  to: number,
): Promise<RevisionComparison | null> {
  const [older, newer] = await Promise.all([
    findRevision(db, ref, from),
    findRevision(db, ref, to),
  ]);

  if (older === undefined || newer === undefined) return null;

  return {
    namespace: ref.namespace,
    release: ref.release,
    from,
    to,
    changes: diffRevisions(older.config_values, newer.config_values),
  };
}
