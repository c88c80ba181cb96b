export { releaseRevisions } from './schema.js';
export { createDbClient } from './client.js';
export { ensureSchema } from './bootstrap.js';
export type { Database, Sql, DbClientOptions } from './client.js';
export { insertRevision, findRevision, listRevisions } from './revision-repository.js';
export type { RevisionRow, ReleaseRef, InsertRevisionInput } from './revision-repository.js';
export { default as dbPlugin } from './db-plugin.js';
export type { DbPluginOptions } from './db-plugin.js';
