export { redisPlugin, RedisDedupCache } from './redis/index.js';
export type { RedisPluginOptions } from './redis/index.js';
export {
  createDbClient,
  ensureSchema,
  insertRevision,
  findRevision,
  listRevisions,
  releaseRevisions,
  dbPlugin,
} from './db/index.js';
export type { Database, Sql, RevisionRow, ReleaseRef, InsertRevisionInput, DbPluginOptions } from './db/index.js';
export { HttpInvestigator } from './investigator/index.js';
export type { HttpInvestigatorConfig } from './investigator/index.js';
export { loadIntakeConfig, DEFAULT_CONFIG } from './config/index.js';
export type { IntakeConfig, DedupBackend } from './config/index.js';
export { intakePlugin } from './intake/index.js';
export type { IntakePluginOptions } from './intake/index.js';
