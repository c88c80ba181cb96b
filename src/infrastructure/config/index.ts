export { loadIntakeConfig, DEFAULT_CONFIG } from './intake-config.js';
export type { IntakeConfig, DedupBackend } from './intake-config.js';
