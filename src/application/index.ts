export { alertSchema, alertmanagerWebhookSchema } from './alert-schema.js';
export type { AlertInput, AlertmanagerWebhookInput } from './alert-schema.js';
export { AlertIntake, DEFAULT_DEDUP_TTL_MS, normalizeAlert, toAlertEvent } from './alert-intake.js';
export type { AlertIntakeDeps } from './alert-intake.js';
export { InMemoryDedupCache } from './dedup-cache.js';
export type { DedupCache } from './dedup-cache.js';
export { deriveFingerprint } from './fingerprint.js';
export { buildInvestigationInstruction } from './investigation-instruction.js';
export { diffRevisions, valuesEqual } from './revision-diff.js';
export {
  analyzeLogs,
  extractErrors,
  extractWarnings,
  extractStackTraces,
  findRepeatedMessages,
  identifyPatterns,
  summarizeLogs,
  DEFAULT_MIN_OCCURRENCES,
  DEFAULT_TAIL_LINES,
} from './log-evidence.js';
export type { AnalyzeOptions, MatchedLine } from './log-evidence.js';
export { classifyExitCode } from './exit-codes.js';
export { analyzeLogsSchema, diffRequestSchema, evidenceToolSchema } from './evidence-schema.js';
export type { EvidenceToolRequest, EvidenceAction } from './evidence-schema.js';
export { runEvidenceTool } from './evidence-tools.js';
export type { EvidenceToolResult } from './evidence-tools.js';
export {
  releaseParamsSchema,
  recordRevisionSchema,
  revisionHistoryQuerySchema,
  revisionDiffQuerySchema,
} from './revision-schema.js';
export type { RecordRevisionInput } from './revision-schema.js';
export { recordRevision, getRevisionHistory, compareRevisions } from './revision-history.js';
export type { RevisionSummary, RevisionComparison } from './revision-history.js';
