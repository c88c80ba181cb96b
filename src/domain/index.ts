export type {
  AlertEvent,
  AlertLabels,
  AlertStatus,
  DedupReason,
  SubmitOutcome,
  DispatchResult,
  Investigator,
} from './alert.js';
export type {
  ConfigScalar,
  ConfigValue,
  ConfigList,
  ConfigTree,
  ChangeKind,
  ChangeRecord,
} from './config-tree.js';
export { isConfigTree, isConfigValue } from './config-tree.js';
export type {
  ErrorLine,
  ExitCodeCategory,
  ExitCodeClassification,
  RepeatedMessage,
  PatternMatch,
  LogEvidence,
  LogLevel,
  LogSummary,
} from './log-evidence.js';
export {
  PipelineError,
  ValidationError,
  DispatchFailure,
  DiffInputError,
  ExtractionError,
} from './errors.js';
export type { PipelineErrorCode } from './errors.js';
