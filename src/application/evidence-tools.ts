import type {
  ChangeRecord,
  ErrorLine,
  ExitCodeClassification,
  LogEvidence,
  LogSummary,
  PatternMatch,
  RepeatedMessage,
} from '../domain/index.js';
import type { EvidenceToolRequest } from './evidence-schema.js';
import type { MatchedLine } from './log-evidence.js';
import {
  analyzeLogs,
  extractErrors,
  extractStackTraces,
  extractWarnings,
  findRepeatedMessages,
  identifyPatterns,
  summarizeLogs,
} from './log-evidence.js';
import { classifyExitCode } from './exit-codes.js';
import { diffRevisions } from './revision-diff.js';

/** Tool result, tagged with the action that produced it. */
export type EvidenceToolResult =
  | { readonly action: 'extract_errors'; readonly result: ErrorLine[] }
  | { readonly action: 'extract_warnings'; readonly result: MatchedLine[] }
  | { readonly action: 'identify_patterns'; readonly result: PatternMatch[] }
  | { readonly action: 'parse_stack_traces'; readonly result: string[] }
  | { readonly action: 'analyze_exit_code'; readonly result: ExitCodeClassification }
  | { readonly action: 'find_repeated'; readonly result: RepeatedMessage[] }
  | { readonly action: 'summarize'; readonly result: LogSummary }
  | { readonly action: 'analyze'; readonly result: LogEvidence }
  | { readonly action: 'diff_revisions'; readonly result: ChangeRecord[] };

function assertNever(value: never): never {
  throw new Error(`Unhandled evidence tool action: ${JSON.stringify(value)}`);
}

/**
 * Single entry point for the Investigator's evidence tools.
 *
 * The switch is exhaustive over the request union, so adding a variant
 * without handling it fails type-checking.
 *
 * @throws DiffInputError from `diff_revisions` when a root is not a tree.
 */
export function runEvidenceTool(request: EvidenceToolRequest): EvidenceToolResult {
  switch (request.action) {
    case 'extract_errors':
      return { action: request.action, result: extractErrors(request.logs, request.limit) };
    case 'extract_warnings':
      return { action: request.action, result: extractWarnings(request.logs, request.limit) };
    case 'identify_patterns':
      return { action: request.action, result: identifyPatterns(request.logs) };
    case 'parse_stack_traces':
      return { action: request.action, result: extractStackTraces(request.logs) };
    case 'analyze_exit_code':
      return { action: request.action, result: classifyExitCode(request.exit_code) };
    case 'find_repeated':
      return { action: request.action, result: findRepeatedMessages(request.logs, request.min_occurrences) };
    case 'summarize':
      return { action: request.action, result: summarizeLogs(request.logs, request.tail_lines) };
    case 'analyze':
      return {
        action: request.action,
        result: analyzeLogs(request.logs, {
          exitCode: request.exit_code,
          minOccurrences: request.min_occurrences,
        }),
      };
    case 'diff_revisions':
      return { action: request.action, result: diffRevisions(request.old, request.new) };
    default:
      return assertNever(request);
  }
}
