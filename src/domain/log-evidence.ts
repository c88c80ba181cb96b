/** A line matched by one of the error lead tokens. */
export interface ErrorLine {
  readonly line: number; // 1-based
  readonly text: string;
  /** Remainder of the line after the matched token, trimmed. */
  readonly captured: string;
}

export type ExitCodeCategory =
  | 'success'
  | 'application_error'
  | 'oom_killed'
  | 'terminated'
  | 'command_error'
  | 'unknown';

export interface ExitCodeClassification {
  readonly code: number;
  readonly description: string;
  readonly category: ExitCodeCategory;
  readonly recommendation?: string;
}

/** A group of identical (post-trim) lines. */
export interface RepeatedMessage {
  readonly message: string;
  readonly count: number;
  readonly firstLine: number;
}

/** Occurrences of a known failure signature, e.g. "connection refused". */
export interface PatternMatch {
  readonly pattern: string;
  readonly label: string;
  readonly count: number;
}

/**
 * Structured evidence extracted from one blob of log text.
 *
 * Built fresh per analysis and never mutated afterwards.
 */
export interface LogEvidence {
  readonly errorLines: readonly ErrorLine[];
  readonly stackTraces: readonly string[];
  readonly exitCode?: ExitCodeClassification;
  readonly repeatedMessages: readonly RepeatedMessage[];
  readonly knownPatterns: readonly PatternMatch[];
}

export type LogLevel = 'ERROR' | 'WARNING' | 'INFO' | 'DEBUG';

export interface LogSummary {
  readonly totalLines: number;
  readonly levels: Readonly<Record<LogLevel, number>>;
  readonly knownPatterns: readonly PatternMatch[];
  readonly tail: readonly string[];
}
