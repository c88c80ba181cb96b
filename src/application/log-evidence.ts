import type {
  ErrorLine,
  LogEvidence,
  LogLevel,
  LogSummary,
  PatternMatch,
  RepeatedMessage,
} from '../domain/index.js';
import { classifyExitCode } from './exit-codes.js';
import {
  ERROR_LEAD_TOKENS,
  KNOWN_PATTERNS,
  LEVEL_PATTERNS,
  TRACE_CONTINUATION_REGEX,
  TRACE_START_REGEX,
  WARNING_REGEX,
} from './log-patterns.js';

export const DEFAULT_MIN_OCCURRENCES = 3;
export const DEFAULT_TAIL_LINES = 50;

export interface AnalyzeOptions {
  exitCode?: number | undefined;
  minOccurrences?: number | undefined;
}

/** A line matched by a non-error level scan (warnings). */
export interface MatchedLine {
  readonly line: number;
  readonly text: string;
}

function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

/**
 * Error lines, attributed to the first lead token that matches.
 * `limit` caps the number of records returned.
 */
export function extractErrors(text: string, limit?: number): ErrorLine[] {
  const errors: ErrorLine[] = [];
  const lines = splitLines(text);

  for (let i = 0; i < lines.length; i++) {
    if (limit !== undefined && errors.length >= limit) break;
    const line = lines[i] ?? '';

    for (const { regex } of ERROR_LEAD_TOKENS) {
      const match = regex.exec(line);
      if (match === null) continue;
      errors.push({
        line: i + 1,
        text: line,
        captured: line.slice(match.index + match[0].length).trim(),
      });
      break;
    }
  }

  return errors;
}

export function extractWarnings(text: string, limit?: number): MatchedLine[] {
  const warnings: MatchedLine[] = [];
  const lines = splitLines(text);

  for (let i = 0; i < lines.length; i++) {
    if (limit !== undefined && warnings.length >= limit) break;
    const line = lines[i] ?? '';
    if (WARNING_REGEX.test(line)) {
      warnings.push({ line: i + 1, text: line });
    }
  }

  return warnings;
}

/**
 * Stack trace blocks, in order of appearance.
 *
 * A single forward scan with one piece of state: the block being assembled
 * (null when outside a trace). A start line opens a block; continuation
 * lines extend it; any other line closes it and is then checked as the
 * start of the next block. Blocks are never merged.
 */
export function extractStackTraces(text: string): string[] {
  const traces: string[] = [];
  let current: string[] | null = null;

  for (const line of splitLines(text)) {
    if (current !== null) {
      if (TRACE_CONTINUATION_REGEX.test(line)) {
        current.push(line);
        continue;
      }
      traces.push(current.join('\n'));
      current = null;
    }

    if (TRACE_START_REGEX.test(line)) {
      current = [line];
    }
  }

  if (current !== null) {
    traces.push(current.join('\n'));
  }

  return traces;
}

/**
 * Groups lines by trimmed content and keeps the groups seen at least
 * `minOccurrences` times, ordered by first occurrence. Blank lines are
 * never grouped.
 */
export function findRepeatedMessages(
  text: string,
  minOccurrences: number = DEFAULT_MIN_OCCURRENCES,
): RepeatedMessage[] {
  const threshold = Number.isFinite(minOccurrences) ? Math.max(1, Math.ceil(minOccurrences)) : DEFAULT_MIN_OCCURRENCES;
  // Map iteration follows insertion order, i.e. first occurrence.
  const groups: Map<string, { count: number; firstLine: number }> = new Map();
  const lines = splitLines(text);

  for (let i = 0; i < lines.length; i++) {
    const message = (lines[i] ?? '').trim();
    if (message === '') continue;

    const group = groups.get(message);
    if (group === undefined) {
      groups.set(message, { count: 1, firstLine: i + 1 });
    } else {
      group.count++;
    }
  }

  const repeated: RepeatedMessage[] = [];
  for (const [message, { count, firstLine }] of groups) {
    if (count >= threshold) {
      repeated.push({ message, count, firstLine });
    }
  }
  return repeated;
}

/** Known failure signatures found in the text, most frequent first. */
export function identifyPatterns(text: string): PatternMatch[] {
  const matches: PatternMatch[] = [];

  for (const { pattern, label, regex } of KNOWN_PATTERNS) {
    const count = text.match(regex)?.length ?? 0;
    if (count > 0) {
      matches.push({ pattern, label, count });
    }
  }

  // Array.prototype.sort is stable, so ties keep table order.
  return matches.sort((a, b) => b.count - a.count);
}

export function summarizeLogs(text: string, tailLines: number = DEFAULT_TAIL_LINES): LogSummary {
  const lines = splitLines(text);
  const levels: Record<LogLevel, number> = { ERROR: 0, WARNING: 0, INFO: 0, DEBUG: 0 };

  for (const line of lines) {
    const hit = LEVEL_PATTERNS.find(({ regex }) => regex.test(line));
    if (hit !== undefined) levels[hit.level]++;
  }

  const tailCount = Number.isFinite(tailLines) ? Math.max(0, Math.floor(tailLines)) : DEFAULT_TAIL_LINES;

  return {
    totalLines: lines.length,
    levels,
    knownPatterns: identifyPatterns(text),
    tail: tailCount === 0 ? [] : lines.slice(-tailCount),
  };
}

/**
 * Runs every extractor over one blob of log text.
 *
 * `exitCode` is included only when a code is supplied. Every sub-result is
 * a pure function of its input, so repeated calls give equal output.
 */
export function analyzeLogs(rawText: string, options: AnalyzeOptions = {}): LogEvidence {
  const evidence: LogEvidence = {
    errorLines: extractErrors(rawText),
    stackTraces: extractStackTraces(rawText),
    repeatedMessages: findRepeatedMessages(rawText, options.minOccurrences ?? DEFAULT_MIN_OCCURRENCES),
    knownPatterns: identifyPatterns(rawText),
  };

  if (options.exitCode === undefined) return evidence;
  return { ...evidence, exitCode: classifyExitCode(options.exitCode) };
}
