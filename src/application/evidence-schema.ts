import { z } from 'zod';

const logs = z.string();
const exitCode = z.number().int();
const positiveInt = z.number().int().min(1);

/** POST /api/v1/evidence/logs */
export const analyzeLogsSchema = z.object({
  logs,
  exit_code: exitCode.optional(),
  min_occurrences: positiveInt.optional(),
});

/** POST /api/v1/evidence/diff. Trees are checked by the diff engine itself. */
export const diffRequestSchema = z.object({
  old: z.unknown(),
  new: z.unknown(),
});

/**
 * Evidence tool request: one variant per operation, discriminated by
 * `action`. Each variant carries only the parameters its operation takes.
 */
export const evidenceToolSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('extract_errors'), logs, limit: positiveInt.optional() }),
  z.object({ action: z.literal('extract_warnings'), logs, limit: positiveInt.optional() }),
  z.object({ action: z.literal('identify_patterns'), logs }),
  z.object({ action: z.literal('parse_stack_traces'), logs }),
  z.object({ action: z.literal('analyze_exit_code'), exit_code: exitCode }),
  z.object({ action: z.literal('find_repeated'), logs, min_occurrences: positiveInt.optional() }),
  z.object({ action: z.literal('summarize'), logs, tail_lines: z.number().int().min(0).optional() }),
  z.object({
    action: z.literal('analyze'),
    logs,
    exit_code: exitCode.optional(),
    min_occurrences: positiveInt.optional(),
  }),
  z.object({ action: z.literal('diff_revisions'), old: z.unknown(), new: z.unknown() }),
]);

export type EvidenceToolRequest = z.infer<typeof evidenceToolSchema>;
export type EvidenceAction = EvidenceToolRequest['action'];
