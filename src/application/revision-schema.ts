import { z } from 'zod';
import { isConfigTree } from '../domain/index.js';

/** Kubernetes object names: DNS-1123 labels/subdomains. */
const k8sName = z.string().min(1).max(253).regex(/^[a-z0-9]([-a-z0-9.]*[a-z0-9])?$/, 'Must be a DNS-1123 name');

export const releaseParamsSchema = z.object({
  namespace: k8sName,
  release: k8sName,
});

/**
 * Schema for POST /api/v1/releases/:namespace/:release/revisions.
 * `values` must be a configuration tree (scalars, lists and nested maps).
 */
export const recordRevisionSchema = z.object({
  revision: z.number().int().min(1),
  chart: z.string().max(255).optional(),
  app_version: z.string().max(255).optional(),
  status: z.string().max(64).optional(),
  values: z.record(z.string(), z.unknown()).refine((values) => isConfigTree(values), {
    message: 'values must be a configuration tree',
  }),
});

export type RecordRevisionInput = z.infer<typeof recordRevisionSchema>;

/** Query strings arrive as text, hence the coercion. */
export const revisionHistoryQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

export const revisionDiffQuerySchema = z.object({
  from: z.coerce.number().int().min(1),
  to: z.coerce.number().int().min(1),
});
