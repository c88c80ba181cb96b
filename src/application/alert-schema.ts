import { z } from 'zod';

const stringMap = z.record(z.string(), z.string());

/**
 * Zod schema for a single alert inside an Alertmanager webhook delivery.
 *
 * - `fingerprint` is optional; the intake derives one from `labels` if absent,
 *   so an alert needs at least one of the two.
 * - `startsAt` must be RFC3339 with an offset (Alertmanager sends `Z` or `+hh:mm`).
 * - `endsAt` is often the zero time `0001-01-01T00:00:00Z` for firing alerts.
 */
export const alertSchema = z.object({
  status: z.enum(['firing', 'resolved']),
  labels: stringMap,
  annotations: stringMap.default({}),
  startsAt: z.string().datetime({ offset: true, message: 'Must be an RFC3339 timestamp' }),
  endsAt: z.string().optional(),
  generatorURL: z.string().optional(),
  fingerprint: z.string().optional(),
}).refine(
  (alert) => (alert.fingerprint ?? '').trim() !== '' || Object.keys(alert.labels).length > 0,
  { message: 'Alert needs a fingerprint or at least one label', path: ['fingerprint'] },
);

export type AlertInput = z.infer<typeof alertSchema>;

/**
 * Envelope of an Alertmanager webhook delivery.
 *
 * Only `alerts` is required; the rest is carried for logging and context.
 * Validation is all-or-nothing: one malformed alert rejects the batch.
 */
export const alertmanagerWebhookSchema = z.object({
  version: z.string().optional(),
  groupKey: z.string().optional(),
  status: z.string().optional(),
  receiver: z.string().optional(),
  groupLabels: stringMap.optional(),
  commonLabels: stringMap.optional(),
  commonAnnotations: stringMap.optional(),
  externalURL: z.string().optional(),
  alerts: z.array(alertSchema).min(1, 'Delivery must contain at least one alert'),
});

export type AlertmanagerWebhookInput = z.infer<typeof alertmanagerWebhookSchema>;
