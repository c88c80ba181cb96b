import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { alertmanagerWebhookSchema, toAlertEvent } from '../../application/index.js';
import { DispatchFailure, PipelineError } from '../../domain/index.js';
import type { DedupReason } from '../../domain/index.js';

const SERVICE = 'evidence-pipeline';
const VERSION = '0.1.0';
const INTERNAL_ERROR = 'INTERNAL';

/** Result codes that make Alertmanager redeliver the group. */
const RETRYABLE_CODES: ReadonlySet<string> = new Set(['DISPATCH_FAILURE', INTERNAL_ERROR]);

type AlertResult =
  | { fingerprint: string; alertname: string; status: 'accepted' }
  | { fingerprint: string; alertname: string; status: 'deduplicated'; reason: DedupReason }
  | { fingerprint: string; alertname: string; status: 'error'; code: string; error: string };

/**
 * Registers the alert intake routes.
 *
 * GET  /                              service information
 * GET  /health                        liveness probe
 * POST /api/v1/webhook/alertmanager   Alertmanager webhook delivery
 * POST /api/v1/webhook/test           echo, for manual testing
 */
async function webhookRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get('/', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({
      service: SERVICE,
      version: VERSION,
      status: 'running',
      endpoints: {
        health: '/health',
        alertmanager_webhook: '/api/v1/webhook/alertmanager',
        test_webhook: '/api/v1/webhook/test',
        log_evidence: '/api/v1/evidence/logs',
        config_diff: '/api/v1/evidence/diff',
        evidence_tools: '/api/v1/evidence/tools',
        releases: '/api/v1/releases/:namespace/:release/revisions',
      },
    });
  });

  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({
      status: 'healthy',
      service: SERVICE,
      timestamp: new Date().toISOString(),
      dedup_backend: fastify.intake.dedupBackend,
    });
  });

  /**
   * Alertmanager delivery.
   *
   * Validates the whole batch up-front (400 on any malformed alert), then
   * submits every alert concurrently. Duplicates and resolved alerts are a
   * quiet 200. A dispatch failure or an unexpected error (a dedup store
   * outage, say) is reported per alert and turns the answer into a 502, and
   * Alertmanager redelivers the group.
   */
  fastify.post(
    '/api/v1/webhook/alertmanager',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = alertmanagerWebhookSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const webhook = parsed.data;
      request.log.info(
        { groupKey: webhook.groupKey, status: webhook.status, alertCount: webhook.alerts.length },
        'Received Alertmanager webhook',
      );

      const results = await Promise.all(webhook.alerts.map(async (input): Promise<AlertResult> => {
        const event = toAlertEvent(input, webhook.groupKey);
        const alertname = event.labels['alertname'] ?? 'Unknown';

        try {
          const outcome = await fastify.intake.submit(event);
          return outcome.outcome === 'accepted'
            ? { fingerprint: outcome.fingerprint, alertname, status: 'accepted' }
            : { fingerprint: outcome.fingerprint, alertname, status: 'deduplicated', reason: outcome.reason };
        } catch (err: unknown) {
          const fingerprint = err instanceof DispatchFailure ? err.fingerprint : event.fingerprint;
          request.log.error({ err, fingerprint }, 'Failed to process alert');
          if (err instanceof PipelineError) {
            return { fingerprint, alertname, status: 'error', code: err.code, error: err.message };
          }
          return { fingerprint, alertname, status: 'error', code: INTERNAL_ERROR, error: 'Internal error while processing alert' };
        }
      }));

      const failed = results.filter((r) => r.status === 'error');
      const retryable = failed.some((r) => r.status === 'error' && RETRYABLE_CODES.has(r.code));

      return reply.status(retryable ? 502 : 200).send({
        status: failed.length === 0 ? 'processed' : 'partial_failure',
        webhook_group: webhook.groupKey ?? null,
        alerts_received: webhook.alerts.length,
        alerts_accepted: results.filter((r) => r.status === 'accepted').length,
        alerts_deduplicated: results.filter((r) => r.status === 'deduplicated').length,
        alerts_failed: failed.length,
        results,
      });
    },
  );

  fastify.post(
    '/api/v1/webhook/test',
    async (request: FastifyRequest, reply: FastifyReply) => {
      request.log.info({ body: request.body }, 'Test webhook received');
      return reply.status(200).send({
        status: 'test_received',
        timestamp: new Date().toISOString(),
        data: request.body ?? null,
      });
    },
  );
}

export default fp(webhookRoutes, {
  name: 'webhook-routes',
  dependencies: ['intake'],
  fastify: '5.x',
});
