import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  analyzeLogs,
  analyzeLogsSchema,
  diffRequestSchema,
  diffRevisions,
  evidenceToolSchema,
  runEvidenceTool,
} from '../../application/index.js';
import { DiffInputError } from '../../domain/index.js';

/**
 * Evidence routes used by the Investigator as tools.
 *
 * POST /api/v1/evidence/logs   full log evidence for one blob of text
 * POST /api/v1/evidence/diff   configuration diff of two trees
 * POST /api/v1/evidence/tools  single tool entry point, tagged by `action`
 *
 * All three are pure computations over the request body.
 */
async function evidenceRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.post(
    '/api/v1/evidence/logs',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = analyzeLogsSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
      }

      const evidence = analyzeLogs(parsed.data.logs, {
        exitCode: parsed.data.exit_code,
        minOccurrences: parsed.data.min_occurrences,
      });

      request.log.debug(
        { errorLines: evidence.errorLines.length, stackTraces: evidence.stackTraces.length },
        'Log evidence extracted',
      );

      return reply.status(200).send(evidence);
    },
  );

  fastify.post(
    '/api/v1/evidence/diff',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = diffRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
      }

      try {
        const changes = diffRevisions(parsed.data.old, parsed.data.new);
        return reply.status(200).send({ changes });
      } catch (err: unknown) {
        if (err instanceof DiffInputError) {
          return reply.status(400).send({ error: err.message, code: err.code });
        }
        throw err;
      }
    },
  );

  fastify.post(
    '/api/v1/evidence/tools',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = evidenceToolSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
      }

      try {
        return reply.status(200).send(runEvidenceTool(parsed.data));
      } catch (err: unknown) {
        if (err instanceof DiffInputError) {
          return reply.status(400).send({ error: err.message, code: err.code });
        }
        throw err;
      }
    },
  );
}

export default fp(evidenceRoutes, {
  name: 'evidence-routes',
  fastify: '5.x',
});
