import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  compareRevisions,
  getRevisionHistory,
  recordRevision,
  recordRevisionSchema,
  releaseParamsSchema,
  revisionDiffQuerySchema,
  revisionHistoryQuerySchema,
} from '../../application/index.js';
import { DiffInputError } from '../../domain/index.js';

type ReleaseRequest = FastifyRequest<{
  Params: { namespace: string; release: string };
  Querystring: Record<string, string | undefined>;
}>;

/**
 * Revision snapshot routes.
 *
 * POST /api/v1/releases/:namespace/:release/revisions  record a snapshot
 * GET  /api/v1/releases/:namespace/:release/revisions  history, newest first
 * GET  /api/v1/releases/:namespace/:release/diff       diff ?from=&to=
 */
async function revisionRoutes(fastify: FastifyInstance): Promise<void> {

  // ── POST …/revisions ─────────────────────────────────────
  fastify.post(
    '/api/v1/releases/:namespace/:release/revisions',
    async (request: ReleaseRequest, reply: FastifyReply) => {
      const params = releaseParamsSchema.safeParse(request.params);
      if (!params.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: params.error.issues });
      }

      const body = recordRevisionSchema.safeParse(request.body);
      if (!body.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: body.error.issues });
      }

      const inserted = await recordRevision(fastify.db, params.data, body.data);
      request.log.info(
        { ...params.data, revision: body.data.revision, inserted },
        inserted ? 'Revision recorded' : 'Revision already recorded',
      );

      return reply.status(inserted ? 201 : 200).send({
        ...params.data,
        revision: body.data.revision,
        status: inserted ? 'recorded' : 'exists',
      });
    },
  );

  // ── GET …/revisions ──────────────────────────────────────
  fastify.get(
    '/api/v1/releases/:namespace/:release/revisions',
    async (request: ReleaseRequest, reply: FastifyReply) => {
      const params = releaseParamsSchema.safeParse(request.params);
      if (!params.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: params.error.issues });
      }

      const query = revisionHistoryQuerySchema.safeParse(request.query);
      if (!query.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: query.error.issues });
      }

      const revisions = await getRevisionHistory(fastify.db, params.data, query.data.limit);
      return reply.status(200).send({ ...params.data, revisions });
    },
  );

  // ── GET …/diff ───────────────────────────────────────────
  fastify.get(
    '/api/v1/releases/:namespace/:release/diff',
    async (request: ReleaseRequest, reply: FastifyReply) => {
      const params = releaseParamsSchema.safeParse(request.params);
      if (!params.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: params.error.issues });
      }

      const query = revisionDiffQuerySchema.safeParse(request.query);
      if (!query.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: query.error.issues });
      }

      try {
        const comparison = await compareRevisions(fastify.db, params.data, query.data.from, query.data.to);
        if (comparison === null) {
          return reply.status(404).send({ error: 'Revision not found' });
        }
        return reply.status(200).send(comparison);
      } catch (err: unknown) {
        if (err instanceof DiffInputError) {
          return reply.status(400).send({ error: err.message, code: err.code });
        }
        throw err;
      }
    },
  );
}

export default fp(revisionRoutes, {
  name: 'revision-routes',
  dependencies: ['db'],
  fastify: '5.x',
});
