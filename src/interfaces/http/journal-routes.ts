import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { sendEventSchema, findEventsSchema } from '../../application/index.js';
import { replyWithJournalError } from './errors.js';

/**
 * Journal event routes.
 *
 * POST /api/v1/journal/events   publish a manual event (202)
 * POST /api/v1/journal/search   query recent history with a structured filter
 * GET  /api/v1/journal/health   router state and counters
 */
async function journalRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.post(
    '/api/v1/journal/events',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = sendEventSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      try {
        fastify.journal.admin.sendEvent(parsed.data);
      } catch (err: unknown) {
        return replyWithJournalError(reply, err);
      }

      return reply.status(202).send({ status: 'accepted' });
    },
  );

  fastify.post(
    '/api/v1/journal/search',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = findEventsSchema.safeParse(request.body ?? {});
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const events = fastify.journal.admin.findEvents(parsed.data);
      return reply.status(200).send({ data: events, count: events.length });
    },
  );

  fastify.get(
    '/api/v1/journal/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const { router } = fastify.journal;
      const status = router.status === 'running' ? 200 : 503;

      return reply.status(status).send({
        status: router.status,
        pending: router.pending,
        listeners: router.listenerCount,
        history: router.history.size,
        stats: router.stats,
      });
    },
  );
}

export default fp(journalRoutes, {
  name: 'journal-routes',
  dependencies: ['journal'],
  fastify: '5.x',
});
