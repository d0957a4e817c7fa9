import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  addOutputSchema,
  removeOutputSchema,
  moveOutputSchema,
} from '../../application/index.js';
import { replyWithJournalError } from './errors.js';

/**
 * Output administration routes.
 *
 * GET    /api/v1/outputs         list stored outputs (optional ?scope=)
 * POST   /api/v1/outputs         add or update an output
 * DELETE /api/v1/outputs         remove an output
 * POST   /api/v1/outputs/move    move an output to another destination
 */
async function outputRoutes(fastify: FastifyInstance): Promise<void> {

  // ── GET /api/v1/outputs ──────────────────────────────────
  fastify.get(
    '/api/v1/outputs',
    async (
      request: FastifyRequest<{ Querystring: { scope?: string } }>,
      reply: FastifyReply,
    ) => {
      const outputs = await fastify.journal.admin.listOutputs(request.query.scope);
      return reply.status(200).send({ data: outputs, count: outputs.length });
    },
  );

  // ── POST /api/v1/outputs ─────────────────────────────────
  fastify.post(
    '/api/v1/outputs',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = addOutputSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      try {
        const record = await fastify.journal.admin.addOutput(parsed.data);
        return reply.status(201).send(record);
      } catch (err: unknown) {
        return replyWithJournalError(reply, err);
      }
    },
  );

  // ── DELETE /api/v1/outputs ───────────────────────────────
  fastify.delete(
    '/api/v1/outputs',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = removeOutputSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const removed = await fastify.journal.admin.removeOutput(parsed.data);
      if (!removed) {
        return reply.status(404).send({
          error: `No output on ${parsed.data.path} found for ${parsed.data.destination_id}`,
        });
      }

      return reply.status(204).send();
    },
  );

  // ── POST /api/v1/outputs/move ────────────────────────────
  fastify.post(
    '/api/v1/outputs/move',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = moveOutputSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      try {
        const moved = await fastify.journal.admin.moveOutput(parsed.data);
        if (!moved) {
          return reply.status(404).send({
            error: `No output on ${parsed.data.path} found for ${parsed.data.from_destination_id}`,
          });
        }
        return reply.status(200).send({ status: 'moved' });
      } catch (err: unknown) {
        return replyWithJournalError(reply, err);
      }
    },
  );
}

export default fp(outputRoutes, {
  name: 'output-routes',
  dependencies: ['journal'],
  fastify: '5.x',
});
