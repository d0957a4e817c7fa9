import type { FastifyReply } from 'fastify';
import {
  PathFormatError,
  RootBroadcastError,
  UnknownDestinationError,
} from '../../domain/index.js';

/**
 * Maps journal domain errors to HTTP responses. Anything else is
 * rethrown to Fastify's default error handler.
 */
export function replyWithJournalError(reply: FastifyReply, err: unknown): FastifyReply {
  if (err instanceof PathFormatError || err instanceof RootBroadcastError) {
    return reply.status(400).send({ error: err.message, code: err.code });
  }
  if (err instanceof UnknownDestinationError) {
    return reply.status(404).send({ error: err.message, code: err.code });
  }
  throw err;
}
