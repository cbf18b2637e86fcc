import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  getLatestRecord,
  getRecordHistory,
  removeRecords,
  listResidentKeys,
} from '../../application/index.js';
import { isListable } from '../../domain/index.js';

type SessionParams = { Params: { sessionId: string } };

/**
 * Parses a querystring value to an integer.
 * Returns `undefined` for missing values, NaN for anything non-integral.
 */
function safeInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isFinite(n) || n !== Math.floor(n)) return NaN;
  return n;
}

/**
 * Read/delete routes for CloudEvents deliveries.
 *
 * GET    /sessions/:sessionId/latest   — latest enriched record
 * GET    /sessions/:sessionId/history  — retained records (history shape only)
 * DELETE /sessions/:sessionId          — drop everything stored for the session
 * GET    /sessions                     — resident keys (in-memory backend only)
 */
async function sessionRoutes(fastify: FastifyInstance): Promise<void> {
  const store = fastify.stores.sessions;

  fastify.get(
    '/sessions/:sessionId/latest',
    async (request: FastifyRequest<SessionParams>, reply: FastifyReply) => {
      const record = await getLatestRecord(store, request.params.sessionId);

      if (record === null) {
        return reply.status(404).send({ error: 'No messages found for this serviceId' });
      }

      return reply.status(200).send(record);
    },
  );

  if (store.shape === 'history') {
    fastify.get(
      '/sessions/:sessionId/history',
      async (request: FastifyRequest<SessionParams>, reply: FastifyReply) => {
        const { sessionId } = request.params;
        const records = await getRecordHistory(store, sessionId);

        if (records === null) {
          return reply.status(404).send({ error: 'No messages found for this serviceId' });
        }

        return reply.status(200).send({ service_id: sessionId, count: records.length, records });
      },
    );
  }

  fastify.delete(
    '/sessions/:sessionId',
    async (request: FastifyRequest<SessionParams>, reply: FastifyReply) => {
      const { sessionId } = request.params;
      const deleted = await removeRecords(store, sessionId);

      if (!deleted) {
        return reply.status(404).send({ error: 'serviceId not found' });
      }

      return reply.status(200).send({ status: 'deleted', service_id: sessionId });
    },
  );

  if (isListable(store)) {
    fastify.get(
      '/sessions',
      async (
        request: FastifyRequest<{ Querystring: { limit?: string } }>,
        reply: FastifyReply,
      ) => {
        const limit = safeInt(request.query.limit);

        if (limit !== undefined && Number.isNaN(limit)) {
          return reply.status(400).send({ error: 'limit must be an integer' });
        }

        const { count, keys } = await listResidentKeys(store, { limit });
        return reply.status(200).send({ count, service_ids: keys });
      },
    );
  }
}

export default fp(sessionRoutes, {
  name: 'session-routes',
  dependencies: ['storage'],
  fastify: '5.x',
});
