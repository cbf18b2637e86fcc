import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  getLatestRecord,
  getRecordHistory,
  removeRecords,
} from '../../application/index.js';

type ToParams = { Params: { to: string } };

/**
 * Read/delete routes for open deliveries.
 *
 * GET    /messages/:to/latest   — latest payload, exactly as received
 * GET    /messages/:to/history  — retained records (history shape only)
 * DELETE /messages/:to          — drop everything stored for `to`
 */
async function messageRoutes(fastify: FastifyInstance): Promise<void> {
  const store = fastify.stores.messages;

  fastify.get(
    '/messages/:to/latest',
    async (request: FastifyRequest<ToParams>, reply: FastifyReply) => {
      const record = await getLatestRecord(store, request.params.to);

      if (record === null) {
        return reply.status(404).send({ error: "No payload found for this 'to'" });
      }

      return reply.status(200).send(record.payload);
    },
  );

  if (store.shape === 'history') {
    fastify.get(
      '/messages/:to/history',
      async (request: FastifyRequest<ToParams>, reply: FastifyReply) => {
        const { to } = request.params;
        const records = await getRecordHistory(store, to);

        if (records === null) {
          return reply.status(404).send({ error: "No payload found for this 'to'" });
        }

        return reply.status(200).send({ to, count: records.length, records });
      },
    );
  }

  fastify.delete(
    '/messages/:to',
    async (request: FastifyRequest<ToParams>, reply: FastifyReply) => {
      const { to } = request.params;
      const deleted = await removeRecords(store, to);

      if (!deleted) {
        return reply.status(404).send({ error: "'to' not found" });
      }

      return reply.status(200).send({ status: 'deleted', backend: store.backend, to });
    },
  );
}

export default fp(messageRoutes, {
  name: 'message-routes',
  dependencies: ['storage'],
  fastify: '5.x',
});
