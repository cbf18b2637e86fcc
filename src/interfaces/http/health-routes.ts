import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { checkHealth } from '../../application/index.js';
import { isListable } from '../../domain/index.js';

/**
 * Operational routes.
 *
 * GET /        — service index
 * GET /health  — backend reachability and TTL/shape settings; 503 when down
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  const { settings, stores } = fastify;

  fastify.get('/', async (_request: FastifyRequest, reply: FastifyReply) => {
    const endpoints: Record<string, string> = {
      [`POST ${settings.messagesWebhookPath}`]: 'Open webhook, any JSON, keyed by "to"',
      [`POST ${settings.sessionsWebhookPath}`]: 'CloudEvents webhook, keyed by data.serviceId',
      'GET  /messages/{to}/latest': 'Latest payload for "to"',
      'DELETE /messages/{to}': 'Remove payloads for "to"',
      'GET  /sessions/{sessionId}/latest': 'Latest message for a session',
      'DELETE /sessions/{sessionId}': 'Remove a session',
      'GET  /health': 'Healthcheck',
    };
    if (settings.shape === 'history') {
      endpoints['GET  /messages/{to}/history'] = 'Retained payloads for "to"';
      endpoints['GET  /sessions/{sessionId}/history'] = 'Retained messages for a session';
    }
    if (isListable(stores.sessions)) {
      endpoints['GET  /sessions'] = 'Resident session ids';
    }

    return reply.status(200).send({
      service: 'hooklog',
      now_utc: new Date().toISOString(),
      endpoints,
    });
  });

  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const { report, cause } = await checkHealth(stores.sessions, {
      recordTtlSeconds: settings.recordTtlSeconds,
      idempotencyTtlSeconds: settings.idempotencyTtlSeconds,
      shape: settings.shape,
      historyMaxEntries: settings.historyMaxEntries,
    });

    if (!report.backend_reachable) {
      fastify.log.error({ err: cause, backend: report.backend }, 'Store health check failed');
      return reply.status(503).send(report);
    }

    return reply.status(200).send(report);
  });
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['storage'],
  fastify: '5.x',
});
