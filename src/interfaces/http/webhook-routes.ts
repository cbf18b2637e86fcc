import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  createIngestionPipeline,
  MESSAGES_PROFILE,
  SESSIONS_PROFILE,
} from '../../application/index.js';

/**
 * Registers the webhook ingestion routes.
 *
 * POST {MESSAGES_WEBHOOK_PATH}  — open ingestion, any JSON, keyed by `to`
 * POST {SESSIONS_WEBHOOK_PATH}  — CloudEvents ingestion, deduplicated by event id
 *
 * Ignored events are acknowledged with 200 so the sender does not retry.
 * A POST without a body is rejected with 400 on the open route; the
 * CloudEvents route reports it as a validation failure.
 */
async function webhookRoutes(fastify: FastifyInstance): Promise<void> {
  const { settings, stores } = fastify;

  const common = {
    idempotency: stores.idempotency,
    recordTtlSeconds: settings.recordTtlSeconds,
    idempotencyTtlSeconds: settings.idempotencyTtlSeconds,
    log: fastify.log,
  };

  const messages = createIngestionPipeline(MESSAGES_PROFILE, { ...common, store: stores.messages });
  const sessions = createIngestionPipeline(SESSIONS_PROFILE, { ...common, store: stores.sessions });

  fastify.post(
    settings.messagesWebhookPath,
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      // no content-type and no payload leaves the body unset
      if (request.body === undefined) {
        return reply.status(400).send({ error: 'Request body is required' });
      }

      const result = await messages.ingest(request.body);

      return reply.status(200).send({
        status: 'stored',
        to: result.key,
        ttl_seconds: settings.recordTtlSeconds,
      });
    },
  );

  fastify.post(
    settings.sessionsWebhookPath,
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const result = await sessions.ingest(request.body);

      switch (result.outcome) {
        case 'invalid':
          return reply.status(422).send({
            error: 'Validation failed',
            issues: result.issues,
          });
        case 'ignored':
          return reply.status(200).send({ status: 'ignored', reason: result.reason });
        case 'stored':
          return reply.status(200).send({
            status: 'ok',
            service_id: result.key,
            event_id: result.record.eventId,
            backend: stores.sessions.backend,
          });
      }
    },
  );
}

export default fp(webhookRoutes, {
  name: 'webhook-routes',
  dependencies: ['storage'],
  fastify: '5.x',
});
