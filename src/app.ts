import Fastify from 'fastify';
import type { FastifyError, FastifyInstance } from 'fastify';
import { storagePlugin } from './infrastructure/index.js';
import type { AppConfig, Stores } from './infrastructure/index.js';
import {
  webhookRoutes,
  messageRoutes,
  sessionRoutes,
  healthRoutes,
} from './interfaces/http/index.js';
import { StoreUnavailableError } from './errors.js';

export interface BuildAppOptions {
  /** Pre-built stores (tests); otherwise built from `config.backend`. */
  stores?: Stores;
  /** Overrides the pino logger config; `false` silences it. */
  logger?: boolean;
}

/**
 * Assembles the Fastify server without listening.
 *
 * Order:
 * 1) Error handler
 * 2) Storage plugin
 * 3) HTTP routes
 */
export async function buildApp(
  config: AppConfig,
  options: BuildAppOptions = {},
): Promise<FastifyInstance> {
  // `__proto__` and `constructor.prototype` keys are stripped from JSON
  // bodies; the rest of the delivery is stored.
  const fastify = Fastify({
    logger: options.logger ?? { level: config.logLevel },
    onProtoPoisoning: 'remove',
    onConstructorPoisoning: 'remove',
  });

  fastify.setErrorHandler((err: FastifyError, request, reply) => {
    if (err instanceof StoreUnavailableError) {
      request.log.error({ err, operation: err.operation }, 'Store unavailable');
      return reply.status(503).send({ error: 'Store unavailable' });
    }

    if (err.statusCode !== undefined && err.statusCode < 500) {
      return reply.status(err.statusCode).send({ error: err.message });
    }

    request.log.error({ err }, 'Unhandled request error');
    return reply.status(500).send({ error: 'Internal server error' });
  });

  await fastify.register(storagePlugin, { config, stores: options.stores });

  await fastify.register(webhookRoutes);
  await fastify.register(messageRoutes);
  await fastify.register(sessionRoutes);
  await fastify.register(healthRoutes);

  return fastify;
}
