import fp from 'fastify-plugin';
import { Redis } from 'ioredis';
import type { FastifyInstance } from 'fastify';
import type { AppConfig } from './config.js';
import { createMemoryStores, createRedisStores } from './stores.js';
import type { Stores } from './stores.js';

export interface StoragePluginOptions {
  config: AppConfig;
  /** Pre-built stores; skips backend setup entirely. */
  stores?: Stores;
}

/**
 * Fastify plugin that owns the process-wide storage backend.
 *
 * - `redis`: one ioredis client, connected on start, quit on close.
 * - `memory`: plain Maps, lost on restart.
 *
 * Decorates `fastify.stores` and `fastify.settings` for the routes.
 */
async function storagePlugin(
  fastify: FastifyInstance,
  opts: StoragePluginOptions,
): Promise<void> {
  const { config } = opts;

  fastify.decorate('settings', config);

  if (opts.stores) {
    fastify.decorate('stores', opts.stores);
    return;
  }

  if (config.backend === 'memory') {
    fastify.decorate('stores', createMemoryStores(config));
    fastify.log.info({ shape: config.shape }, 'Using in-memory store');
    return;
  }

  const redis = new Redis(config.redisUrl, {
    maxRetriesPerRequest: 1,
    enableReadyCheck: true,
    connectTimeout: 5_000,
    lazyConnect: true,
  });

  await redis.connect();
  fastify.log.info({ shape: config.shape, namespace: config.namespace }, 'Redis connected');

  fastify.decorate('stores', createRedisStores(redis, config));

  fastify.addHook('onClose', async () => {
    await redis.quit();
    fastify.log.info('Redis disconnected');
  });
}

export default fp(storagePlugin, {
  name: 'storage',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.stores` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    stores: Stores;
    settings: AppConfig;
  }
}
