import { buildApp } from './app.js';
import { loadConfig } from './infrastructure/index.js';

/**
 * Bootstrap the hooklog server.
 *
 * Order:
 * 1) Configuration (fails fast on invalid env)
 * 2) App assembly (storage backend + routes)
 * 3) Shutdown hooks
 * 4) listen()
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const fastify = await buildApp(config);

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      fastify.log.info({ signal }, 'Shutting down');
      fastify.close().then(
        () => process.exit(0),
        (err: unknown) => {
          fastify.log.error({ err }, 'Failed to close server');
          process.exit(1);
        },
      );
    });
  }

  await fastify.listen({
    host: config.host,
    port: config.port,
  });
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);

});
