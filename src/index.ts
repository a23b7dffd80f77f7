// src/index.ts
import Fastify from 'fastify';
import env from '@fastify/env';
import { createServices, registerRoutes } from './app.js';
import { envSchema, toAppConfig } from './config.js';
import { errorMessage } from './errors.js';

async function start() {
  const app = Fastify({ logger: { level: process.env.LOG_LEVEL || 'info' } });

  await app.register(env, { dotenv: true, schema: envSchema });
  const config = toAppConfig(app.config);
  const services = createServices(config, app.log);
  await registerRoutes(app, services);

  const address = await app.listen({ port: app.config.PORT, host: app.config.HOST });
  app.log.info(`Listening on ${address}`);

  // serve right away; the first resync fills the cache in the background
  services.orchestrator
    .refresh('startup')
    .then((outcome) => {
      app.log.info({ outcome: outcome.status }, 'Startup refresh finished');
    })
    .catch((err: unknown) => {
      app.log.error({ err: errorMessage(err) }, 'Startup refresh failed');
    });
  services.scheduler.start();

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, 'Shutting down');
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ err: errorMessage(err) }, 'Error during shutdown');
          process.exit(1);
        }
      );
    });
  }
}

start().catch((err) => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
