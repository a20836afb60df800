import Fastify, { type FastifyServerOptions } from 'fastify';
import formbody from '@fastify/formbody';
import type { ErrorResponse } from './contracts/errors';
import type { ItemStore } from './contracts/itemStore';
import { sendFailure } from './errorHandler';
import { registerItemRoutes } from './routes/items';
import { registerPageRoutes } from './routes/pages';
import { MemoryItemStore } from './storage/memoryItemStore';

export interface BuildAppOptions {
  store?: ItemStore;
  logger?: FastifyServerOptions['logger'];
}

export async function buildApp(options: BuildAppOptions = {}) {
  const app = Fastify({ logger: options.logger ?? false });
  const store = options.store ?? new MemoryItemStore();

  await app.register(formbody);

  app.setErrorHandler(sendFailure);

  app.setNotFoundHandler((req, reply) => {
    const body: ErrorResponse = { error: `Route ${req.method} ${req.url} not found` };
    return reply.code(404).send(body);
  });

  app.get('/health', async () => ({ status: 'ok', items: await store.count() }));

  await registerPageRoutes(app, store);
  await registerItemRoutes(app, store);
  return app;
}
