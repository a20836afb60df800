import type { FastifyInstance } from 'fastify';
import type { ItemStore } from '../contracts/itemStore';
import { htmlResponder, sendHtml } from '../negotiation/negotiate';
import { renderCreateForm, renderHomePage } from '../views/pages';

export async function registerPageRoutes(app: FastifyInstance, store: ItemStore) {
  app.get('/', async (_req, reply) => sendHtml(reply, renderHomePage()));

  app.get('/items', async (_req, reply) => {
    const items = await store.list();
    return htmlResponder.list(reply, items);
  });

  app.get('/create', async (_req, reply) => sendHtml(reply, renderCreateForm({ name: '', isActive: false })));
}
