import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { ItemRequestError, type ErrorResponse } from '../contracts/errors';
import type { ItemStore } from '../contracts/itemStore';
import { bodyBindingError, sendFailure } from '../errorHandler';
import { negotiate, responderFor } from '../negotiation/negotiate';
import { bindNewItemInput, validateNewItem } from '../validation/newItem';
import { toItemJson, type ItemId } from '../types';

// ---------- Schemas ----------
const itemParamsSchema = z.object({ itemId: z.string() });

// ---------- Helpers ----------
export function parseItemId(raw: string): ItemId | null {
  if (!/^[+-]?\d+$/.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) ? id : null;
}

function readItemId(params: unknown): ItemId | ItemRequestError {
  const parsed = itemParamsSchema.safeParse(params);
  const id = parsed.success ? parseItemId(parsed.data.itemId) : null;
  return id === null ? new ItemRequestError('malformed_identifier', 'Invalid item ID format') : id;
}

const notFound = (id: ItemId) => new ItemRequestError('not_found', `Item ${id} not found`);

function sendError(reply: FastifyReply, error: ItemRequestError) {
  const body: ErrorResponse = { error: error.message };
  return reply.code(error.statusCode).send(body);
}

// ---------- Routes ----------
export async function registerItemRoutes(app: FastifyInstance, store: ItemStore) {
  // List: JSON array, or the HTML table when the caller asks for a page
  app.get('/api/v1/items', async (req, reply) => {
    const items = await store.list();
    return responderFor(negotiate(req.headers)).list(reply, items);
  });

  // Read (JSON only)
  app.get('/api/v1/items/:itemId', async (req, reply) => {
    const id = readItemId(req.params);
    if (id instanceof ItemRequestError) return sendError(reply, id);

    const item = await store.get(id);
    if (!item) return sendError(reply, notFound(id));
    return reply.send(toItemJson(item));
  });

  // Create: JSON body or HTML form submit.
  // A body the parser rejects is a binding failure, answered in the caller's format.
  const createErrorHandler = (err: FastifyError, req: FastifyRequest, reply: FastifyReply) => {
    const error = bodyBindingError(err, req.headers['content-type']);
    if (!error) return sendFailure(err, req, reply);

    const responder = responderFor(negotiate(req.headers));
    req.log.info({ code: error.code, format: responder.format }, error.message);
    return responder.rejected(reply, { name: '', isActive: false }, error);
  };

  app.post('/api/v1/items', { errorHandler: createErrorHandler }, async (req, reply) => {
    const responder = responderFor(negotiate(req.headers));

    const bound = bindNewItemInput(req.body, req.headers['content-type']);
    if (!bound.ok) {
      req.log.info({ code: 'binding_failed', format: responder.format }, bound.message);
      return responder.rejected(reply, bound.input, new ItemRequestError('binding_failed', bound.message));
    }

    const validated = validateNewItem(bound.input);
    if (!validated.ok) {
      const { field, kind, message } = validated.failure;
      req.log.info({ code: 'validation_failed', field, kind, format: responder.format }, message);
      return responder.rejected(reply, bound.input, new ItemRequestError('validation_failed', message));
    }

    const item = await store.create(validated.value);
    req.log.info({ itemId: item.id }, 'Item created');
    return responder.created(reply, item);
  });

  // Delete (JSON only)
  app.delete('/api/v1/items/:itemId', async (req, reply) => {
    const id = readItemId(req.params);
    if (id instanceof ItemRequestError) return sendError(reply, id);

    const removed = await store.delete(id);
    if (!removed) return sendError(reply, notFound(id));

    req.log.info({ itemId: id }, 'Item deleted');
    return reply.send({ message: 'Item deleted successfully', id: String(id) });
  });
}
