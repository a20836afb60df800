import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ItemRequestError, type ErrorResponse } from './contracts/errors';

/**
 * Maps a failure raised by Fastify's body parsing (bad JSON, empty JSON body,
 * unsupported content type) to a `binding_failed` error. Returns `null` for
 * anything else.
 */
export function bodyBindingError(err: FastifyError, contentType: string | undefined): ItemRequestError | null {
  if (err instanceof SyntaxError) {
    return new ItemRequestError('binding_failed', 'request body is not valid JSON');
  }
  switch (err.code) {
    case 'FST_ERR_CTP_EMPTY_JSON_BODY':
      return new ItemRequestError('binding_failed', 'request body is required');
    case 'FST_ERR_CTP_INVALID_MEDIA_TYPE':
      return new ItemRequestError('binding_failed', `unsupported content type: ${contentType ?? 'none'}`);
    default:
      return err.code?.startsWith('FST_ERR_CTP_') ? new ItemRequestError('binding_failed', err.message) : null;
  }
}

/** Answers any failure that escaped a handler with the `{ error }` shape. */
export function sendFailure(err: FastifyError, req: FastifyRequest, reply: FastifyReply) {
  const statusCode = err.statusCode && err.statusCode >= 400 ? err.statusCode : 500;
  if (statusCode >= 500) {
    req.log.error({ err }, 'Request failed');
  }
  const body: ErrorResponse = { error: statusCode >= 500 ? 'Internal Server Error' : err.message };
  return reply.code(statusCode).send(body);
}
