import type { IncomingHttpHeaders } from 'http';
import type { FastifyReply } from 'fastify';
import { config } from '../config';
import type { ErrorResponse, ItemRequestError } from '../contracts/errors';
import { isFormContentType } from '../validation/newItem';
import { renderCreateForm, renderItemsPage } from '../views/pages';
import { toItemJson, type Item, type NewItemInput } from '../types';

export type ResponseFormat = 'json' | 'html';

type NegotiationHeaders = Pick<IncomingHttpHeaders, 'accept' | 'content-type'>;

interface AcceptedMediaType {
  mediaType: string;
  quality: number;
}

function parseQuality(params: string[]): number {
  const q = params.map((param) => /^\s*q\s*=\s*([\d.]+)\s*$/.exec(param)).find((match) => match !== null);
  if (!q) return 1;
  const quality = Number(q[1]);
  return Number.isFinite(quality) ? quality : 1;
}

/** Accepted media types, highest quality first; equal qualities keep header order. */
function acceptedMediaTypes(accept: string | undefined): AcceptedMediaType[] {
  if (!accept) return [];
  return accept
    .split(',')
    .map((entry) => entry.split(';'))
    .map(([mediaType, ...params]) => ({ mediaType: mediaType.trim().toLowerCase(), quality: parseQuality(params) }))
    .filter((entry) => entry.quality > 0)
    .sort((a, b) => b.quality - a.quality);
}

const isJsonMediaType = (mediaType: string) =>
  mediaType === 'application/json' || mediaType.endsWith('+json');

/**
 * Decides once per request whether the caller wants JSON or HTML.
 * Whichever of JSON or `text/html` ranks higher in Accept wins; without
 * either, a form-urlencoded submission is treated as a browser and
 * everything else as an API client.
 */
export function negotiate(headers: NegotiationHeaders): ResponseFormat {
  const accepted = acceptedMediaTypes(headers.accept);
  const preferred = accepted.find(({ mediaType }) => isJsonMediaType(mediaType) || mediaType === 'text/html');
  if (preferred) return preferred.mediaType === 'text/html' ? 'html' : 'json';

  return isFormContentType(headers['content-type']) ? 'html' : 'json';
}

/** One rendering strategy per format; handlers never branch on the format themselves. */
export interface Responder {
  readonly format: ResponseFormat;
  list(reply: FastifyReply, items: Item[]): FastifyReply;
  created(reply: FastifyReply, item: Item): FastifyReply;
  /** Answers a create whose payload failed binding or validation. */
  rejected(reply: FastifyReply, input: NewItemInput, error: ItemRequestError): FastifyReply;
}

export const jsonResponder: Responder = {
  format: 'json',
  list: (reply, items) => reply.code(200).send(items.map(toItemJson)),
  created: (reply, item) => reply.code(201).send(toItemJson(item)),
  rejected: (reply, _input, error) => {
    const body: ErrorResponse = { error: `Invalid input: ${error.message}` };
    return reply.code(error.statusCode).send(body);
  },
};

export const htmlResponder: Responder = {
  format: 'html',
  list: (reply, items) => sendHtml(reply, renderItemsPage(items)),
  // post/redirect/get back to the list page
  created: (reply) => reply.code(302).redirect(config.listPagePath),
  // status stays 200; the banner in the form carries the error
  rejected: (reply, input, error) => sendHtml(reply, renderCreateForm(input, error.message)),
};

export function responderFor(format: ResponseFormat): Responder {
  return format === 'json' ? jsonResponder : htmlResponder;
}

export function sendHtml(reply: FastifyReply, html: string): FastifyReply {
  return reply.code(200).type('text/html; charset=utf-8').send(html);
}
