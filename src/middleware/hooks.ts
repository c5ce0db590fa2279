import { randomUUID } from 'crypto';
import type { FastifyReply, FastifyRequest } from 'fastify';

export const REQUEST_ID_HEADER = 'x-request-id';

export const CORS_HEADERS = {
  'access-control-allow-origin': '*',
  'access-control-allow-methods': 'GET,POST,PUT,PATCH,DELETE',
  'access-control-allow-headers': 'Content-Type,Authorization',
} as const;

/**
 * onRequest: tag the request and its response with an id, keeping one the
 * caller already sent.
 */
export async function assignRequestId(request: FastifyRequest, reply: FastifyReply): Promise<void> {
  const incoming = request.headers[REQUEST_ID_HEADER];
  request.requestId = typeof incoming === 'string' && incoming !== '' ? incoming : randomUUID();
  void reply.header(REQUEST_ID_HEADER, request.requestId);
}

/**
 * onSend: permissive CORS on every reply, errors and 404s included.
 */
export async function addCorsHeaders(
  _request: FastifyRequest,
  reply: FastifyReply,
  payload: unknown
): Promise<unknown> {
  void reply.headers(CORS_HEADERS);
  return payload;
}

declare module 'fastify' {
  interface FastifyRequest {
    requestId: string;
  }
}
