import { randomUUID } from 'crypto';
import type { FastifyReply, FastifyRequest, HookHandlerDoneFunction } from 'fastify';

export const CORRELATION_ID_HEADER = 'x-correlation-id';

export function resolveCorrelationId(header: string | string[] | undefined): string {
  const value = Array.isArray(header) ? header[0] : header;
  return value && value.trim() ? value : randomUUID();
}

/**
 * Fastify `onRequest` hook. Runs before routing and guards, so unknown routes
 * and throttled requests carry the header too. The resolved id is written back
 * to the request headers for LoggingInterceptor.
 */
export function correlationIdHook(
  request: Pick<FastifyRequest, 'headers'>,
  reply: Pick<FastifyReply, 'header'>,
  done: HookHandlerDoneFunction,
): void {
  const correlationId = resolveCorrelationId(request.headers[CORRELATION_ID_HEADER]);
  request.headers[CORRELATION_ID_HEADER] = correlationId;
  reply.header(CORRELATION_ID_HEADER, correlationId);
  done();
}
