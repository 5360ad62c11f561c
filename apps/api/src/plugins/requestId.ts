/**
 * Request ID Plugin
 *
 * Provides:
 * - Request ID propagation (X-Request-ID in, X-Request-ID out)
 * - Request-scoped child logger carrying the request ID
 * - Completion logging with timing
 */

import { randomUUID } from 'crypto';
import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

import { createContextLogger } from '../lib/logger';

declare module 'fastify' {
  interface FastifyRequest {
    startTime: bigint;
  }
}

export const REQUEST_ID_HEADER = 'x-request-id';

/**
 * Reuse the caller's request ID when it looks sane, otherwise mint one
 */
export function resolveRequestId(header: string | string[] | undefined): string {
  const value = Array.isArray(header) ? header[0] : header;
  if (value && /^[\w.:-]{1,128}$/.test(value)) {
    return value;
  }
  return randomUUID();
}

export async function registerRequestId(app: FastifyInstance) {
  app.decorateRequest('startTime', 0n);

  app.addHook('onRequest', async (request: FastifyRequest, reply: FastifyReply) => {
    request.startTime = process.hrtime.bigint();
    reply.header('X-Request-ID', request.id);
    request.log = createContextLogger({ requestId: request.id });
  });

  // Log request completion with timing
  app.addHook('onResponse', async (request: FastifyRequest, reply: FastifyReply) => {
    const duration = Number(process.hrtime.bigint() - request.startTime) / 1e6;

    const logData = {
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      durationMs: Math.round(duration * 100) / 100,
    };

    if (reply.statusCode >= 500) {
      request.log.error(logData, 'Request completed with server error');
    } else if (reply.statusCode >= 400) {
      request.log.warn(logData, 'Request completed with client error');
    } else {
      request.log.info(logData, 'Request completed');
    }
  });
}
