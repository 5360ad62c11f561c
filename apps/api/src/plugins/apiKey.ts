/**
 * Dispatcher authentication
 *
 * When an API key is configured every route except health and metrics
 * requires `Authorization: Bearer <key>`. Without a key the API trusts its
 * network.
 */

import { createHash, timingSafeEqual } from 'crypto';
import { FastifyInstance } from 'fastify';

import { UnauthorizedError } from '../lib/errors';

const PUBLIC_PREFIXES = ['/api/health', '/api/metrics'];

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

export function isAuthorized(header: string | undefined, apiKey: string): boolean {
  if (!header?.startsWith('Bearer ')) return false;
  return timingSafeEqual(digest(header.slice('Bearer '.length)), digest(apiKey));
}

export async function registerApiKey(app: FastifyInstance, apiKey?: string) {
  if (!apiKey) {
    app.log.warn('DISPATCHER_API_KEY not set; API is unauthenticated');
    return;
  }

  app.addHook('onRequest', async (request) => {
    if (PUBLIC_PREFIXES.some((prefix) => request.url.startsWith(prefix))) {
      return;
    }
    if (!isAuthorized(request.headers.authorization, apiKey)) {
      throw new UnauthorizedError('Missing or invalid API key');
    }
  });
}
