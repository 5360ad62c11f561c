/**
 * Fastify plugin for automatic HTTP metrics collection
 *
 * Instruments all HTTP requests with:
 * - Request count (by method, route, status)
 * - Request duration histogram
 */

import { FastifyInstance } from 'fastify';

import { recordHttpRequest } from '../lib/metrics';

export async function registerMetrics(app: FastifyInstance) {
  app.addHook('onResponse', async (request, reply) => {
    const durationSeconds = Number(process.hrtime.bigint() - request.startTime) / 1_000_000_000;

    // Route pattern keeps label cardinality bounded; unmatched URLs share one label
    const route = request.routeOptions.url || 'unmatched';

    recordHttpRequest(request.method, route, reply.statusCode, durationSeconds);
  });
}
