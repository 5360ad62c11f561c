/**
 * Prometheus metrics endpoint
 *
 * Exposes /api/metrics in Prometheus format for scraping by monitoring systems.
 */

import { FastifyInstance } from 'fastify';

import { getMetrics, getMetricsContentType } from '../lib/metrics';

export async function metricsRoutes(app: FastifyInstance) {
  /**
   * GET /api/metrics
   *
   * Returns all metrics in Prometheus exposition format.
   */
  app.get('/api/metrics', async (request, reply) => {
    const metrics = await getMetrics();

    return reply.header('Content-Type', getMetricsContentType()).send(metrics);
  });
}
