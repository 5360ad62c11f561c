import { FastifyInstance } from 'fastify';

import { credentialRoutes } from './credentials';
import { healthRoutes } from './health';
import { leaderboardRoutes } from './leaderboard';
import { metricsRoutes } from './metrics';
import { submissionRoutes } from './submissions';

export async function registerRoutes(app: FastifyInstance) {
  // Health check routes
  await app.register(healthRoutes);

  // Prometheus scrape endpoint
  await app.register(metricsRoutes);

  // Account linking
  await app.register(credentialRoutes);

  // Submit and wait for the verdict
  await app.register(submissionRoutes);

  // Leaderboard and solve history
  await app.register(leaderboardRoutes);
}
