import { FastifyInstance } from 'fastify';

interface HealthResponse {
  status: 'ok' | 'degraded' | 'unhealthy';
  timestamp: string;
  version: string;
  uptime: number;
  checks?: Record<string, boolean>;
  inFlight?: number;
}

export async function healthRoutes(app: FastifyInstance) {
  const { healthChecks, coordinator } = app.services;

  // Simple health check - always returns 200 if server is up
  app.get('/api/health', async (): Promise<HealthResponse> => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || '0.1.0',
      uptime: process.uptime(),
    };
  });

  // Readiness check - verifies the database and lease store
  app.get('/api/health/ready', async (request, reply): Promise<HealthResponse> => {
    const names = Object.keys(healthChecks);
    const results = await Promise.all(names.map((name) => healthChecks[name]()));
    const checks = Object.fromEntries(names.map((name, index) => [name, results[index]]));

    const isHealthy = results.every(Boolean);
    if (!isHealthy) {
      reply.status(503);
    }

    return {
      status: isHealthy ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || '0.1.0',
      uptime: process.uptime(),
      checks,
      inFlight: coordinator.inFlight(),
    };
  });

  // Liveness probe - just confirms the process is running
  app.get('/api/health/live', async () => {
    return { status: 'alive' };
  });
}
