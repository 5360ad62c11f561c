import 'dotenv/config';

import { buildApp } from './app';
import { closeDatabaseConnection } from './db';
import { env } from './lib/env';
import { logger } from './lib/logger';
import { closeRedis } from './lib/redis';
import { createServices } from './lib/services';

const PORT = parseInt(env.PORT, 10);
const HOST = env.HOST;

async function start() {
  const services = createServices();
  const app = await buildApp(services, { apiKey: env.DISPATCHER_API_KEY });

  // Graceful shutdown handling
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  let shuttingDown = false;

  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down gracefully...`);

    try {
      // In-flight submissions report CANCELLED and release their leases
      services.coordinator.shutdown();
      await app.close();
      await closeRedis();
      await closeDatabaseConnection();
      logger.info('Server closed successfully');
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
  };

  for (const signal of signals) {
    process.on(signal, () => {
      void shutdown(signal);
    });
  }

  // Handle uncaught exceptions
  process.on('uncaughtException', (err) => {
    logger.fatal({ err }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ reason }, 'Unhandled rejection');
    process.exit(1);
  });

  try {
    await app.listen({ port: PORT, host: HOST });
    logger.info(`judgebot API running on http://${HOST}:${PORT}`);
    logger.info(`Environment: ${env.NODE_ENV}`);
  } catch (err) {
    logger.fatal({ err }, 'Failed to start server');
    process.exit(1);
  }
}

start().catch((err) => {
  logger.fatal({ err }, 'Failed to start server');
  process.exit(1);
});
