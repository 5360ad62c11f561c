import helmet from '@fastify/helmet';
import Fastify, {
  FastifyBaseLogger,
  FastifyInstance,
  RawReplyDefaultExpression,
  RawRequestDefaultExpression,
  RawServerDefault,
} from 'fastify';

import type { AppServices } from './lib/services';
import { logger } from './lib/logger';
import {
  REQUEST_ID_HEADER,
  registerApiKey,
  registerErrorHandler,
  registerMetrics,
  registerRequestId,
  resolveRequestId,
} from './plugins';
import { registerRoutes } from './routes';

declare module 'fastify' {
  interface FastifyInstance {
    services: AppServices;
  }
}

export interface AppOptions {
  apiKey?: string;
}

export async function buildApp(services: AppServices, options: AppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify<RawServerDefault, RawRequestDefaultExpression, RawReplyDefaultExpression, FastifyBaseLogger>({
    logger,
    requestIdHeader: false,
    genReqId: (req) => resolveRequestId(req.headers[REQUEST_ID_HEADER]),
    disableRequestLogging: true,
  });

  app.decorate('services', services);

  // Register plugins
  await app.register(helmet, { global: true });
  await registerRequestId(app);
  await registerMetrics(app);
  await registerApiKey(app, options.apiKey);
  await registerErrorHandler(app);

  // Register routes
  await registerRoutes(app);

  return app;
}
