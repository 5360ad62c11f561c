import { FastifyInstance } from 'fastify';
import { ZodError } from 'zod';

import { AppError, ValidationError, formatError } from '../lib/errors';

export async function registerErrorHandler(app: FastifyInstance) {
  // Global error handler
  app.setErrorHandler((rawError, request, reply) => {
    const error =
      rawError instanceof ZodError
        ? new ValidationError('Invalid request', { issues: rawError.issues })
        : rawError;

    // Determine status code
    const statusCode =
      error instanceof AppError ? error.statusCode : (rawError.statusCode ?? 500);

    if (statusCode < 500) {
      request.log.warn({ err: error }, 'Client error');
    } else {
      request.log.error({ err: error }, 'Server error');
    }

    return reply.status(statusCode).send(formatError(error));
  });

  // Not found handler
  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      error: {
        code: 'NOT_FOUND',
        message: `Route ${request.method} ${request.url} not found`,
      },
    });
  });
}
