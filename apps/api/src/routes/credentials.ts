/**
 * Credential Routes
 *
 * Link, list and unlink a user's judge accounts. Secrets go in and never
 * come back out.
 *
 * Endpoints:
 * - PUT /api/users/:userId/credentials/:judge - Link (or re-link) an account
 * - GET /api/users/:userId/credentials - List linked judges
 * - DELETE /api/users/:userId/credentials/:judge - Unlink
 */

import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { LinkCredentialRequest } from '@judgebot/shared';

import { NotFoundError, ValidationError } from '../lib/errors';
import { auditLog } from '../lib/logger';
import { judgeSchema, userIdSchema } from './params';

const userParamsSchema = z.object({
  userId: userIdSchema,
});

const credentialParamsSchema = z.object({
  userId: userIdSchema,
  judge: judgeSchema,
});

const linkBodySchema = z.object({
  username: z.string().trim().min(1).max(255),
  secret: z.string().min(1).max(500),
  displayName: z.string().trim().min(1).max(100).optional(),
}) satisfies z.ZodType<LinkCredentialRequest>;

export async function credentialRoutes(app: FastifyInstance) {
  const { credentials } = app.services;

  app.put(
    '/api/users/:userId/credentials/:judge',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const paramResult = credentialParamsSchema.safeParse(request.params);
      if (!paramResult.success) {
        throw new ValidationError('Invalid user or judge', {
          issues: paramResult.error.issues,
        });
      }

      const bodyResult = linkBodySchema.safeParse(request.body);
      if (!bodyResult.success) {
        // Issues only name the failing fields, never their values
        throw new ValidationError('Invalid request body', {
          issues: bodyResult.error.issues.map(({ path, message }) => ({ path, message })),
        });
      }

      const { userId, judge } = paramResult.data;
      const { username, secret, displayName } = bodyResult.data;

      await credentials.save(userId, judge, username, secret, displayName);
      auditLog('credential.link', { userId, targetId: judge, result: 'success' });

      return reply.status(204).send();
    }
  );

  app.get('/api/users/:userId/credentials', async (request: FastifyRequest) => {
    const paramResult = userParamsSchema.safeParse(request.params);
    if (!paramResult.success) {
      throw new ValidationError('Invalid user', { issues: paramResult.error.issues });
    }

    const { userId } = paramResult.data;
    return { userId, judges: await credentials.listJudges(userId) };
  });

  app.delete(
    '/api/users/:userId/credentials/:judge',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const paramResult = credentialParamsSchema.safeParse(request.params);
      if (!paramResult.success) {
        throw new ValidationError('Invalid user or judge', {
          issues: paramResult.error.issues,
        });
      }

      const { userId, judge } = paramResult.data;
      const removed = await credentials.remove(userId, judge);
      if (!removed) {
        auditLog('credential.unlink', { userId, targetId: judge, result: 'failure', reason: 'not linked' });
        throw new NotFoundError('Linked judge', judge);
      }

      auditLog('credential.unlink', { userId, targetId: judge, result: 'success' });
      return reply.status(204).send();
    }
  );
}
