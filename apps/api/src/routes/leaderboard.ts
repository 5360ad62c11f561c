/**
 * Leaderboard Routes
 *
 * Endpoints:
 * - GET /api/leaderboard?judge= - Ranked users, optionally for one judge
 * - GET /api/users/:userId/solves?limit= - A user's recent solve records
 */

import { FastifyInstance, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { LeaderboardResponse } from '@judgebot/shared';

import { ValidationError } from '../lib/errors';
import { toLeaderboardEntryDto, toSolveRecordDto } from './dto';
import { judgeSchema, userIdSchema } from './params';

const leaderboardQuerySchema = z.object({
  judge: judgeSchema.optional(),
});

const solvesParamsSchema = z.object({
  userId: userIdSchema,
});

const solvesQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export async function leaderboardRoutes(app: FastifyInstance) {
  const { results } = app.services;

  app.get('/api/leaderboard', async (request: FastifyRequest): Promise<LeaderboardResponse> => {
    const queryResult = leaderboardQuerySchema.safeParse(request.query);
    if (!queryResult.success) {
      throw new ValidationError('Invalid query parameters', {
        issues: queryResult.error.issues,
      });
    }

    const { judge } = queryResult.data;
    const entries = await results.leaderboard(judge);

    return {
      judge: judge ?? null,
      entries: entries.map(toLeaderboardEntryDto),
    };
  });

  app.get('/api/users/:userId/solves', async (request: FastifyRequest) => {
    const paramResult = solvesParamsSchema.safeParse(request.params);
    if (!paramResult.success) {
      throw new ValidationError('Invalid user', { issues: paramResult.error.issues });
    }

    const queryResult = solvesQuerySchema.safeParse(request.query);
    if (!queryResult.success) {
      throw new ValidationError('Invalid query parameters', {
        issues: queryResult.error.issues,
      });
    }

    const { userId } = paramResult.data;
    const [solved, history] = await Promise.all([
      results.solvedCount(userId),
      results.history(userId, queryResult.data.limit),
    ]);

    return {
      userId,
      solved,
      solves: history.map(toSolveRecordDto),
    };
  });
}
