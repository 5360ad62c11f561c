/**
 * Submission Routes
 *
 * Endpoints:
 * - POST /api/submissions - Submit code and wait for the verdict
 *
 * The request stays open until the judge answers or the polling budget runs
 * out. Failed outcomes map to an HTTP status; the body carries the
 * user-facing message.
 */

import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import {
  formatProblemCode,
  formatSolveCount,
  formatVerdict,
  type FailedResponse,
  type JudgedResponse,
  type SubmitRequest,
} from '@judgebot/shared';

import { FAILURE_STATUS_CODES, ValidationError } from '../lib/errors';
import { toSolveRecordDto } from './dto';
import { judgeSchema, problemIdSchema, userIdSchema } from './params';

// 64 KiB, the common judge source size limit
const MAX_SOURCE_LENGTH = 65536;

const submitBodySchema = z.object({
  userId: userIdSchema,
  judge: judgeSchema,
  problemId: problemIdSchema,
  language: z.string().trim().min(1).max(100),
  code: z.string().min(1).max(MAX_SOURCE_LENGTH),
  displayName: z.string().trim().min(1).max(100).optional(),
}) satisfies z.ZodType<SubmitRequest>;

export async function submissionRoutes(app: FastifyInstance) {
  const { coordinator } = app.services;

  app.post('/api/submissions', async (request: FastifyRequest, reply: FastifyReply) => {
    const bodyResult = submitBodySchema.safeParse(request.body);
    if (!bodyResult.success) {
      throw new ValidationError('Invalid request body', {
        issues: bodyResult.error.issues.map(({ path, message }) => ({ path, message })),
      });
    }

    const { code, ...rest } = bodyResult.data;
    const outcome = await coordinator.submit({ ...rest, sourceCode: code });

    if (outcome.status === 'failed') {
      const failure: FailedResponse = {
        error: {
          code: outcome.reason,
          message: outcome.message,
          details: {
            retryable: outcome.retryable,
            ...(outcome.handle && { handle: outcome.handle }),
          },
        },
      };
      return reply.status(FAILURE_STATUS_CODES[outcome.reason]).send(failure);
    }

    const { judge, problemId } = outcome.record;
    let message = `${formatVerdict(outcome.verdict)} on ${formatProblemCode(judge, problemId)}.`;
    if (outcome.newlySolved) {
      message += ` You now have ${formatSolveCount(outcome.solvedCount)}.`;
    }

    const response: JudgedResponse = {
      status: 'judged',
      verdict: outcome.verdict,
      handle: outcome.handle,
      problemUrl: outcome.problemUrl,
      record: toSolveRecordDto(outcome.record),
      newlySolved: outcome.newlySolved,
      solvedCount: outcome.solvedCount,
      message,
    };
    return reply.send(response);
  });
}
