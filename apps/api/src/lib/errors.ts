import type { FastifyError } from 'fastify';
import { formatProblemCode, type FailureReason } from '@judgebot/shared';

export class AppError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly statusCode: number = 400,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }

  toJSON() {
    return {
      error: {
        code: this.code,
        message: this.message,
        ...(this.details && { details: this.details }),
      },
    };
  }
}

// Common error types
export class NotFoundError extends AppError {
  constructor(resource: string, id?: string) {
    super(
      'NOT_FOUND',
      id ? `${resource} with id '${id}' not found` : `${resource} not found`,
      404
    );
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Authentication required') {
    super('UNAUTHORIZED', message, 401);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', message, 400, details);
  }
}

// Judge-side errors raised by the submission client and verdict poller.
// `reason` is the outcome the coordinator reports for them.
export abstract class JudgeError extends AppError {
  abstract readonly reason: FailureReason;
  abstract readonly retryable: boolean;
}

export class JudgeAuthError extends JudgeError {
  readonly reason = 'AUTH_FAILURE';
  readonly retryable = false;

  constructor(judge: string) {
    super(
      'AUTH_FAILURE',
      `The judge rejected your ${judge} credentials. Link your account again with fresh credentials.`,
      401
    );
  }
}

export class JudgeUploadError extends JudgeError {
  readonly reason = 'UPLOAD_FAILURE';
  readonly retryable = true;

  constructor(message: string) {
    super('UPLOAD_FAILURE', message, 502);
  }
}

export class InvalidProblemError extends JudgeError {
  readonly reason = 'INVALID_PROBLEM';
  readonly retryable = false;

  constructor(judge: string, problemId: string) {
    super('INVALID_PROBLEM', `The judge does not know problem ${formatProblemCode(judge, problemId)}`, 422);
  }
}

// HTTP status for each failed submission outcome
export const FAILURE_STATUS_CODES: Record<FailureReason, number> = {
  NOT_FOUND: 404,
  AUTH_FAILURE: 401,
  UPLOAD_FAILURE: 502,
  INVALID_PROBLEM: 422,
  BUSY: 409,
  TIMED_OUT: 504,
  CANCELLED: 503,
};

// Error handler for Fastify
export function formatError(error: FastifyError | AppError | Error) {
  if (error instanceof AppError) {
    return error.toJSON();
  }

  // Handle Fastify validation errors
  if ('validation' in error && error.validation) {
    return {
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Request validation failed',
        details: {
          issues: error.validation,
        },
      },
    };
  }

  // Fastify client errors (malformed JSON, unsupported media type)
  if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode < 500) {
    return {
      error: {
        code: 'BAD_REQUEST',
        message: error.message,
      },
    };
  }

  // Generic error
  return {
    error: {
      code: 'INTERNAL_ERROR',
      message:
        process.env.NODE_ENV === 'production'
          ? 'An unexpected error occurred'
          : error.message,
    },
  };
}
