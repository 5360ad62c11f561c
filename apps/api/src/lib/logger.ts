/**
 * Structured Logging Module
 *
 * Provides:
 * - Structured JSON logging with pino
 * - Sensitive data redaction (judge passwords never reach a log line)
 * - Context field support (requestId, userId, judge, problemId, handle)
 */

import pino, { Logger as PinoLogger } from 'pino';
import { env } from './env';

// Sensitive field patterns to redact
const REDACT_PATHS = [
  'password',
  'secret',
  'token',
  'apiKey',
  'authorization',
  'credential.secret',
  'req.headers.authorization',
  '*.password',
  '*.secret',
  '*.token',
  '*.apiKey',
];

function resolveLevel(): pino.LevelWithSilent {
  if (env.LOG_LEVEL) return env.LOG_LEVEL;
  return env.NODE_ENV === 'production' ? 'info' : 'debug';
}

const baseConfig: pino.LoggerOptions = {
  level: resolveLevel(),

  redact: {
    paths: REDACT_PATHS,
    censor: '[REDACTED]',
  },

  base: {
    env: env.NODE_ENV,
    service: 'judgebot-api',
    version: process.env.npm_package_version || '0.1.0',
  },

  serializers: {
    err: pino.stdSerializers.err,
  },

  formatters: {
    level: (label) => ({ level: label }),
  },

  timestamp: pino.stdTimeFunctions.isoTime,
};

// Development transport for pretty printing
const devTransport: pino.TransportSingleOptions = {
  target: 'pino-pretty',
  options: {
    colorize: true,
    translateTime: 'SYS:standard',
    ignore: 'pid,hostname,service,version',
    errorLikeObjectKeys: ['err', 'error'],
  },
};

export const logger = pino({
  ...baseConfig,
  transport: env.NODE_ENV === 'development' ? devTransport : undefined,
});

export type Logger = PinoLogger;

/**
 * Context fields that can be added to log entries
 */
export interface LogContext {
  requestId?: string;
  userId?: string;
  judge?: string;
  problemId?: string;
  handle?: string;
  [key: string]: string | number | boolean | undefined;
}

/**
 * Create a child logger with context fields
 */
export function createContextLogger(context: LogContext, parent: Logger = logger): Logger {
  return parent.child(context);
}

/**
 * Audit log for credential changes
 */
export function auditLog(
  action: string,
  details: {
    userId: string;
    targetId?: string;
    result: 'success' | 'failure';
    reason?: string;
  }
) {
  logger.child({ audit: true }).info({ action, ...details }, `AUDIT: ${action} - ${details.result}`);
}
