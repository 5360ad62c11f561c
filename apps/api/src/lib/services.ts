/**
 * Service wiring
 *
 * Builds the stores, judge client and coordinator from the environment.
 * Routes only see the `AppServices` interface, so tests hand in in-memory
 * stores and a scripted judge instead.
 */

import { checkDatabaseConnection, db } from '../db';
import { CredentialStore, DrizzleCredentialStore } from './credential-store';
import { env, getOjCommandArgs } from './env';
import { InMemoryLeaseStore, LeaseStore, RedisLeaseStore } from './lease';
import { logger } from './logger';
import { OjJudgeClient } from './oj-client';
import { checkRedisConnection } from './redis';
import { DrizzleResultsStore, ResultsStore } from './results-store';
import { SecretBox } from './secret-box';
import { CoordinatorConfig, SubmissionCoordinator } from './submission-coordinator';

export type HealthCheck = () => Promise<boolean>;

export interface AppServices {
  credentials: CredentialStore;
  results: ResultsStore;
  coordinator: SubmissionCoordinator;
  healthChecks: Record<string, HealthCheck>;
}

const SUBMIT_RETRY_MAX_MS = 30000;

export function coordinatorConfigFromEnv(): CoordinatorConfig {
  const submitRetry = {
    initialMs: env.SUBMIT_RETRY_INITIAL_MS,
    multiplier: 2,
    maxMs: SUBMIT_RETRY_MAX_MS,
  };

  // login + submit per attempt, a backoff between attempts, then the poll budget
  const uploadBudgetMs =
    env.SUBMIT_MAX_ATTEMPTS * (2 * env.OJ_COMMAND_TIMEOUT_MS + SUBMIT_RETRY_MAX_MS);
  const pollBudgetMs = env.POLL_DEADLINE_MS + env.OJ_COMMAND_TIMEOUT_MS;

  return {
    submitMaxAttempts: env.SUBMIT_MAX_ATTEMPTS,
    submitRetry,
    polling: {
      initialMs: env.POLL_INITIAL_MS,
      multiplier: env.POLL_MULTIPLIER,
      maxMs: env.POLL_MAX_MS,
      deadlineMs: env.POLL_DEADLINE_MS,
    },
    maxStatusErrors: env.POLL_MAX_STATUS_ERRORS,
    leaseTtlSeconds: Math.ceil((uploadBudgetMs + pollBudgetMs) / 1000),
  };
}

export function createServices(): AppServices {
  const credentials = new DrizzleCredentialStore(db, new SecretBox(env.CREDENTIAL_ENCRYPTION_KEY));
  const results = new DrizzleResultsStore(db);

  let leases: LeaseStore;
  const healthChecks: Record<string, HealthCheck> = { database: checkDatabaseConnection };
  if (env.LEASE_STORE === 'redis') {
    leases = new RedisLeaseStore();
    healthChecks.redis = checkRedisConnection;
  } else {
    logger.warn('Using in-memory submission leases; run a single instance only');
    leases = new InMemoryLeaseStore();
  }

  const judge = new OjJudgeClient({
    baseUrl: env.JUDGE_BASE_URL,
    command: env.OJ_COMMAND,
    commandArgs: getOjCommandArgs(),
    timeoutMs: env.OJ_COMMAND_TIMEOUT_MS,
  });

  const coordinator = new SubmissionCoordinator(
    { credentials, judge, results, leases },
    coordinatorConfigFromEnv()
  );

  return { credentials, results, coordinator, healthChecks };
}
