/**
 * Submission Coordinator
 *
 * Drives one submission through its lifecycle:
 * 1. Look up the user's credential for the judge
 * 2. Take the user's submission lease (one in flight per user, no queueing)
 * 3. Log in and upload, retrying transient upload failures with backoff
 * 4. Poll the judge until a terminal verdict or the polling budget runs out
 * 5. Append the solve record, keyed by the judge's run id
 * 6. Close the judge session and release the lease on every path
 *
 * Every call ends in exactly one of: a stored record with a terminal verdict,
 * or a typed failure. Unexpected errors (database down) are rethrown after
 * cleanup.
 */

import type { FailureReason, Verdict } from '@judgebot/shared';

import {
  AbortedError,
  retryWithBackoff,
  systemClock,
  type BackoffPolicy,
  type Clock,
  type PollingPolicy,
} from './backoff';
import type { CredentialStore } from './credential-store';
import { JudgeError } from './errors';
import type { JudgeClient, JudgeSession, SubmissionHandle, SubmissionRequest } from './judge-client';
import { submissionLeaseKey, type LeaseStore } from './lease';
import { createContextLogger, logger as baseLogger, type Logger } from './logger';
import {
  inFlightSubmissions,
  judgingDurationSeconds,
  submissionTotal,
  verdictTotal,
} from './metrics';
import type { ResultsStore, SolveRecord } from './results-store';
import { pollVerdict } from './verdict-poller';

export type SolveOutcome =
  | {
      status: 'judged';
      verdict: Verdict;
      handle: SubmissionHandle;
      problemUrl: string;
      record: SolveRecord;
      // true when this verdict added a problem to the user's count
      newlySolved: boolean;
      solvedCount: number;
      polls: number;
    }
  | {
      status: 'failed';
      reason: FailureReason;
      message: string;
      retryable: boolean;
      handle?: SubmissionHandle;
    };

export interface CoordinatorConfig {
  submitMaxAttempts: number;
  submitRetry: BackoffPolicy;
  polling: PollingPolicy;
  maxStatusErrors: number;
  // Defaults to twice the polling budget plus a minute
  leaseTtlSeconds?: number;
}

export interface CoordinatorDeps {
  credentials: CredentialStore;
  judge: JudgeClient;
  results: ResultsStore;
  leases: LeaseStore;
  clock?: Clock;
  logger?: Logger;
}

export class SubmissionCoordinator {
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly leaseTtlSeconds: number;
  private readonly active = new Set<AbortController>();

  constructor(
    private readonly deps: CoordinatorDeps,
    private readonly config: CoordinatorConfig
  ) {
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? baseLogger;
    this.leaseTtlSeconds =
      config.leaseTtlSeconds ?? Math.ceil((config.polling.deadlineMs * 2) / 1000) + 60;
  }

  /**
   * Number of submissions currently holding a lease
   */
  inFlight(): number {
    return this.active.size;
  }

  /**
   * Abort every in-flight submission. Aborted submissions report CANCELLED
   * and write no record.
   */
  shutdown(): void {
    for (const controller of this.active) {
      controller.abort();
    }
  }

  async submit(
    request: SubmissionRequest,
    options: { signal?: AbortSignal } = {}
  ): Promise<SolveOutcome> {
    const { userId, judge, problemId } = request;
    const log = createContextLogger({ userId, judge, problemId }, this.logger);

    const credential = await this.deps.credentials.get(userId, judge);
    if (!credential) {
      return this.fail(log, judge, 'NOT_FOUND', `Please link your ${judge} account first.`, false);
    }

    if (request.displayName) {
      await this.deps.credentials.setDisplayName(userId, request.displayName);
    }

    const leaseKey = submissionLeaseKey(userId);
    const leaseToken = await this.deps.leases.acquire(leaseKey, this.leaseTtlSeconds);
    if (!leaseToken) {
      return this.fail(
        log,
        judge,
        'BUSY',
        'You already have a submission being judged. Wait for its verdict and try again.',
        true
      );
    }

    const controller = new AbortController();
    const forwardAbort = () => controller.abort();
    options.signal?.addEventListener('abort', forwardAbort, { once: true });
    if (options.signal?.aborted) controller.abort();
    const signal = controller.signal;

    this.active.add(controller);
    inFlightSubmissions.inc();

    const opened: { session?: JudgeSession } = {};
    let handle: SubmissionHandle | undefined;

    try {
      handle = await retryWithBackoff(
        async () => {
          opened.session ??= await this.deps.judge.openSession(credential, signal);
          return opened.session.submit(request, signal);
        },
        {
          maxAttempts: this.config.submitMaxAttempts,
          policy: this.config.submitRetry,
          clock: this.clock,
          signal,
          isRetryable: (error) => error instanceof JudgeError && error.retryable,
          onRetry: (error, attempt, delayMs) => {
            log.warn({ err: error, attempt, delayMs }, 'Upload failed, retrying');
          },
        }
      );

      const runLog = log.child({ handle });
      runLog.info('Submission uploaded');

      const session = opened.session;
      if (!session) {
        throw new Error('Judge session missing after upload');
      }

      const poll = await pollVerdict(session, handle, {
        policy: this.config.polling,
        clock: this.clock,
        maxStatusErrors: this.config.maxStatusErrors,
        logger: runLog,
        signal,
      });

      if (poll.state === 'TIMED_OUT') {
        return this.fail(
          runLog,
          judge,
          'TIMED_OUT',
          'Judging did not complete in time. Check the judge for the final result.',
          false,
          handle
        );
      }
      if (poll.state === 'CANCELLED') {
        return this.fail(runLog, judge, 'CANCELLED', 'The bot is shutting down; submission abandoned.', true, handle);
      }

      judgingDurationSeconds.observe(poll.elapsedMs / 1000);
      verdictTotal.inc({ verdict: poll.verdict, judge });

      const record: SolveRecord = {
        submissionHandle: handle,
        userId,
        judge,
        problemId,
        language: request.language,
        verdict: poll.verdict,
        executionTime: poll.executionTime,
        memory: poll.memory,
        submittedAt: new Date(this.clock.now()),
      };

      const accepted = poll.verdict === 'ACCEPTED';
      const before = accepted ? await this.deps.results.solvedCount(userId) : 0;
      const inserted = await this.deps.results.append(record);
      const solvedCount = await this.deps.results.solvedCount(userId);

      if (!inserted) {
        runLog.warn('Solve record for this run already existed');
      }

      submissionTotal.inc({ status: 'judged', reason: 'none', judge });
      runLog.info({ verdict: poll.verdict, polls: poll.polls, solvedCount }, 'Submission judged');

      return {
        status: 'judged',
        verdict: poll.verdict,
        handle,
        problemUrl: this.deps.judge.problemUrl(judge, problemId),
        record,
        newlySolved: accepted && inserted && solvedCount > before,
        solvedCount,
        polls: poll.polls,
      };
    } catch (error) {
      if (signal.aborted || error instanceof AbortedError) {
        return this.fail(log, judge, 'CANCELLED', 'The bot is shutting down; submission abandoned.', true, handle);
      }
      if (error instanceof JudgeError) {
        return this.fail(log, judge, error.reason, error.message, error.retryable, handle);
      }
      log.error({ err: error }, 'Submission failed unexpectedly');
      submissionTotal.inc({ status: 'failed', reason: 'INTERNAL', judge });
      throw error;
    } finally {
      await this.cleanup(log, opened.session, leaseKey, leaseToken);
      options.signal?.removeEventListener('abort', forwardAbort);
      this.active.delete(controller);
      inFlightSubmissions.dec();
    }
  }

  private async cleanup(
    log: Logger,
    session: JudgeSession | undefined,
    leaseKey: string,
    leaseToken: string
  ): Promise<void> {
    if (session) {
      try {
        await session.close();
      } catch (error) {
        log.error({ err: error }, 'Failed to close judge session');
      }
    }

    try {
      const released = await this.deps.leases.release(leaseKey, leaseToken);
      if (!released) {
        log.warn('Submission lease had already expired');
      }
    } catch (error) {
      log.error({ err: error, leaseTtlSeconds: this.leaseTtlSeconds }, 'Failed to release submission lease');
    }
  }

  private fail(
    log: Logger,
    judge: string,
    reason: FailureReason,
    message: string,
    retryable: boolean,
    handle?: SubmissionHandle
  ): SolveOutcome {
    submissionTotal.inc({ status: 'failed', reason, judge });
    log.info({ reason, handle }, 'Submission failed');
    return { status: 'failed', reason, message, retryable, ...(handle && { handle }) };
  }
}
