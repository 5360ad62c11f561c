/**
 * Verdict Poller
 *
 * Polls the judge for a run until it reports a terminal verdict or the
 * wall-clock budget runs out.
 *
 * State Flow:
 * PENDING → (JUDGING)* → VERDICT
 *                      ↘ TIMED_OUT (budget spent; local to the poller)
 *                      ↘ CANCELLED (shutdown signal)
 *
 * A failing status query is retried with the same backoff inside the same
 * budget; `maxStatusErrors` consecutive failures are rethrown.
 */

import type { PendingState, Verdict } from '@judgebot/shared';

import { AbortedError, backoffDelay, type Clock, type PollingPolicy } from './backoff';
import { JudgeUploadError } from './errors';
import type { JudgeSession, JudgeStatus, SubmissionHandle } from './judge-client';
import type { Logger } from './logger';

export type PollerState = PendingState | 'VERDICT' | 'TIMED_OUT' | 'CANCELLED';

export type PollResult =
  | {
      state: 'VERDICT';
      verdict: Verdict;
      executionTime: string | null;
      memory: string | null;
      polls: number;
      elapsedMs: number;
    }
  | { state: 'TIMED_OUT'; polls: number; elapsedMs: number }
  | { state: 'CANCELLED'; polls: number; elapsedMs: number };

export interface PollOptions {
  policy: PollingPolicy;
  clock: Clock;
  maxStatusErrors: number;
  logger: Logger;
  signal?: AbortSignal;
}

// Define valid state transitions
const VALID_TRANSITIONS: Record<PollerState, PollerState[]> = {
  PENDING: ['PENDING', 'JUDGING', 'VERDICT', 'TIMED_OUT', 'CANCELLED'],
  JUDGING: ['JUDGING', 'VERDICT', 'TIMED_OUT', 'CANCELLED'],
  VERDICT: [],
  TIMED_OUT: [],
  CANCELLED: [],
};

/**
 * Check if a transition is valid
 */
export function isValidTransition(from: PollerState, to: PollerState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/**
 * Next state after observing a judge status. A run never goes back from
 * JUDGING to PENDING, even if the judge requeues it.
 */
export function advanceState(current: PollerState, observed: JudgeStatus): PollerState {
  const next: PollerState = observed.state;
  if (isValidTransition(current, next)) {
    return next;
  }
  return current;
}

export async function pollVerdict(
  session: JudgeSession,
  handle: SubmissionHandle,
  options: PollOptions
): Promise<PollResult> {
  const { policy, clock, signal, logger } = options;
  const startedAt = clock.now();
  const deadline = startedAt + policy.deadlineMs;

  let state: PollerState = 'PENDING';
  let polls = 0;
  let attempt = 0;
  let consecutiveErrors = 0;

  const finish = (terminal: 'TIMED_OUT' | 'CANCELLED'): PollResult => {
    logger.info({ handle, state: terminal, polls }, 'Stopped polling without a verdict');
    return { state: terminal, polls, elapsedMs: clock.now() - startedAt };
  };

  for (;;) {
    if (signal?.aborted) {
      return finish('CANCELLED');
    }

    try {
      const status = await session.getStatus(handle, signal);
      polls += 1;
      consecutiveErrors = 0;

      if (status.state === 'VERDICT') {
        logger.info({ handle, verdict: status.verdict, polls }, 'Verdict received');
        return {
          state: 'VERDICT',
          verdict: status.verdict,
          executionTime: status.executionTime,
          memory: status.memory,
          polls,
          elapsedMs: clock.now() - startedAt,
        };
      }

      state = advanceState(state, status);
      logger.debug({ handle, state, polls }, 'Run still judging');
    } catch (error) {
      if (signal?.aborted) {
        return finish('CANCELLED');
      }
      if (!(error instanceof JudgeUploadError)) {
        throw error;
      }

      consecutiveErrors += 1;
      if (consecutiveErrors >= options.maxStatusErrors) {
        throw error;
      }
      logger.warn({ handle, err: error, consecutiveErrors }, 'Status query failed, will retry');
    }

    const remainingMs = deadline - clock.now();
    if (remainingMs <= 0) {
      return finish('TIMED_OUT');
    }

    const waitMs = Math.min(backoffDelay(policy, attempt), remainingMs);
    attempt += 1;

    try {
      await clock.sleep(waitMs, signal);
    } catch (error) {
      if (error instanceof AbortedError) {
        return finish('CANCELLED');
      }
      throw error;
    }
  }
}
