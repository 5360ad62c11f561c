/**
 * Unit tests for the verdict poller
 *
 * Uses a fake clock, so every poll time and sleep is exact.
 */

import { describe, it, expect } from 'vitest';

import { FakeClock, JUDGING, PENDING, T0, verdict } from '../test/fakes';
import type { JudgeSession, JudgeStatus } from './judge-client';
import { JudgeUploadError } from './errors';
import { logger } from './logger';
import { advanceState, isValidTransition, pollVerdict } from './verdict-poller';

// ============================================
// Test Fixtures
// ============================================

const policy = { initialMs: 1000, multiplier: 2, maxMs: 4000, deadlineMs: 10000 };

function scriptedSession(clock: FakeClock, script: Array<JudgeStatus | Error>) {
  const pollTimes: number[] = [];
  const session: JudgeSession = {
    submit: async () => 'run-1',
    getStatus: async () => {
      pollTimes.push(clock.now() - T0);
      const next = script.length > 1 ? script.shift() : script[0];
      if (next instanceof Error) throw next;
      return next ?? PENDING;
    },
    close: async () => undefined,
  };
  return { session, pollTimes };
}

// ============================================
// State Transitions
// ============================================

describe('poller state transitions', () => {
  it('should allow PENDING to JUDGING and JUDGING to VERDICT', () => {
    expect(isValidTransition('PENDING', 'JUDGING')).toBe(true);
    expect(isValidTransition('JUDGING', 'VERDICT')).toBe(true);
  });

  it('should never move from JUDGING back to PENDING', () => {
    expect(isValidTransition('JUDGING', 'PENDING')).toBe(false);
    expect(advanceState('JUDGING', PENDING)).toBe('JUDGING');
  });

  it('should treat terminal states as final', () => {
    expect(isValidTransition('VERDICT', 'JUDGING')).toBe(false);
    expect(isValidTransition('TIMED_OUT', 'VERDICT')).toBe(false);
    expect(advanceState('TIMED_OUT', verdict('ACCEPTED'))).toBe('TIMED_OUT');
  });
});

// ============================================
// Polling
// ============================================

describe('pollVerdict', () => {
  it('should return the verdict once the judge reports it', async () => {
    const clock = new FakeClock();
    const { session, pollTimes } = scriptedSession(clock, [
      PENDING,
      JUDGING,
      verdict('WRONG_ANSWER', '46 ms', '1200 KB'),
    ]);

    const result = await pollVerdict(session, 'run-1', {
      policy,
      clock,
      maxStatusErrors: 3,
      logger,
    });

    expect(result).toEqual({
      state: 'VERDICT',
      verdict: 'WRONG_ANSWER',
      executionTime: '46 ms',
      memory: '1200 KB',
      polls: 3,
      elapsedMs: 3000,
    });
    expect(pollTimes).toEqual([0, 1000, 3000]);
  });

  it('should time out when the budget runs out, clamping the last sleep', async () => {
    const clock = new FakeClock();
    const { session, pollTimes } = scriptedSession(clock, [JUDGING]);

    const result = await pollVerdict(session, 'run-1', {
      policy,
      clock,
      maxStatusErrors: 3,
      logger,
    });

    expect(result).toEqual({ state: 'TIMED_OUT', polls: 5, elapsedMs: 10000 });
    expect(pollTimes).toEqual([0, 1000, 3000, 7000, 10000]);
    expect(clock.sleeps).toEqual([1000, 2000, 4000, 3000]);
  });

  it('should retry failing status queries inside the same budget', async () => {
    const clock = new FakeClock();
    const { session, pollTimes } = scriptedSession(clock, [
      new JudgeUploadError('status query failed'),
      new JudgeUploadError('status query failed'),
      verdict('ACCEPTED'),
    ]);

    const result = await pollVerdict(session, 'run-1', {
      policy,
      clock,
      maxStatusErrors: 3,
      logger,
    });

    expect(result.state).toBe('VERDICT');
    expect(result.polls).toBe(1);
    expect(pollTimes).toEqual([0, 1000, 3000]);
  });

  it('should rethrow after maxStatusErrors consecutive failures', async () => {
    const clock = new FakeClock();
    const { session, pollTimes } = scriptedSession(clock, [
      new JudgeUploadError('status query failed'),
    ]);

    await expect(
      pollVerdict(session, 'run-1', { policy, clock, maxStatusErrors: 2, logger })
    ).rejects.toThrow('status query failed');
    expect(pollTimes).toEqual([0, 1000]);
  });

  it('should reset the error count after a successful query', async () => {
    const clock = new FakeClock();
    const failure = new JudgeUploadError('status query failed');
    const { session } = scriptedSession(clock, [
      failure,
      JUDGING,
      failure,
      verdict('TIME_LIMIT_EXCEEDED'),
    ]);

    const result = await pollVerdict(session, 'run-1', {
      policy: { ...policy, deadlineMs: 60000 },
      clock,
      maxStatusErrors: 2,
      logger,
    });

    expect(result.state).toBe('VERDICT');
    expect(result.polls).toBe(2);
  });

  it('should rethrow errors that are not judge failures', async () => {
    const clock = new FakeClock();
    const { session } = scriptedSession(clock, [new TypeError('bug')]);

    await expect(
      pollVerdict(session, 'run-1', { policy, clock, maxStatusErrors: 3, logger })
    ).rejects.toThrow('bug');
  });

  it('should report CANCELLED when the signal aborts during a sleep', async () => {
    const clock = new FakeClock();
    const controller = new AbortController();
    clock.onSleep = () => controller.abort();
    const { session, pollTimes } = scriptedSession(clock, [JUDGING]);

    const result = await pollVerdict(session, 'run-1', {
      policy,
      clock,
      maxStatusErrors: 3,
      logger,
      signal: controller.signal,
    });

    expect(result).toEqual({ state: 'CANCELLED', polls: 1, elapsedMs: 1000 });
    expect(pollTimes).toEqual([0]);
  });

  it('should not poll at all when already cancelled', async () => {
    const clock = new FakeClock();
    const controller = new AbortController();
    controller.abort();
    const { session, pollTimes } = scriptedSession(clock, [JUDGING]);

    const result = await pollVerdict(session, 'run-1', {
      policy,
      clock,
      maxStatusErrors: 3,
      logger,
      signal: controller.signal,
    });

    expect(result).toEqual({ state: 'CANCELLED', polls: 0, elapsedMs: 0 });
    expect(pollTimes).toEqual([]);
  });
});
