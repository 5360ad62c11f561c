/**
 * Backoff policy and clock shared by upload retries and verdict polling.
 *
 * The clock is injected so tests can advance time without waiting.
 */

export interface BackoffPolicy {
  initialMs: number;
  multiplier: number;
  maxMs: number;
}

export interface PollingPolicy extends BackoffPolicy {
  // Total wall-clock budget, measured from the first poll
  deadlineMs: number;
}

export type Clock = {
  now: () => number;
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
};

export class AbortedError extends Error {
  constructor() {
    super('Operation aborted');
    this.name = 'AbortedError';
  }
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortedError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};

/**
 * Delay before the given zero-based attempt: initial * multiplier^attempt, capped.
 */
export function backoffDelay(policy: BackoffPolicy, attempt: number): number {
  const delay = policy.initialMs * Math.pow(policy.multiplier, attempt);
  return Math.min(Math.round(delay), policy.maxMs);
}

export interface RetryOptions {
  maxAttempts: number;
  policy: BackoffPolicy;
  clock: Clock;
  isRetryable: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
}

/**
 * Run `fn` until it succeeds, a non-retryable error is thrown, or attempts run out.
 * The last error is rethrown.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  let attempt = 0;

  for (;;) {
    if (options.signal?.aborted) {
      throw new AbortedError();
    }

    try {
      return await fn(attempt);
    } catch (error) {
      const attemptsLeft = attempt + 1 < options.maxAttempts;
      if (!attemptsLeft || !options.isRetryable(error)) {
        throw error;
      }

      const delayMs = backoffDelay(options.policy, attempt);
      options.onRetry?.(error, attempt + 1, delayMs);
      await options.clock.sleep(delayMs, options.signal);
      attempt += 1;
    }
  }
}
