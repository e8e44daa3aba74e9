import { BACKOFF } from '../../shared/constants';
import { AttemptsExceededError, TimeoutExceededError } from '../utils/errors';

/** Exponential backoff policy. */
export interface BackoffOptions {
  /** Delay before the first retry. Default: 500 */
  initialIntervalMs: number;
  /** Growth factor applied to the delay after every retry. Default: 1.5 */
  multiplier: number;
  /** Upper bound for a single delay. Default: 5000 */
  maxIntervalMs: number;
  /** Stop once this much time has passed since the first attempt. Default: 15 minutes */
  maxElapsedMs: number;
  /** Stop after this many attempts in total. Default: Infinity */
  maxAttempts: number;
}

export interface RetryHooks {
  /** Called before each sleep with the attempt that just failed */
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export const DEFAULT_BACKOFF: BackoffOptions = {
  initialIntervalMs: BACKOFF.INITIAL_INTERVAL_MS,
  multiplier: BACKOFF.MULTIPLIER,
  maxIntervalMs: BACKOFF.MAX_INTERVAL_MS,
  maxElapsedMs: BACKOFF.MAX_ELAPSED_MS,
  maxAttempts: BACKOFF.MAX_ATTEMPTS
};

export function resolveBackoff(overrides: Partial<BackoffOptions> = {}): BackoffOptions {
  return { ...DEFAULT_BACKOFF, ...overrides };
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Delays between attempts: starts at the initial interval and grows by the
 * multiplier, never exceeding the maximum interval.
 */
export function* backoffIntervals(options: BackoffOptions): Generator<number, never, void> {
  let interval = Math.min(options.initialIntervalMs, options.maxIntervalMs);
  for (;;) {
    yield interval;
    interval = Math.min(interval * options.multiplier, options.maxIntervalMs);
  }
}

/**
 * Run `operation` until it succeeds, sleeping between failures.
 *
 * Every failure counts as transient. When the attempt or elapsed-time budget
 * runs out, the last failure is wrapped in AttemptsExceededError or
 * TimeoutExceededError.
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  options: Partial<BackoffOptions> = {},
  hooks: RetryHooks = {}
): Promise<T> {
  const policy = resolveBackoff(options);
  const sleep = hooks.sleep ?? delay;
  const now = hooks.now ?? Date.now;
  const intervals = backoffIntervals(policy);
  const startedAt = now();
  let attempt = 0;

  for (;;) {
    attempt++;
    try {
      return await operation();
    } catch (error) {
      if (attempt >= policy.maxAttempts) {
        throw new AttemptsExceededError(attempt, error);
      }

      const wait = intervals.next().value;
      const elapsed = now() - startedAt;
      if (elapsed + wait > policy.maxElapsedMs) {
        throw new TimeoutExceededError(elapsed, error);
      }

      hooks.onRetry?.(attempt, wait, error);
      await sleep(wait);
    }
  }
}
