/**
 * Bounded retry with a pluggable delay function. Knows nothing about the
 * network; callers decide which errors are worth another attempt.
 */

import { sleep as defaultSleep, type Sleep } from './timing.js';

export interface RetryPolicy {
  /** Total attempts, including the first one. */
  attempts: number;
  /** Wait after failed attempt `attempt` (1-based) before trying again. */
  delayMs: (attempt: number) => number;
  /** Condition to check if an error is retryable (default: all errors). */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** Called before each wait. */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: Sleep;
}

/**
 * Run `fn` until it resolves, an error is not retryable, or attempts run out.
 * The last error is rethrown as-is.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
): Promise<T> {
  const attempts = Math.max(1, Math.floor(policy.attempts));
  const wait = policy.sleep ?? defaultSleep;
  const isRetryable = policy.shouldRetry ?? (() => true);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= attempts || !isRetryable(error, attempt)) {
        throw error;
      }
      const delay = policy.delayMs(attempt);
      policy.onRetry?.(error, attempt, delay);
      await wait(delay);
    }
  }
}

/** base, base*factor, base*factor^2 ... capped at maxMs. */
export function exponentialBackoff(options: {
  baseMs: number;
  maxMs: number;
  factor?: number;
}): (attempt: number) => number {
  const factor = options.factor ?? 2;
  return (attempt) => Math.min(options.maxMs, options.baseMs * Math.pow(factor, attempt - 1));
}

/** attempt * stepMs */
export function linearBackoff(stepMs: number): (attempt: number) => number {
  return (attempt) => attempt * stepMs;
}
