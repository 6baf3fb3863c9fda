/**
 * Bounded retry with exponential backoff.
 *
 * Only errors flagged `retryable` by the taxonomy are retried. A rate-limit
 * error carrying a Retry-After value waits that long instead of the backoff.
 */

import { RateLimitedError, isRetryable } from '@/lib/errors';
import { sleep as defaultSleep, type Sleep } from '@/lib/pacing';

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  sleep?: Sleep;
  label?: string;
}

export const DEFAULT_RETRY: RetryOptions = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
};

/**
 * Delay before the attempt after `attempt` (1-based): base * 2^(attempt-1), capped
 */
export function backoffDelay(attempt: number, error: unknown, options: RetryOptions): number {
  if (error instanceof RateLimitedError && error.retryAfterMs !== null) {
    return Math.min(error.retryAfterMs, options.maxDelayMs);
  }
  return Math.min(options.baseDelayMs * Math.pow(2, attempt - 1), options.maxDelayMs);
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = DEFAULT_RETRY): Promise<T> {
  const wait = options.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, options.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!isRetryable(error) || attempt >= maxAttempts) {
        throw error;
      }
      const delay = backoffDelay(attempt, error, options);
      console.warn(
        `[retry] ${options.label ?? 'operation'} failed (attempt ${attempt}/${maxAttempts}), retrying in ${delay}ms:`,
        error instanceof Error ? error.message : error
      );
      await wait(delay);
    }
  }
}
