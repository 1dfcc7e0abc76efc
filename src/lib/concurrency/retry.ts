/**
 * Retry with exponential backoff
 */

import { isRetryable } from '@/lib/errors';
import { sleep } from './timeout';

export interface RetryOptions {
  /** Extra attempts after the first one */
  retries: number;
  /** Delay before the first retry; doubles on every further attempt */
  baseDelayMs: number;
  maxDelayMs?: number;
  /** Decides whether an error is worth another attempt (default: isRetryable) */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs?: number): number {
  const delay = baseDelayMs * 2 ** (attempt - 1);
  return maxDelayMs === undefined ? delay : Math.min(delay, maxDelayMs);
}

export async function retry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isRetryable;
  let attempt = 0;

  for (;;) {
    try {
      return await fn(attempt);
    } catch (error) {
      attempt++;
      if (attempt > options.retries || !shouldRetry(error)) {
        throw error;
      }

      const delayMs = backoffDelay(attempt, options.baseDelayMs, options.maxDelayMs);
      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
    }
  }
}
