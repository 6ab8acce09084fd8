/**
 * Bounded retry for idempotent reads: one extra attempt after a fixed delay,
 * and only for errors marked retryable.
 */

import { TransientIOError, describeError } from '../errors.js';
import { logWarn } from '../logger.js';

export interface RetryOptions {
  /** Extra attempts after the first */
  retries: number;
  delayMs: number;
  /** Prefix for the warning logged before each retry */
  label: string;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function isRetryable(err: unknown): boolean {
  return err instanceof TransientIOError && err.retryable;
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  { retries, delayMs, label }: RetryOptions,
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= retries || !isRetryable(err)) throw err;
      logWarn(`${label} ${describeError(err)}; retrying in ${delayMs}ms`);
      await sleep(delayMs);
    }
  }
}
