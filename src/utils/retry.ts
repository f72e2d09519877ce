/**
 * Retry Logic with Exponential Backoff
 *
 * Used by the provider router for rate-limited model calls.
 */

import { logger } from './logger.js';
import { sleep } from './abort.js';
import { ProviderError } from '../types/errors.js';

const log = logger.retry;

export interface RetryOptions {
  /**
   * Maximum number of total attempts (not retries).
   * - maxAttempts: 1 = no retries
   * - maxAttempts: 3 = 1 initial attempt + up to 2 retries
   *
   * @default 3
   */
  maxAttempts?: number;

  /**
   * Delay before the first retry.
   * @default 1000
   */
  initialDelayMs?: number;

  /**
   * Caps the exponential backoff.
   * @default 30000
   */
  maxDelayMs?: number;

  /**
   * delay = min(initialDelayMs * backoffMultiplier^retryCount, maxDelayMs)
   * @default 2
   */
  backoffMultiplier?: number;

  /**
   * Return true to retry, false to throw immediately.
   * @default isRateLimited
   */
  retryOn?: (error: Error) => boolean;

  /**
   * Called before each backoff wait, with the attempt that just failed.
   */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;

  /**
   * Aborts the backoff wait; the abort reason is thrown.
   */
  signal?: AbortSignal;
}

/**
 * Default retry predicate: a provider reported rate limiting (429 without
 * quota exhaustion). Quota, server and auth failures are left to the
 * router's fallback; plain errors are never retried.
 */
export function isRateLimited(error: Error): boolean {
  return error instanceof ProviderError && error.kind === 'rate_limit';
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'signal'>> = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  retryOn: isRateLimited,
  onRetry: () => {},
};

/**
 * Execute an async function with automatic retry on failure.
 *
 * The last error is rethrown when attempts run out, when `retryOn`
 * declines it, or when the signal has fired. An abort during a backoff
 * wait rejects with the abort reason.
 *
 * @example
 * ```typescript
 * const completion = await withRetry(
 *   () => provider.complete(request, { signal }),
 *   { maxAttempts: 3, initialDelayMs: 2000, signal }
 * );
 * ```
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const { signal, ...rest } = options;
  const opts = { ...DEFAULT_OPTIONS, ...rest };
  let lastError: Error | null = null;
  let delay = opts.initialDelayMs;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === opts.maxAttempts || !opts.retryOn(lastError) || signal?.aborted) {
        throw lastError;
      }

      opts.onRetry(attempt, lastError, delay);

      log.warn('Retry attempt failed', {
        attempt,
        maxAttempts: opts.maxAttempts,
        error: lastError.message,
        retryDelayMs: delay,
      });

      await sleep(delay, signal);

      delay = Math.min(delay * opts.backoffMultiplier, opts.maxDelayMs);
    }
  }

  throw lastError ?? new Error('withRetry called with maxAttempts < 1');
}
