/**
 * Token-Bucket Rate Limiter for provider calls
 *
 * Two buckets, requests and model tokens, refilled continuously from
 * per-minute budgets. Callers queue FIFO instead of being rejected; a
 * caller that would wait longer than `maxQueueWaitMs` in total fails with
 * RateLimitWaitExceededError. All bucket updates happen while holding the
 * queue head, so concurrent runs sharing one limiter stay consistent.
 */

import { logger } from './logger.js';
import { linkSignals, raceAbort, sleep, abortError } from './abort.js';
import { RateLimitWaitExceededError } from '../types/errors.js';
import type { RateLimitConfig } from './config-schemas.js';

const log = logger.rateLimiter;

export interface TokenBucketOptions extends RateLimitConfig {
  /** Clock, for tests */
  now?: () => number;
}

export interface RateLimiterStatus {
  availableRequests: number;
  availableTokens: number;
  queuedCallers: number;
}

export interface AcquireResult {
  waitedMs: number;
}

export class TokenBucketRateLimiter {
  private readonly requestCapacity: number;
  private readonly tokenCapacity: number;
  private readonly maxQueueWaitMs: number;
  private readonly now: () => number;

  private availableRequests: number;
  private availableTokens: number;
  private lastRefill: number;

  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  constructor(options: TokenBucketOptions) {
    this.requestCapacity = options.requestsPerMinute;
    this.tokenCapacity = options.tokensPerMinute;
    this.maxQueueWaitMs = options.maxQueueWaitMs;
    this.now = options.now ?? Date.now;
    this.availableRequests = this.requestCapacity;
    this.availableTokens = this.tokenCapacity;
    this.lastRefill = this.now();
  }

  /**
   * Wait for one request slot and `estimatedTokens` model tokens.
   * Estimates above the bucket capacity are clamped to it.
   */
  async acquire(estimatedTokens: number, signal?: AbortSignal): Promise<AcquireResult> {
    const enqueuedAt = this.now();
    const tokens = Math.min(Math.max(0, Math.ceil(estimatedTokens)), this.tokenCapacity);

    let release: () => void = () => {};
    const slot = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => slot);
    this.queued++;

    try {
      await this.waitForTurn(previous, signal);

      for (;;) {
        this.refill();
        if (this.availableRequests >= 1 && this.availableTokens >= tokens) {
          this.availableRequests -= 1;
          this.availableTokens -= tokens;
          const waitedMs = this.now() - enqueuedAt;
          if (waitedMs > 0) {
            log.debug('Rate limit wait finished', { waitedMs, tokens });
          }
          return { waitedMs };
        }

        const delay = this.delayUntilAvailable(tokens);
        const elapsed = this.now() - enqueuedAt;
        if (elapsed + delay > this.maxQueueWaitMs) {
          log.warn('Rate limit wait bound exceeded', { elapsed, delay, maxQueueWaitMs: this.maxQueueWaitMs });
          throw new RateLimitWaitExceededError(this.maxQueueWaitMs);
        }
        await sleep(delay, signal);
      }
    } finally {
      this.queued--;
      release();
    }
  }

  getStatus(): RateLimiterStatus {
    this.refill();
    return {
      availableRequests: this.availableRequests,
      availableTokens: this.availableTokens,
      queuedCallers: this.queued,
    };
  }

  private async waitForTurn(previous: Promise<void>, signal?: AbortSignal): Promise<void> {
    const bounded = linkSignals([signal], this.maxQueueWaitMs, 'Rate limiter queue wait exceeded');
    try {
      await raceAbort(previous, bounded.signal);
    } catch (error) {
      if (signal?.aborted) {
        throw abortError(signal);
      }
      if (bounded.signal.aborted) {
        throw new RateLimitWaitExceededError(this.maxQueueWaitMs);
      }
      throw error;
    } finally {
      bounded.dispose();
    }
  }

  private refill(): void {
    const now = this.now();
    const elapsed = now - this.lastRefill;
    if (elapsed <= 0) return;

    this.availableRequests = Math.min(
      this.requestCapacity,
      this.availableRequests + (elapsed * this.requestCapacity) / 60000
    );
    this.availableTokens = Math.min(
      this.tokenCapacity,
      this.availableTokens + (elapsed * this.tokenCapacity) / 60000
    );
    this.lastRefill = now;
  }

  private delayUntilAvailable(tokens: number): number {
    const requestDeficit = Math.max(0, 1 - this.availableRequests);
    const tokenDeficit = Math.max(0, tokens - this.availableTokens);
    const requestDelay = (requestDeficit * 60000) / this.requestCapacity;
    const tokenDelay = (tokenDeficit * 60000) / this.tokenCapacity;
    return Math.max(1, Math.ceil(Math.max(requestDelay, tokenDelay)));
  }
}
