import { describe, it, expect, vi } from 'vitest';
import { isRateLimited, withRetry, type RetryOptions } from '../../src/utils/retry.js';
import { ProviderError } from '../../src/types/errors.js';
import { isAbortError } from '../../src/utils/abort.js';
import type { ProviderErrorKind } from '../../src/types/research.js';

const rateLimited = () => new ProviderError('Too many requests', 'openai', 'rate_limit', 429);

describe('withRetry', () => {
  describe('successful execution', () => {
    it('should return result on first successful attempt', async () => {
      const result = await withRetry(async () => 'success');
      expect(result).toBe('success');
    });

    it('should return complex objects', async () => {
      const data = { foo: 'bar', count: 42 };
      const result = await withRetry(async () => data);
      expect(result).toEqual(data);
    });
  });

  describe('retry behavior', () => {
    it('should retry on retryable errors', async () => {
      let attempts = 0;
      const result = await withRetry(
        async () => {
          attempts++;
          if (attempts < 3) {
            throw rateLimited();
          }
          return 'success';
        },
        { initialDelayMs: 1, maxDelayMs: 10 }
      );

      expect(result).toBe('success');
      expect(attempts).toBe(3);
    });

    it('should throw after max attempts exceeded', async () => {
      let attempts = 0;
      await expect(
        withRetry(
          async () => {
            attempts++;
            throw rateLimited();
          },
          { maxAttempts: 3, initialDelayMs: 1, maxDelayMs: 10 }
        )
      ).rejects.toThrow('Too many requests');

      expect(attempts).toBe(3);
    });

    it('should not retry on non-retryable errors', async () => {
      let attempts = 0;
      await expect(
        withRetry(
          async () => {
            attempts++;
            throw new Error('validation error');
          },
          { maxAttempts: 3, initialDelayMs: 1 }
        )
      ).rejects.toThrow('validation error');

      expect(attempts).toBe(1);
    });
  });

  describe('default retryOn conditions', () => {
    const countAttempts = async (error: Error) => {
      let attempts = 0;
      await expect(
        withRetry(
          async () => {
            attempts++;
            throw error;
          },
          { maxAttempts: 2, initialDelayMs: 1 }
        )
      ).rejects.toBe(error);
      return attempts;
    };

    it('should retry provider rate limits', async () => {
      expect(await countAttempts(rateLimited())).toBe(2);
    });

    const unretried: Array<[ProviderErrorKind, number | undefined]> = [
      ['quota', 429],
      ['server', 503],
      ['auth', 401],
      ['timeout', undefined],
    ];

    it.each(unretried)('should leave %s provider errors to the caller', async (kind, status) => {
      expect(await countAttempts(new ProviderError('failed', 'openai', kind, status))).toBe(1);
    });

    it('should not retry plain errors, whatever their message', async () => {
      expect(await countAttempts(new Error('HTTP 503 Service Unavailable'))).toBe(1);
      expect(await countAttempts(new Error('request timeout'))).toBe(1);
    });

    it('should expose the predicate', () => {
      expect(isRateLimited(rateLimited())).toBe(true);
      expect(isRateLimited(new ProviderError('Over quota', 'anthropic', 'quota', 429))).toBe(false);
      expect(isRateLimited(new Error('429'))).toBe(false);
    });
  });

  describe('custom retryOn function', () => {
    it('should use custom retryOn logic', async () => {
      let attempts = 0;
      const options: RetryOptions = {
        maxAttempts: 3,
        initialDelayMs: 1,
        retryOn: (error) => error.message.includes('custom-retry'),
      };

      await expect(
        withRetry(
          async () => {
            attempts++;
            throw new Error('custom-retry-error');
          },
          options
        )
      ).rejects.toThrow();

      expect(attempts).toBe(3);
    });

    it('should not retry when custom retryOn returns false', async () => {
      let attempts = 0;
      const options: RetryOptions = {
        maxAttempts: 3,
        initialDelayMs: 1,
        retryOn: () => false,
      };

      await expect(
        withRetry(
          async () => {
            attempts++;
            throw new Error('any error');
          },
          options
        )
      ).rejects.toThrow();

      expect(attempts).toBe(1);
    });
  });

  describe('provider rate limits', () => {
    it('should retry only rate-limited provider errors', async () => {
      let attempts = 0;

      const result = await withRetry(
        async () => {
          attempts++;
          if (attempts === 1) throw rateLimited();
          return 'answered';
        },
        { initialDelayMs: 1 }
      );

      expect(result).toBe('answered');
      expect(attempts).toBe(2);

      await expect(
        withRetry(
          async () => {
            throw new ProviderError('Invalid API key', 'openai', 'auth', 401);
          },
          { initialDelayMs: 1 }
        )
      ).rejects.toMatchObject({ kind: 'auth' });
    });
  });

  describe('cancellation', () => {
    it('should stop waiting when the signal fires during backoff', async () => {
      const controller = new AbortController();
      let attempts = 0;

      const pending = withRetry(
        async () => {
          attempts++;
          throw rateLimited();
        },
        { maxAttempts: 5, initialDelayMs: 10000, signal: controller.signal }
      );
      setTimeout(() => controller.abort(), 10);

      let caught: unknown;
      try {
        await pending;
      } catch (error) {
        caught = error;
      }

      expect(isAbortError(caught)).toBe(true);
      expect(attempts).toBe(1);
    });

    it('should not retry once the signal has fired', async () => {
      const controller = new AbortController();
      let attempts = 0;

      await expect(
        withRetry(
          async () => {
            attempts++;
            controller.abort();
            throw rateLimited();
          },
          { maxAttempts: 3, initialDelayMs: 1, signal: controller.signal }
        )
      ).rejects.toThrow('Too many requests');

      expect(attempts).toBe(1);
    });
  });

  describe('onRetry callback', () => {
    it('should call onRetry callback on each retry', async () => {
      const onRetry = vi.fn();
      let attempts = 0;

      try {
        await withRetry(
          async () => {
            attempts++;
            throw rateLimited();
          },
          { maxAttempts: 3, initialDelayMs: 1, onRetry }
        );
      } catch {
        // Expected
      }

      expect(onRetry).toHaveBeenCalledTimes(2); // Called on attempts 1 and 2, not on final failure
      expect(onRetry).toHaveBeenCalledWith(1, expect.any(Error), expect.any(Number));
      expect(onRetry).toHaveBeenCalledWith(2, expect.any(Error), expect.any(Number));
    });

    it('should pass correct delay to onRetry', async () => {
      const onRetry = vi.fn();

      try {
        await withRetry(
          async () => {
            throw rateLimited();
          },
          {
            maxAttempts: 3,
            initialDelayMs: 100,
            backoffMultiplier: 2,
            onRetry,
          }
        );
      } catch {
        // Expected
      }

      // First retry: delay = 100ms
      expect(onRetry).toHaveBeenNthCalledWith(1, 1, expect.any(Error), 100);
      // Second retry: delay = 200ms (100 * 2)
      expect(onRetry).toHaveBeenNthCalledWith(2, 2, expect.any(Error), 200);
    });
  });

  describe('exponential backoff', () => {
    it('should cap delay at maxDelayMs', async () => {
      const onRetry = vi.fn();

      try {
        await withRetry(
          async () => {
            throw rateLimited();
          },
          {
            maxAttempts: 5,
            initialDelayMs: 100,
            maxDelayMs: 150,
            backoffMultiplier: 2,
            onRetry,
          }
        );
      } catch {
        // Expected
      }

      // Delays should be capped at 150ms
      expect(onRetry).toHaveBeenNthCalledWith(1, 1, expect.any(Error), 100);
      expect(onRetry).toHaveBeenNthCalledWith(2, 2, expect.any(Error), 150); // Capped
      expect(onRetry).toHaveBeenNthCalledWith(3, 3, expect.any(Error), 150); // Still capped
    });
  });

  describe('error handling', () => {
    it('should convert non-Error throws to Error objects', async () => {
      await expect(
        withRetry(
          async () => {
            throw 'string error';
          },
          { maxAttempts: 1 }
        )
      ).rejects.toThrow('string error');
    });
  });
});
