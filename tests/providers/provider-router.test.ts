/**
 * Tests for the Provider Router
 */

import { describe, it, expect } from 'vitest';
import { ProviderError, ProvidersExhaustedError, RateLimitWaitExceededError } from '../../src/types/errors.js';
import { TokenBucketRateLimiter } from '../../src/utils/rate-limiter.js';
import type { CompletionRequest, ProviderCallOptions } from '../../src/providers/types.js';
import type { ProviderCallRecord } from '../../src/types/research.js';
import { FakeProvider, TEST_METADATA, createTestRouter } from '../helpers/fake-provider.js';

const REQUEST: CompletionRequest = {
  kind: 'completion',
  purpose: 'page-selection',
  system: 'sys',
  messages: [{ role: 'user', content: 'hello' }],
  maxOutputTokens: 100,
};

/** ceil('syshello'.length / 3.5) + maxOutputTokens */
const ESTIMATED_TOKENS = 103;

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected promise to reject');
}

function recorder() {
  const calls: ProviderCallRecord[] = [];
  return { calls, onCall: (record: ProviderCallRecord) => calls.push(record) };
}

describe('ProviderRouter', () => {
  describe('routing', () => {
    it('should answer from the primary provider', async () => {
      const openai = new FakeProvider('openai', ['ok']);
      const anthropic = new FakeProvider('anthropic', ['unused']);
      const router = createTestRouter({ openai, anthropic });
      const { calls, onCall } = recorder();

      const result = await router.complete(REQUEST, { onCall });

      expect(result).toEqual({
        value: { text: 'ok', model: 'openai-test-model', usage: { inputTokens: 100, outputTokens: 20 } },
        provider: 'openai',
        model: 'openai-test-model',
      });
      expect(anthropic.complete).not.toHaveBeenCalled();
      expect(calls).toHaveLength(1);
      expect(calls[0]).toMatchObject({
        provider: 'openai',
        model: 'openai-test-model',
        purpose: 'page-selection',
        attempt: 'primary',
        inputTokens: 100,
        outputTokens: 20,
        success: true,
      });
      expect(calls[0].estimatedCostUsd).toBeCloseTo(0.00014, 10);
      expect(calls[0]).not.toHaveProperty('errorKind');
    });

    it('should fall back to the secondary on a server error', async () => {
      const openai = new FakeProvider('openai', [new ProviderError('Service unavailable', 'openai', 'server', 503)]);
      const anthropic = new FakeProvider('anthropic', ['from secondary']);
      const router = createTestRouter({ openai, anthropic });
      const { calls, onCall } = recorder();

      const result = await router.complete(REQUEST, { onCall });

      expect(result.provider).toBe('anthropic');
      expect(result.value.text).toBe('from secondary');
      expect(calls.map((c) => [c.attempt, c.success, c.errorKind])).toEqual([
        ['primary', false, 'server'],
        ['secondary', true, undefined],
      ]);
      expect(calls[0]).toMatchObject({ inputTokens: ESTIMATED_TOKENS, outputTokens: 0 });
    });

    it('should fall back to the secondary when the primary is out of quota', async () => {
      const openai = new FakeProvider('openai', [new ProviderError('insufficient quota', 'openai', 'quota', 429)]);
      const anthropic = new FakeProvider('anthropic', ['from secondary']);
      const router = createTestRouter({ openai, anthropic });

      const result = await router.complete(REQUEST);

      expect(result.provider).toBe('anthropic');
      expect(openai.complete).toHaveBeenCalledTimes(1);
    });

    it('should not fall back on other primary errors', async () => {
      const failure = new ProviderError('Invalid API key', 'openai', 'auth', 401);
      const openai = new FakeProvider('openai', [failure]);
      const anthropic = new FakeProvider('anthropic', ['unused']);
      const router = createTestRouter({ openai, anthropic });

      const error = await captureError(router.complete(REQUEST));

      expect(error).toBe(failure);
      expect(anthropic.complete).not.toHaveBeenCalled();
    });

    it('should follow the configured route for the purpose', async () => {
      const openai = new FakeProvider('openai', ['from openai']);
      const anthropic = new FakeProvider('anthropic', ['from anthropic']);
      const router = createTestRouter({ openai, anthropic });

      const result = await router.complete({ ...REQUEST, purpose: 'synthesis' });

      expect(result.provider).toBe('anthropic');
    });

    it('should skip a provider without credentials', async () => {
      const anthropic = new FakeProvider('anthropic', ['from anthropic']);
      const router = createTestRouter({ anthropic });

      const result = await router.complete(REQUEST);

      expect(result.provider).toBe('anthropic');
    });
  });

  describe('rate limits', () => {
    it('should retry a rate-limited call on the same provider', async () => {
      const openai = new FakeProvider('openai', [new ProviderError('Too many requests', 'openai', 'rate_limit', 429), 'ok']);
      const anthropic = new FakeProvider('anthropic', ['unused']);
      const router = createTestRouter({ openai, anthropic });
      const { calls, onCall } = recorder();

      const result = await router.complete(REQUEST, { onCall });

      expect(result.provider).toBe('openai');
      expect(openai.complete).toHaveBeenCalledTimes(2);
      expect(anthropic.complete).not.toHaveBeenCalled();
      expect(calls.map((c) => c.errorKind)).toEqual(['rate_limit', undefined]);
    });

    it('should give up after the retry budget without falling back', async () => {
      const openai = new FakeProvider('openai', [new ProviderError('Too many requests', 'openai', 'rate_limit', 429)]);
      const anthropic = new FakeProvider('anthropic', ['unused']);
      const router = createTestRouter({ openai, anthropic });

      const error = await captureError(router.complete(REQUEST));

      expect(error).toBeInstanceOf(ProviderError);
      expect(error).toMatchObject({ kind: 'rate_limit' });
      expect(openai.complete).toHaveBeenCalledTimes(3);
      expect(anthropic.complete).not.toHaveBeenCalled();
    });

    it('should surface a rate limiter wait that exceeds its bound', async () => {
      const openai = new FakeProvider('openai', ['ok']);
      const rateLimiter = new TokenBucketRateLimiter({ requestsPerMinute: 1, tokensPerMinute: 100000, maxQueueWaitMs: 10 });
      const router = createTestRouter({ openai }, { rateLimiter });

      await router.complete(REQUEST);
      const error = await captureError(router.complete(REQUEST));

      expect(error).toBeInstanceOf(RateLimitWaitExceededError);
      expect(openai.complete).toHaveBeenCalledTimes(1);
    });
  });

  describe('exhaustion', () => {
    it('should throw ProvidersExhaustedError when the secondary fails too', async () => {
      const openai = new FakeProvider('openai', [new ProviderError('Bad gateway', 'openai', 'server', 502)]);
      const anthropic = new FakeProvider('anthropic', [new ProviderError('Invalid API key', 'anthropic', 'auth', 401)]);
      const router = createTestRouter({ openai, anthropic });

      const error = await captureError(router.complete(REQUEST));

      expect(error).toBeInstanceOf(ProvidersExhaustedError);
      expect(error).toMatchObject({
        purpose: 'page-selection',
        message: 'All providers failed for page-selection: openai: Bad gateway; anthropic: Invalid API key',
      });
    });

    it('should throw ProvidersExhaustedError when no secondary is configured', async () => {
      const openai = new FakeProvider('openai', [new ProviderError('Bad gateway', 'openai', 'server', 502)]);
      const router = createTestRouter({ openai });

      const error = await captureError(router.complete(REQUEST));

      expect(error).toBeInstanceOf(ProvidersExhaustedError);
      expect(error).toMatchObject({ failures: [{ kind: 'server' }] });
    });

    it('should report a missing key when no provider serves the purpose', async () => {
      const router = createTestRouter({});

      const error = await captureError(router.complete(REQUEST));

      expect(error).toBeInstanceOf(ProvidersExhaustedError);
      expect(error).toMatchObject({
        failures: [{ kind: 'auth', provider: 'openai', message: 'No API key configured for openai' }],
      });
    });
  });

  describe('failure normalization', () => {
    it('should turn a call past its deadline into a timeout error', async () => {
      const hang = (_request: CompletionRequest, options?: ProviderCallOptions) =>
        new Promise<string>((_resolve, reject) => {
          options?.signal?.addEventListener('abort', () => reject(new Error('request aborted')));
        });
      const openai = new FakeProvider('openai', [hang]);
      const router = createTestRouter({ openai }, { callTimeoutMs: 20 });

      const error = await captureError(router.complete(REQUEST));

      expect(error).toBeInstanceOf(ProviderError);
      expect(error).toMatchObject({ kind: 'timeout', message: 'openai call exceeded 20ms' });
    });

    it('should wrap unexpected errors as unknown provider errors', async () => {
      const openai = new FakeProvider('openai', [new Error('socket hang up')]);
      const anthropic = new FakeProvider('anthropic', ['unused']);
      const router = createTestRouter({ openai, anthropic });

      const error = await captureError(router.complete(REQUEST));

      expect(error).toBeInstanceOf(ProviderError);
      expect(error).toMatchObject({ kind: 'unknown', provider: 'openai', message: 'socket hang up' });
    });

    it('should keep going when the call observer throws', async () => {
      const router = createTestRouter({ openai: new FakeProvider('openai', ['ok']) });

      const result = await router.complete(REQUEST, {
        onCall: () => {
          throw new Error('observer failed');
        },
      });

      expect(result.value.text).toBe('ok');
    });

    it('should reject embeddings from a provider without them', async () => {
      const router = createTestRouter({ openai: new FakeProvider('openai', ['ok']) });

      const error = await captureError(router.embed({ kind: 'embedding', purpose: 'embedding', input: ['text'] }));

      expect(error).toBeInstanceOf(ProviderError);
      expect(error).toMatchObject({ kind: 'invalid_request', message: 'openai does not provide embeddings' });
    });
  });

  describe('contextBudgetChars', () => {
    it('should use the smallest context along the route', () => {
      const router = createTestRouter({
        openai: new FakeProvider('openai', ['ok'], { ...TEST_METADATA, contextTokens: 2000 }),
        anthropic: new FakeProvider('anthropic', ['ok'], { ...TEST_METADATA, contextTokens: 10000 }),
      });

      expect(router.contextBudgetChars('page-selection', 1000)).toBe(6000);
      expect(router.contextBudgetChars('page-selection')).toBe(3000);
      expect(router.contextBudgetChars('page-selection', 10000)).toBe(0);
    });

    it('should be zero when nothing serves the purpose', () => {
      const router = createTestRouter({ anthropic: new FakeProvider('anthropic', ['ok']) });

      expect(router.contextBudgetChars('embedding')).toBe(0);
      expect(router.hasRoute('embedding')).toBe(false);
      expect(router.hasRoute('synthesis')).toBe(true);
    });
  });
});
