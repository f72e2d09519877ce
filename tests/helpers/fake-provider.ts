/**
 * Scripted model providers and a router built around them
 */

import { vi } from 'vitest';
import { ProviderRouter, type ProviderRegistry } from '../../src/providers/provider-router.js';
import { TokenBucketRateLimiter } from '../../src/utils/rate-limiter.js';
import { routesSchema, type RoutesConfig } from '../../src/utils/config-schemas.js';
import type {
  CompletionRequest,
  CompletionResponse,
  ModelProvider,
  ProviderCallOptions,
  ProviderMetadata,
} from '../../src/providers/types.js';
import type { ProviderName } from '../../src/types/research.js';

export type ScriptedReply = string | Error | ((request: CompletionRequest, options?: ProviderCallOptions) => Promise<string>);

export const TEST_METADATA: ProviderMetadata = {
  contextTokens: 100000,
  inputCostPer1k: 0.001,
  outputCostPer1k: 0.002,
  typicalLatencyMs: 10,
};

/**
 * Answers completions from a queue of replies; the last reply repeats
 */
export class FakeProvider implements ModelProvider {
  readonly requests: CompletionRequest[] = [];
  readonly complete = vi.fn(async (request: CompletionRequest, options?: ProviderCallOptions): Promise<CompletionResponse> => {
    this.requests.push(request);
    const reply = this.replies.length > 1 ? this.replies.shift() : this.replies[0];
    if (reply === undefined) {
      throw new Error('FakeProvider has no scripted reply');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    const text = typeof reply === 'string' ? reply : await reply(request, options);
    return { text, model: this.model, usage: { inputTokens: 100, outputTokens: 20 } };
  });

  constructor(
    readonly name: ProviderName,
    private readonly replies: ScriptedReply[],
    readonly metadata: ProviderMetadata = TEST_METADATA,
    readonly model = `${name}-test-model`
  ) {}
}

export interface TestRouterOptions {
  routes?: Partial<RoutesConfig>;
  callTimeoutMs?: number;
  rateLimiter?: TokenBucketRateLimiter;
}

export function createTestRouter(providers: ProviderRegistry, options: TestRouterOptions = {}): ProviderRouter {
  return new ProviderRouter({
    providers,
    routes: routesSchema.parse(options.routes ?? {}),
    rateLimiter:
      options.rateLimiter ??
      new TokenBucketRateLimiter({ requestsPerMinute: 100000, tokensPerMinute: 100000000, maxQueueWaitMs: 1000 }),
    rateLimitRetry: { maxAttempts: 3, initialDelayMs: 1, maxDelayMs: 5 },
    callTimeoutMs: options.callTimeoutMs ?? 1000,
  });
}
