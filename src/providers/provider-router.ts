/**
 * Provider Router
 *
 * Per purpose: primary provider, then the secondary once when the primary
 * reports quota exhaustion or a 5xx. Every attempt passes the shared
 * rate limiter first; provider 429s are retried on the same provider
 * with backoff. Each attempt is reported as a ProviderCallRecord.
 */

import { logger } from '../utils/logger.js';
import { isRateLimited, withRetry } from '../utils/retry.js';
import { TIMEOUTS } from '../utils/timeouts.js';
import { abortError, abortedByTimeout, linkSignals } from '../utils/abort.js';
import { ProviderError, ProvidersExhaustedError } from '../types/errors.js';
import type { TokenBucketRateLimiter } from '../utils/rate-limiter.js';
import type { RoutesConfig } from '../utils/config-schemas.js';
import type { CallPurpose, ProviderCallRecord, ProviderName } from '../types/research.js';
import {
  CHARS_PER_TOKEN,
  estimateCostUsd,
  estimateRequestTokens,
  type CompletionRequest,
  type CompletionResponse,
  type EmbeddingRequest,
  type EmbeddingResponse,
  type ModelProvider,
  type TokenUsage,
} from './types.js';

const log = logger.router;

export type ProviderRegistry = Partial<Record<ProviderName, ModelProvider>>;

export interface ProviderRouterOptions {
  providers: ProviderRegistry;
  routes: RoutesConfig;
  rateLimiter: TokenBucketRateLimiter;
  /** Same-provider retries for rate_limit responses */
  rateLimitRetry?: { maxAttempts?: number; initialDelayMs?: number; maxDelayMs?: number };
  callTimeoutMs?: number;
}

export interface RouteCallOptions {
  signal?: AbortSignal;
  onCall?: (record: ProviderCallRecord) => void;
}

export interface Routed<T> {
  value: T;
  provider: ProviderName;
  model: string;
}

interface RouteStep {
  provider: ModelProvider;
  attempt: ProviderCallRecord['attempt'];
}

/** Characters held back for instructions and framing around the payload */
export const PROMPT_RESERVE_CHARS = 4000;

export class ProviderRouter {
  private readonly providers: ProviderRegistry;
  private readonly routes: RoutesConfig;
  private readonly rateLimiter: TokenBucketRateLimiter;
  private readonly retry: { maxAttempts: number; initialDelayMs: number; maxDelayMs: number };
  private readonly callTimeoutMs: number;

  constructor(options: ProviderRouterOptions) {
    this.providers = options.providers;
    this.routes = options.routes;
    this.rateLimiter = options.rateLimiter;
    this.retry = {
      maxAttempts: options.rateLimitRetry?.maxAttempts ?? 3,
      initialDelayMs: options.rateLimitRetry?.initialDelayMs ?? TIMEOUTS.RATE_LIMIT_BACKOFF,
      maxDelayMs: options.rateLimitRetry?.maxDelayMs ?? 30000,
    };
    this.callTimeoutMs = options.callTimeoutMs ?? TIMEOUTS.PROVIDER_CALL;
  }

  async complete(request: CompletionRequest, options: RouteCallOptions = {}): Promise<Routed<CompletionResponse>> {
    return this.route(request.purpose, estimateRequestTokens(request), options, (provider, signal) =>
      provider.complete(request, { signal }).then((response) => ({ value: response, usage: response.usage }))
    );
  }

  async embed(request: EmbeddingRequest, options: RouteCallOptions = {}): Promise<Routed<EmbeddingResponse>> {
    return this.route('embedding', estimateRequestTokens(request), options, (provider, signal) => {
      if (!provider.embed) {
        return Promise.reject(
          new ProviderError(`${provider.name} does not provide embeddings`, provider.name, 'invalid_request')
        );
      }
      return provider.embed(request, { signal }).then((response) => ({ value: response, usage: response.usage }));
    });
  }

  /**
   * Characters of payload every provider on the route can take, less the
   * reserve. 0 when nothing is configured for the purpose.
   */
  contextBudgetChars(purpose: CallPurpose, reserveChars = PROMPT_RESERVE_CHARS): number {
    const steps = this.stepsFor(purpose);
    if (steps.length === 0) return 0;
    const tokens = Math.min(...steps.map((step) => step.provider.metadata.contextTokens));
    return Math.max(0, Math.floor(tokens * CHARS_PER_TOKEN) - reserveChars);
  }

  /** True when at least one configured provider serves the purpose */
  hasRoute(purpose: CallPurpose): boolean {
    return this.stepsFor(purpose).length > 0;
  }

  private stepsFor(purpose: CallPurpose): RouteStep[] {
    const route = this.routes[purpose];
    const steps: RouteStep[] = [];
    const primary = this.providers[route.primary];
    if (primary) {
      steps.push({ provider: primary, attempt: 'primary' });
    }
    if (route.secondary && route.secondary !== route.primary) {
      const secondary = this.providers[route.secondary];
      if (secondary) {
        steps.push({ provider: secondary, attempt: 'secondary' });
      }
    }
    return steps;
  }

  private async route<T>(
    purpose: CallPurpose,
    estimatedTokens: number,
    options: RouteCallOptions,
    invoke: (provider: ModelProvider, signal: AbortSignal) => Promise<{ value: T; usage: TokenUsage }>
  ): Promise<Routed<T>> {
    const steps = this.stepsFor(purpose);
    if (steps.length === 0) {
      const route = this.routes[purpose];
      throw new ProvidersExhaustedError(purpose, [
        new ProviderError(`No API key configured for ${route.primary}`, route.primary, 'auth'),
      ]);
    }

    const failures: ProviderError[] = [];

    for (const [index, step] of steps.entries()) {
      try {
        const value = await withRetry(() => this.attempt(purpose, step, estimatedTokens, options, invoke), {
          ...this.retry,
          retryOn: isRateLimited,
          signal: options.signal,
        });
        return { value, provider: step.provider.name, model: step.provider.model };
      } catch (error) {
        if (options.signal?.aborted || !(error instanceof ProviderError)) {
          throw error;
        }
        failures.push(error);

        const hasNext = index < steps.length - 1;
        if (step.attempt === 'primary' && !error.triggersFallback) {
          throw error;
        }
        if (!hasNext) {
          break;
        }
        log.warn('Falling back to secondary provider', {
          purpose,
          from: step.provider.name,
          to: steps[index + 1].provider.name,
          kind: error.kind,
          status: error.status,
        });
      }
    }

    log.error('Providers exhausted', { purpose, failures: failures.map((f) => `${f.provider}:${f.kind}`) });
    throw new ProvidersExhaustedError(purpose, failures);
  }

  /**
   * One call on one provider: rate limit, timeout, record
   */
  private async attempt<T>(
    purpose: CallPurpose,
    step: RouteStep,
    estimatedTokens: number,
    options: RouteCallOptions,
    invoke: (provider: ModelProvider, signal: AbortSignal) => Promise<{ value: T; usage: TokenUsage }>
  ): Promise<T> {
    const { provider } = step;
    await this.rateLimiter.acquire(estimatedTokens, options.signal);

    const startTime = Date.now();
    const linked = linkSignals([options.signal], this.callTimeoutMs, `${provider.name} call exceeded ${this.callTimeoutMs}ms`);

    const record = (usage: TokenUsage, success: boolean, error?: ProviderError): void => {
      const callRecord: ProviderCallRecord = {
        provider: provider.name,
        model: provider.model,
        purpose,
        attempt: step.attempt,
        inputTokens: usage.inputTokens,
        outputTokens: usage.outputTokens,
        estimatedCostUsd: estimateCostUsd(provider.metadata, usage),
        latencyMs: Date.now() - startTime,
        success,
        ...(error && { errorKind: error.kind }),
      };
      log.debug('Provider call finished', { ...callRecord });
      try {
        options.onCall?.(callRecord);
      } catch (observerError) {
        log.warn('Provider call observer threw', { error: String(observerError) });
      }
    };

    try {
      const { value, usage } = await invoke(provider, linked.signal);
      record(usage, true);
      return value;
    } catch (error) {
      if (options.signal?.aborted) {
        throw abortError(options.signal);
      }
      const providerError = this.normalizeError(error, provider.name, linked.signal);
      record({ inputTokens: estimatedTokens, outputTokens: 0 }, false, providerError);
      throw providerError;
    } finally {
      linked.dispose();
    }
  }

  private normalizeError(error: unknown, provider: ProviderName, signal: AbortSignal): ProviderError {
    if (error instanceof ProviderError) {
      return error;
    }
    if (signal.aborted && abortedByTimeout(signal)) {
      return new ProviderError(`${provider} call exceeded ${this.callTimeoutMs}ms`, provider, 'timeout', undefined, {
        cause: error,
      });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new ProviderError(message, provider, 'unknown', undefined, { cause: error });
  }
}
