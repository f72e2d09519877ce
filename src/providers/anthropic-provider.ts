/**
 * Anthropic adapter: messages API. No embeddings.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { MessageCreateParamsNonStreaming } from '@anthropic-ai/sdk/resources/messages';
import { abortError } from '../utils/abort.js';
import { ProviderError, classifyProviderStatus } from '../types/errors.js';
import { lookupModelMetadata } from './model-catalog.js';
import type {
  CompletionRequest,
  CompletionResponse,
  ModelProvider,
  ProviderCallOptions,
  ProviderMetadata,
} from './types.js';

/**
 * The part of the SDK client the adapter calls
 */
export interface AnthropicClient {
  messages: {
    create(
      body: MessageCreateParamsNonStreaming,
      options?: { signal?: AbortSignal }
    ): PromiseLike<{
      model: string;
      content: ReadonlyArray<{ type: string; text?: string }>;
      usage: { input_tokens: number; output_tokens: number };
    }>;
  };
}

export interface AnthropicProviderOptions {
  apiKey: string;
  model: string;
  /** Preconfigured client, for tests */
  client?: AnthropicClient;
}

/** Billing failures arrive as 400s with this wording */
const CREDIT_EXHAUSTED = /credit balance|billing/i;

export class AnthropicProvider implements ModelProvider {
  readonly name = 'anthropic' as const;
  readonly model: string;
  readonly metadata: ProviderMetadata;
  private readonly client: AnthropicClient;

  constructor(options: AnthropicProviderOptions) {
    this.model = options.model;
    this.metadata = lookupModelMetadata('anthropic', options.model);
    this.client = options.client ?? new Anthropic({ apiKey: options.apiKey, maxRetries: 0 });
  }

  async complete(request: CompletionRequest, options: ProviderCallOptions = {}): Promise<CompletionResponse> {
    const { signal } = options;
    // A prefilled brace keeps the reply on the JSON object
    const prefill = request.json === true ? '{' : '';

    try {
      const message = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: request.maxOutputTokens,
          temperature: request.temperature ?? 0.2,
          system: request.system,
          messages: [
            ...request.messages,
            ...(prefill ? [{ role: 'assistant' as const, content: prefill }] : []),
          ],
        },
        { signal }
      );

      const text = message.content
        .map((block) => (block.type === 'text' ? (block.text ?? '') : ''))
        .join('')
        .trim();

      return {
        text: prefill + text,
        model: message.model,
        usage: {
          inputTokens: message.usage.input_tokens,
          outputTokens: message.usage.output_tokens,
        },
      };
    } catch (error) {
      throw this.toProviderError(error, signal);
    }
  }

  private toProviderError(error: unknown, signal?: AbortSignal): Error {
    if (signal?.aborted) {
      return abortError(signal);
    }
    if (error instanceof Anthropic.APIConnectionTimeoutError) {
      return new ProviderError(error.message, this.name, 'timeout', undefined, { cause: error });
    }
    if (error instanceof Anthropic.APIConnectionError) {
      return new ProviderError(error.message, this.name, 'network', undefined, { cause: error });
    }
    if (error instanceof Anthropic.APIError) {
      const kind = CREDIT_EXHAUSTED.test(error.message) ? 'quota' : classifyProviderStatus(error.status, error.message);
      return new ProviderError(error.message, this.name, kind, error.status, { cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new ProviderError(message, this.name, classifyProviderStatus(undefined, message), undefined, { cause: error });
  }
}
