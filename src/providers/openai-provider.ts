/**
 * OpenAI adapter: chat completions with JSON response format, and
 * embeddings.
 */

import OpenAI from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import type { EmbeddingCreateParams } from 'openai/resources/embeddings';
import { abortError } from '../utils/abort.js';
import { ProviderError, classifyProviderStatus } from '../types/errors.js';
import { lookupModelMetadata } from './model-catalog.js';
import type {
  CompletionRequest,
  CompletionResponse,
  EmbeddingRequest,
  EmbeddingResponse,
  ModelProvider,
  ProviderCallOptions,
  ProviderMetadata,
} from './types.js';
import { estimateTokens } from './types.js';

/**
 * The part of the SDK client the adapter calls
 */
export interface OpenAIClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal }
      ): PromiseLike<{
        model: string;
        choices: ReadonlyArray<{ message: { content: string | null } }>;
        usage?: { prompt_tokens: number; completion_tokens: number };
      }>;
    };
  };
  embeddings: {
    create(
      body: EmbeddingCreateParams,
      options?: { signal?: AbortSignal }
    ): PromiseLike<{
      model: string;
      data: ReadonlyArray<{ embedding: number[] }>;
      usage: { prompt_tokens: number };
    }>;
  };
}

export interface OpenAIProviderOptions {
  apiKey: string;
  model: string;
  embeddingModel: string;
  baseUrl?: string;
  /** Preconfigured client, for tests */
  client?: OpenAIClient;
}

export class OpenAIProvider implements ModelProvider {
  readonly name = 'openai' as const;
  readonly model: string;
  readonly metadata: ProviderMetadata;
  private readonly embeddingModel: string;
  private readonly client: OpenAIClient;

  constructor(options: OpenAIProviderOptions) {
    this.model = options.model;
    this.embeddingModel = options.embeddingModel;
    this.metadata = lookupModelMetadata('openai', options.model);
    this.client =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey,
        ...(options.baseUrl !== undefined && { baseURL: options.baseUrl }),
        // The router owns retries
        maxRetries: 0,
      });
  }

  async complete(request: CompletionRequest, options: ProviderCallOptions = {}): Promise<CompletionResponse> {
    const { signal } = options;
    try {
      const result = await this.client.chat.completions.create(
        {
          model: this.model,
          temperature: request.temperature ?? 0.2,
          max_tokens: request.maxOutputTokens,
          messages: [
            { role: 'system', content: request.system },
            ...request.messages.map((message) =>
              message.role === 'user'
                ? { role: 'user' as const, content: message.content }
                : { role: 'assistant' as const, content: message.content }
            ),
          ],
          ...(request.json === true && { response_format: { type: 'json_object' as const } }),
        },
        { signal }
      );

      const text = (result.choices[0]?.message.content ?? '').trim();
      return {
        text,
        model: result.model,
        usage: {
          inputTokens: result.usage?.prompt_tokens ?? estimateTokens(request.system),
          outputTokens: result.usage?.completion_tokens ?? estimateTokens(text),
        },
      };
    } catch (error) {
      throw this.toProviderError(error, signal);
    }
  }

  async embed(request: EmbeddingRequest, options: ProviderCallOptions = {}): Promise<EmbeddingResponse> {
    const { signal } = options;
    try {
      const result = await this.client.embeddings.create(
        { model: this.embeddingModel, input: request.input },
        { signal }
      );
      return {
        vectors: result.data.map((item) => item.embedding),
        model: result.model,
        usage: { inputTokens: result.usage.prompt_tokens, outputTokens: 0 },
      };
    } catch (error) {
      throw this.toProviderError(error, signal);
    }
  }

  private toProviderError(error: unknown, signal?: AbortSignal): Error {
    if (signal?.aborted) {
      return abortError(signal);
    }
    if (error instanceof OpenAI.APIConnectionTimeoutError) {
      return new ProviderError(error.message, this.name, 'timeout', undefined, { cause: error });
    }
    if (error instanceof OpenAI.APIConnectionError) {
      return new ProviderError(error.message, this.name, 'network', undefined, { cause: error });
    }
    if (error instanceof OpenAI.APIError) {
      const kind = error.code === 'insufficient_quota' ? 'quota' : classifyProviderStatus(error.status, error.message);
      return new ProviderError(error.message, this.name, kind, error.status, { cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new ProviderError(message, this.name, classifyProviderStatus(undefined, message), undefined, { cause: error });
  }
}
