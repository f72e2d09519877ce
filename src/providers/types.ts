/**
 * Model Provider Contracts
 *
 * Requests are tagged by kind and purpose so adapters never receive an
 * untyped prompt payload. Adapters translate SDK failures into
 * ProviderError; everything above them sees only these shapes.
 */

import type { CallPurpose, ProviderName } from '../types/research.js';

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export type CompletionPurpose = Exclude<CallPurpose, 'embedding'>;

export interface CompletionRequest {
  kind: 'completion';
  purpose: CompletionPurpose;
  system: string;
  messages: ChatMessage[];
  maxOutputTokens: number;
  temperature?: number;
  /** Ask for a JSON object reply where the provider supports it */
  json?: boolean;
}

export interface EmbeddingRequest {
  kind: 'embedding';
  purpose: 'embedding';
  input: string[];
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface CompletionResponse {
  text: string;
  model: string;
  usage: TokenUsage;
}

export interface EmbeddingResponse {
  vectors: number[][];
  model: string;
  usage: TokenUsage;
}

/**
 * Cost and capacity figures the router uses for budgeting and records
 */
export interface ProviderMetadata {
  contextTokens: number;
  /** USD per 1000 input tokens */
  inputCostPer1k: number;
  /** USD per 1000 output tokens */
  outputCostPer1k: number;
  typicalLatencyMs: number;
}

export interface ProviderCallOptions {
  signal?: AbortSignal;
}

export interface ModelProvider {
  readonly name: ProviderName;
  readonly model: string;
  readonly metadata: ProviderMetadata;
  complete(request: CompletionRequest, options?: ProviderCallOptions): Promise<CompletionResponse>;
  embed?(request: EmbeddingRequest, options?: ProviderCallOptions): Promise<EmbeddingResponse>;
}

/** Average characters per token for English prose */
export const CHARS_PER_TOKEN = 3.5;

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

export function estimateRequestTokens(request: CompletionRequest | EmbeddingRequest): number {
  if (request.kind === 'embedding') {
    return request.input.reduce((sum, text) => sum + estimateTokens(text), 0);
  }
  const prompt = request.system + request.messages.map((message) => message.content).join('\n');
  return estimateTokens(prompt) + request.maxOutputTokens;
}

export function estimateCostUsd(metadata: ProviderMetadata, usage: TokenUsage): number {
  return (
    (usage.inputTokens / 1000) * metadata.inputCostPer1k +
    (usage.outputTokens / 1000) * metadata.outputCostPer1k
  );
}
