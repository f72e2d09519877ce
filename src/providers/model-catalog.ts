/**
 * Published context sizes and list prices for the models the adapters
 * know by name. Unknown models fall back to the provider default entry.
 */

import type { ProviderName } from '../types/research.js';
import type { ProviderMetadata } from './types.js';

const CATALOG: Record<ProviderName, Record<string, ProviderMetadata>> = {
  openai: {
    'gpt-4o-mini': { contextTokens: 128000, inputCostPer1k: 0.00015, outputCostPer1k: 0.0006, typicalLatencyMs: 3000 },
    'gpt-4o': { contextTokens: 128000, inputCostPer1k: 0.0025, outputCostPer1k: 0.01, typicalLatencyMs: 6000 },
    'gpt-4.1-mini': { contextTokens: 1047576, inputCostPer1k: 0.0004, outputCostPer1k: 0.0016, typicalLatencyMs: 4000 },
    'gpt-4.1': { contextTokens: 1047576, inputCostPer1k: 0.002, outputCostPer1k: 0.008, typicalLatencyMs: 8000 },
    'text-embedding-3-small': { contextTokens: 8191, inputCostPer1k: 0.00002, outputCostPer1k: 0, typicalLatencyMs: 500 },
    'text-embedding-3-large': { contextTokens: 8191, inputCostPer1k: 0.00013, outputCostPer1k: 0, typicalLatencyMs: 700 },
  },
  anthropic: {
    'claude-3-5-sonnet-latest': { contextTokens: 200000, inputCostPer1k: 0.003, outputCostPer1k: 0.015, typicalLatencyMs: 12000 },
    'claude-3-5-haiku-latest': { contextTokens: 200000, inputCostPer1k: 0.0008, outputCostPer1k: 0.004, typicalLatencyMs: 5000 },
    'claude-3-opus-latest': { contextTokens: 200000, inputCostPer1k: 0.015, outputCostPer1k: 0.075, typicalLatencyMs: 20000 },
  },
};

const DEFAULTS: Record<ProviderName, ProviderMetadata> = {
  openai: CATALOG.openai['gpt-4o-mini'],
  anthropic: CATALOG.anthropic['claude-3-5-sonnet-latest'],
};

export function lookupModelMetadata(provider: ProviderName, model: string): ProviderMetadata {
  return CATALOG[provider][model] ?? DEFAULTS[provider];
}
