/**
 * Provider construction from merged configuration
 */

import { logger } from '../utils/logger.js';
import type { ProvidersConfig } from '../utils/config-schemas.js';
import { OpenAIProvider } from './openai-provider.js';
import { AnthropicProvider } from './anthropic-provider.js';
import type { ProviderRegistry } from './provider-router.js';

export * from './types.js';
export { OpenAIProvider, type OpenAIClient } from './openai-provider.js';
export { AnthropicProvider, type AnthropicClient } from './anthropic-provider.js';
export { ProviderRouter, PROMPT_RESERVE_CHARS } from './provider-router.js';
export type { ProviderRegistry, ProviderRouterOptions, RouteCallOptions, Routed } from './provider-router.js';

/**
 * Adapters for every provider that has an API key
 */
export function createProviders(config: ProvidersConfig): ProviderRegistry {
  const registry: ProviderRegistry = {};

  if (config.openai.apiKey) {
    registry.openai = new OpenAIProvider({
      apiKey: config.openai.apiKey,
      model: config.openai.model,
      embeddingModel: config.openai.embeddingModel,
      ...(config.openai.baseUrl !== undefined && { baseUrl: config.openai.baseUrl }),
    });
  }
  if (config.anthropic.apiKey) {
    registry.anthropic = new AnthropicProvider({
      apiKey: config.anthropic.apiKey,
      model: config.anthropic.model,
    });
  }

  logger.router.info('Providers configured', { providers: Object.keys(registry) });
  return registry;
}
