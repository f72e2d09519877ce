/**
 * SiteScope SDK
 *
 * Programmatic entry point for running company research as a library,
 * without the MCP server.
 *
 * Usage:
 * ```typescript
 * import { createResearchPipeline } from 'sitescope';
 *
 * const pipeline = createResearchPipeline({ overrides: { maxPrioritizedPages: 15 } });
 * const result = await pipeline.research({ companyName: 'Acme', url: 'acme.com' });
 * console.log(result.artifact.fields.industry);
 * ```
 */

import {
  getMergedPipelineConfig,
  getMergedProvidersConfig,
  getMergedRateLimitConfig,
  type PipelineConfigOverrides,
} from './utils/config-loader.js';
import type { PipelineConfig, RateLimitConfig } from './utils/config-schemas.js';
import { TokenBucketRateLimiter } from './utils/rate-limiter.js';
import { createProviders, ProviderRouter, type ProviderRegistry } from './providers/index.js';
import { ResearchPipeline, type ResearchOptions } from './core/research-pipeline.js';
import type { PageRenderer } from './core/page-fetcher.js';
import type { ResearchResult, ResearchTarget } from './types/research.js';

// Core classes for advanced usage
export { ResearchPipeline } from './core/research-pipeline.js';
export { LinkDiscoveryEngine, extractPageLinks, mergeDiscoveredLinks } from './core/link-discovery.js';
export { PagePrioritizer, heuristicSelect } from './core/page-prioritizer.js';
export { ExtractionCoordinator, buildExtractionBatch } from './core/extraction-coordinator.js';
export {
  ExtractionStrategyChain,
  ReadabilityStrategy,
  SelectorStrategy,
  type ExtractionStrategy,
  type ExtractionInput,
  type ChainOutcome,
} from './core/extraction-strategies.js';
export { IntelligenceSynthesizer, buildSynthesisContext } from './core/intelligence-synthesizer.js';
export { HttpPageFetcher, type PageFetcher, type PageRenderer, type FetchedPage } from './core/page-fetcher.js';
export { HeuristicDomainResolver, type DomainResolver } from './core/domain-resolver.js';
export type {
  LinkDiscoverer,
  ResearchOptions,
  ResearchPipelineDeps,
  PipelineRunOverrides,
} from './core/research-pipeline.js';

export * from './providers/index.js';
export { TokenBucketRateLimiter } from './utils/rate-limiter.js';
export type { PipelineConfig, ProvidersConfig, RateLimitConfig, RoutesConfig } from './utils/config-schemas.js';
export type { PipelineConfigOverrides } from './utils/config-loader.js';

export * from './types/index.js';

export interface CreateResearchPipelineOptions {
  /** Per-pipeline configuration on top of env and config file */
  overrides?: PipelineConfigOverrides;
  /** Replaces the adapters built from OPENAI_API_KEY / ANTHROPIC_API_KEY */
  providers?: ProviderRegistry;
  /** Share one limiter across pipelines to keep a process-wide budget */
  rateLimiter?: TokenBucketRateLimiter;
  rateLimit?: Partial<RateLimitConfig>;
  renderer?: PageRenderer;
}

/**
 * Pipeline wired from merged configuration (overrides > env > config file > defaults)
 */
export function createResearchPipeline(options: CreateResearchPipelineOptions = {}): ResearchPipeline {
  const config: PipelineConfig = getMergedPipelineConfig(options.overrides);
  const rateLimiter =
    options.rateLimiter ?? new TokenBucketRateLimiter({ ...getMergedRateLimitConfig(), ...options.rateLimit });
  const router = new ProviderRouter({
    providers: options.providers ?? createProviders(getMergedProvidersConfig()),
    routes: config.routes,
    rateLimiter,
  });

  return new ResearchPipeline({
    config,
    router,
    ...(options.renderer && { renderer: options.renderer }),
  });
}

/**
 * One-shot research with a fresh pipeline
 */
export async function research(
  target: ResearchTarget,
  options: ResearchOptions & CreateResearchPipelineOptions = {}
): Promise<ResearchResult> {
  const { signal, sink, overrides, ...pipelineOptions } = options;
  return createResearchPipeline({ ...pipelineOptions, ...(overrides && { overrides }) }).research(target, {
    signal,
    sink,
  });
}
