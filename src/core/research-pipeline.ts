/**
 * Research Pipeline
 *
 * resolution -> discovery -> prioritization -> extraction -> synthesis.
 * Holds no state between runs: every run gets its own fetcher, signal,
 * progress sink and call log. Only the router (and its rate limiter) is
 * shared.
 */

import { logger } from '../utils/logger.js';
import { abortedByTimeout, linkSignals, throwIfAborted } from '../utils/abort.js';
import { toBaseUrl } from '../utils/url-utils.js';
import type { PipelineConfig } from '../utils/config-schemas.js';
import { applyPipelineOverrides } from '../utils/config-loader.js';
import {
  DiscoveryExhaustedError,
  InvalidTargetError,
  PipelineCancelledError,
  ResearchError,
} from '../types/errors.js';
import {
  createProgressEvent,
  type PipelineStage,
  type ProgressSink,
  type ProgressStatus,
} from '../types/progress.js';
import {
  DISCOVERY_SOURCES,
  type CallPurpose,
  type PartialResearch,
  type ProviderCallRecord,
  type ResearchResult,
  type ResearchTarget,
  type ResearchWarning,
} from '../types/research.js';
import type { ProviderRouter } from '../providers/provider-router.js';
import { LinkDiscoveryEngine } from './link-discovery.js';
import { PagePrioritizer } from './page-prioritizer.js';
import { ExtractionCoordinator } from './extraction-coordinator.js';
import { ExtractionStrategyChain } from './extraction-strategies.js';
import { IntelligenceSynthesizer } from './intelligence-synthesizer.js';
import { HttpPageFetcher, type PageFetcher, type PageRenderer } from './page-fetcher.js';
import { HeuristicDomainResolver, type DomainResolver } from './domain-resolver.js';

const log = logger.pipeline;

export type LinkDiscoverer = Pick<LinkDiscoveryEngine, 'discover'>;

export interface ResearchPipelineDeps {
  config: PipelineConfig;
  router: ProviderRouter;
  discovery?: LinkDiscoverer;
  /** Called once per run; the fetcher's cookie jar lives as long as the run */
  createFetcher?: (config: PipelineConfig) => PageFetcher;
  chain?: ExtractionStrategyChain;
  resolver?: DomainResolver;
  renderer?: PageRenderer;
}

export type PipelineRunOverrides = Partial<Omit<PipelineConfig, 'routes'>>;

export interface ResearchOptions {
  signal?: AbortSignal;
  sink?: ProgressSink;
  /** Per-run values for the configuration surface */
  overrides?: PipelineRunOverrides;
}

const STAGE_FOR_PURPOSE: Record<CallPurpose, PipelineStage> = {
  'page-selection': 'prioritization',
  synthesis: 'synthesis',
  classification: 'pipeline',
  embedding: 'pipeline',
};

export class ResearchPipeline {
  private readonly config: PipelineConfig;
  private readonly router: ProviderRouter;
  private readonly discovery: LinkDiscoverer;
  private readonly createFetcher: (config: PipelineConfig) => PageFetcher;
  private readonly resolver: DomainResolver;
  private readonly chainOverride?: ExtractionStrategyChain;
  private readonly prioritizer: PagePrioritizer;
  private readonly synthesizer: IntelligenceSynthesizer;

  constructor(deps: ResearchPipelineDeps) {
    this.config = deps.config;
    this.router = deps.router;
    this.discovery = deps.discovery ?? new LinkDiscoveryEngine();
    this.createFetcher =
      deps.createFetcher ??
      ((config) =>
        new HttpPageFetcher({ userAgent: config.userAgent, renderMode: config.renderMode, renderer: deps.renderer }));
    this.resolver = deps.resolver ?? new HeuristicDomainResolver({ userAgent: deps.config.userAgent });
    this.chainOverride = deps.chain;
    this.prioritizer = new PagePrioritizer(this.router);
    this.synthesizer = new IntelligenceSynthesizer(this.router);
  }

  /**
   * Run every stage for one target. Per-run overrides are validated on top
   * of the pipeline configuration before any work starts.
   *
   * @throws ConfigValidationError for an out-of-range override
   * @throws PipelineCancelledError on cancellation or global timeout, with the partial state
   */
  async research(input: ResearchTarget, options: ResearchOptions = {}): Promise<ResearchResult> {
    const target: ResearchTarget = Object.freeze({ ...input });
    const config: PipelineConfig = applyPipelineOverrides(this.config, options.overrides);
    const startTime = Date.now();
    const partial: PartialResearch = { providerCalls: [] };
    const warnings: ResearchWarning[] = [];
    const run = linkSignals(
      [options.signal],
      config.globalTimeoutMs > 0 ? config.globalTimeoutMs : undefined,
      `Research run exceeded ${config.globalTimeoutMs}ms`
    );
    const { signal } = run;
    let stage: PipelineStage = 'pipeline';

    const emit = (
      eventStage: PipelineStage,
      status: ProgressStatus,
      detail: string,
      extras?: { url?: string; data?: Record<string, unknown> }
    ): void => {
      if (!options.sink) return;
      try {
        options.sink.onEvent(createProgressEvent(eventStage, status, detail, startTime, extras));
      } catch (error) {
        log.warn('Progress sink threw', { stage: eventStage, status, error: String(error) });
      }
    };

    const onCall = (record: ProviderCallRecord): void => {
      partial.providerCalls.push(record);
      emit(
        STAGE_FOR_PURPOSE[record.purpose],
        'progress',
        `${record.provider} ${record.purpose} call ${record.success ? 'succeeded' : `failed (${record.errorKind ?? 'unknown'})`}`,
        { data: { ...record } }
      );
    };

    const warn = (warning: ResearchWarning): void => {
      warnings.push(warning);
      log.warn(warning.message, { code: warning.code });
    };

    log.info('Research started', { companyName: target.companyName, url: target.url });
    emit('pipeline', 'started', `Researching ${target.companyName}`);

    try {
      // Resolution
      stage = 'resolution';
      const resolvedUrl = await this.resolveBaseUrl(target, signal, emit);
      partial.resolvedUrl = resolvedUrl;

      // Discovery
      stage = 'discovery';
      emit('discovery', 'started', `Discovering links on ${resolvedUrl}`, { url: resolvedUrl });
      const report = await this.discovery.discover(resolvedUrl, { ...config, signal });
      const sourceErrors: string[] = [];
      for (const source of DISCOVERY_SOURCES) {
        const error = report.sources[source].error;
        if (error !== undefined) {
          sourceErrors.push(`${source}: ${error}`);
          warn({ code: 'DISCOVERY_SOURCE_FAILED', message: `${source} discovery failed: ${error}` });
        }
      }
      if (report.links.length === 0) {
        throw new DiscoveryExhaustedError(resolvedUrl, sourceErrors);
      }
      partial.links = report.links;
      emit('discovery', 'completed', `Discovered ${report.links.length} links`, {
        data: {
          links: report.links.length,
          robots: report.sources.robots.count,
          sitemap: report.sources.sitemap.count,
          crawl: report.sources.crawl.count,
        },
      });

      // Prioritization
      stage = 'prioritization';
      emit('prioritization', 'started', `Selecting up to ${config.maxPrioritizedPages} of ${report.links.length} pages`);
      const prioritization = await this.prioritizer.prioritize(report.links, target, resolvedUrl, {
        maxPages: config.maxPrioritizedPages,
        signal,
        onCall,
      });
      throwIfAborted(signal);
      partial.prioritized = prioritization.pages;
      if (prioritization.degraded) {
        warn({
          code: 'PRIORITIZATION_DEGRADED',
          message: `Heuristic page selection used: ${prioritization.degradedReason ?? 'unknown reason'}`,
        });
      }
      emit('prioritization', 'completed', `Selected ${prioritization.pages.length} pages`, {
        data: { selected: prioritization.pages.length, degraded: prioritization.degraded },
      });

      // Extraction
      stage = 'extraction';
      emit('extraction', 'started', `Extracting ${prioritization.pages.length} pages`);
      const coordinator = new ExtractionCoordinator(
        this.createFetcher(config),
        this.chainOverride ?? new ExtractionStrategyChain(config.minSubstantialContentLength)
      );
      const batch = await coordinator.extractAll(prioritization.pages, {
        concurrency: config.concurrency,
        perPageTimeoutMs: config.perPageTimeoutMs,
        signal,
        onPageComplete: (result, completed, total) =>
          emit(
            'extraction',
            result.status === 'success' ? 'progress' : 'failed',
            `${result.status}: ${result.url}`,
            {
              url: result.url,
              data: { status: result.status, rank: result.rank, chars: result.charLength, completed, total },
            }
          ),
      });
      partial.batch = batch;
      emit('extraction', 'completed', `${batch.succeeded} of ${batch.attempted} pages yielded content`, {
        data: { attempted: batch.attempted, succeeded: batch.succeeded, totalChars: batch.totalChars },
      });

      // Synthesis
      stage = 'synthesis';
      emit('synthesis', 'started', `Synthesizing ${batch.succeeded} pages`);
      const artifact = await this.synthesizer.synthesize(batch, target, {
        maxContextChars: config.synthesisMaxChars,
        signal,
        onCall,
      });
      throwIfAborted(signal);
      if (artifact.softError) {
        warn({ code: artifact.softError.code, message: artifact.softError.message });
        emit('synthesis', 'failed', artifact.softError.message, { data: { code: artifact.softError.code } });
      } else {
        emit('synthesis', 'completed', `Profile built from ${artifact.sourceUrls.length} pages`);
      }

      const durationMs = Date.now() - startTime;
      log.info('Research complete', {
        companyName: target.companyName,
        attempted: batch.attempted,
        succeeded: batch.succeeded,
        warnings: warnings.length,
        durationMs,
      });
      emit('pipeline', 'completed', `Research finished with ${warnings.length} warnings`);

      return {
        target,
        resolvedUrl,
        links: report.links,
        prioritized: prioritization.pages,
        prioritizationDegraded: prioritization.degraded,
        batch,
        artifact,
        providerCalls: partial.providerCalls,
        warnings,
        durationMs,
      };
    } catch (error) {
      const failure = signal.aborted ? this.cancellation(error, signal, options.signal, partial) : error;
      const message = failure instanceof Error ? failure.message : String(failure);
      const code = failure instanceof ResearchError ? failure.code : 'INTERNAL_ERROR';
      log.error('Research failed', { stage, code, error: failure });
      emit(stage, 'failed', message, { data: { code } });
      emit('pipeline', 'failed', message, { data: { code } });
      throw failure;
    } finally {
      run.dispose();
    }
  }

  private async resolveBaseUrl(
    target: ResearchTarget,
    signal: AbortSignal,
    emit: (stage: PipelineStage, status: ProgressStatus, detail: string, extras?: { url?: string }) => void
  ): Promise<string> {
    if (target.url !== undefined) {
      const baseUrl = toBaseUrl(target.url);
      if (!baseUrl) {
        throw new InvalidTargetError(target.url);
      }
      return baseUrl;
    }

    emit('resolution', 'started', `Finding a website for ${target.companyName}`);
    const resolved = await this.resolver.resolve(target.companyName, { signal });
    emit('resolution', 'completed', `Resolved ${resolved}`, { url: resolved });
    return resolved;
  }

  /**
   * The run signal fired: report what had completed
   */
  private cancellation(
    error: unknown,
    runSignal: AbortSignal,
    callerSignal: AbortSignal | undefined,
    partial: PartialResearch
  ): PipelineCancelledError {
    const batch = error instanceof PipelineCancelledError ? error.partial.batch : partial.batch;
    const reason = abortedByTimeout(runSignal) && !callerSignal?.aborted ? 'timeout' : 'aborted';
    return new PipelineCancelledError(
      reason,
      {
        ...partial,
        providerCalls: [...partial.providerCalls],
        ...(batch && { batch }),
      },
      error
    );
  }
}
