/**
 * Research Tool Handlers
 *
 * Handlers for research_company and discover_links. Arguments are
 * validated here; the pipeline never sees unchecked tool input.
 */

import { z } from 'zod';
import { logger } from '../../utils/logger.js';
import { toBaseUrl } from '../../utils/url-utils.js';
import { formatIssues } from '../../utils/json-response.js';
import { InvalidArgumentsError, InvalidTargetError } from '../../types/errors.js';
import type { ProgressEvent, ProgressSink } from '../../types/progress.js';
import type { PipelineConfig } from '../../utils/config-schemas.js';
import type { LinkDiscoverer, PipelineRunOverrides, ResearchPipeline } from '../../core/research-pipeline.js';
import {
  jsonResponse,
  errorResponse,
  formatDiscoveryReport,
  formatResearchResult,
  type McpResponse,
} from '../response-formatters.js';

const log = logger.server;

// ============================================
// ARGUMENTS
// ============================================

const boundedInt = (min: number, max: number) => z.number().int().min(min).max(max).optional();

export const researchCompanyArgsSchema = z.object({
  companyName: z.string().trim().min(1, 'companyName is required'),
  url: z.string().trim().min(1).optional(),
  context: z.string().optional(),
  maxLinks: boundedInt(1, 10000),
  maxCrawlDepth: boundedInt(0, 10),
  maxPrioritizedPages: boundedInt(1, 200),
  concurrency: boundedInt(1, 100),
  perPageTimeoutMs: boundedInt(100, 300000),
  globalTimeoutMs: boundedInt(0, 3600000),
  minSubstantialContentLength: boundedInt(1, 100000),
  includePageText: z.boolean().optional(),
});

export type ResearchCompanyArgs = z.infer<typeof researchCompanyArgsSchema>;

export const discoverLinksArgsSchema = z.object({
  url: z.string().trim().min(1, 'url is required'),
  maxLinks: boundedInt(1, 10000),
  maxCrawlDepth: boundedInt(0, 10),
});

export type DiscoverLinksArgs = z.infer<typeof discoverLinksArgsSchema>;

export function parseToolArgs<T>(tool: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, args: unknown): T {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new InvalidArgumentsError(`Invalid arguments for ${tool}: ${formatIssues(parsed.error)}`, issues);
  }
  return parsed.data;
}

/**
 * Configuration values the caller actually set
 */
export function runOverrides(args: ResearchCompanyArgs): PipelineRunOverrides {
  return {
    ...(args.maxLinks !== undefined && { maxLinks: args.maxLinks }),
    ...(args.maxCrawlDepth !== undefined && { maxCrawlDepth: args.maxCrawlDepth }),
    ...(args.maxPrioritizedPages !== undefined && { maxPrioritizedPages: args.maxPrioritizedPages }),
    ...(args.concurrency !== undefined && { concurrency: args.concurrency }),
    ...(args.perPageTimeoutMs !== undefined && { perPageTimeoutMs: args.perPageTimeoutMs }),
    ...(args.globalTimeoutMs !== undefined && { globalTimeoutMs: args.globalTimeoutMs }),
    ...(args.minSubstantialContentLength !== undefined && {
      minSubstantialContentLength: args.minSubstantialContentLength,
    }),
  };
}

// ============================================
// PROGRESS
// ============================================

/**
 * Forwards pipeline progress to the server log
 */
export class LoggingProgressSink implements ProgressSink {
  constructor(private readonly context: Record<string, unknown> = {}) {}

  onEvent(event: ProgressEvent): void {
    const details = { ...this.context, stage: event.stage, status: event.status, url: event.url, elapsedMs: event.elapsedMs };
    if (event.status === 'failed') {
      log.warn(event.detail, details);
    } else {
      log.debug(event.detail, details);
    }
  }
}

// ============================================
// HANDLERS
// ============================================

export async function handleResearchCompany(
  pipeline: ResearchPipeline,
  rawArgs: unknown,
  signal?: AbortSignal
): Promise<McpResponse> {
  const args = parseToolArgs('research_company', researchCompanyArgsSchema, rawArgs);
  const { companyName, url, context } = args;

  const result = await pipeline.research(
    {
      companyName,
      ...(url !== undefined && { url }),
      ...(context !== undefined && { context }),
    },
    {
      signal,
      sink: new LoggingProgressSink({ company: companyName }),
      overrides: runOverrides(args),
    }
  );

  return jsonResponse(formatResearchResult(result, { includePageText: args.includePageText }));
}

export async function handleDiscoverLinks(
  discovery: LinkDiscoverer,
  config: PipelineConfig,
  rawArgs: unknown,
  signal?: AbortSignal
): Promise<McpResponse> {
  const args = parseToolArgs('discover_links', discoverLinksArgsSchema, rawArgs);
  const baseUrl = toBaseUrl(args.url);
  if (!baseUrl) {
    throw new InvalidTargetError(args.url);
  }

  const report = await discovery.discover(baseUrl, {
    ...config,
    ...(args.maxLinks !== undefined && { maxLinks: args.maxLinks }),
    ...(args.maxCrawlDepth !== undefined && { maxCrawlDepth: args.maxCrawlDepth }),
    signal,
  });
  return jsonResponse(formatDiscoveryReport(baseUrl, report));
}

// ============================================
// DISPATCH
// ============================================

export interface ToolContext {
  pipeline: ResearchPipeline;
  discovery: LinkDiscoverer;
  config: PipelineConfig;
}

export const TOOL_NAMES = ['research_company', 'discover_links'] as const;

/**
 * Route one CallTool request; every failure becomes an error response
 */
export async function dispatchToolCall(
  context: ToolContext,
  name: string,
  args: unknown,
  signal?: AbortSignal
): Promise<McpResponse> {
  const startTime = Date.now();
  try {
    let response: McpResponse;
    switch (name) {
      case 'research_company':
        response = await handleResearchCompany(context.pipeline, args, signal);
        break;
      case 'discover_links':
        response = await handleDiscoverLinks(context.discovery, context.config, args, signal);
        break;
      default:
        throw new InvalidArgumentsError(`Unknown tool: ${name}. Available tools: ${TOOL_NAMES.join(', ')}`);
    }
    log.timed('Tool call complete', startTime, { tool: name });
    return response;
  } catch (error) {
    log.error('Tool call failed', { tool: name, error });
    return errorResponse(error);
  }
}
