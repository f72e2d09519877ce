/**
 * MCP Response Formatters
 */

import { toErrorPayload } from '../types/errors.js';
import type { DiscoveryReport, ResearchResult } from '../types/research.js';

/**
 * MCP response content type
 * This matches the expected return type for MCP tool handlers
 */
export type McpResponse = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export const RESPONSE_SCHEMA_VERSION = '1.0';

/**
 * Versioned JSON response for MCP tools
 */
export function jsonResponse(data: object, indent: number = 2): McpResponse {
  return {
    content: [{ type: 'text', text: JSON.stringify({ schemaVersion: RESPONSE_SCHEMA_VERSION, ...data }, null, indent) }],
  };
}

/**
 * Structured `{ error, code, fatal, partial? }` payload
 */
export function errorResponse(error: unknown): McpResponse {
  return {
    content: [{ type: 'text', text: JSON.stringify(toErrorPayload(error), null, 2) }],
    isError: true,
  };
}

export interface ResearchFormatOptions {
  includePageText?: boolean;
}

export function formatResearchResult(result: ResearchResult, options: ResearchFormatOptions = {}): object {
  const { batch } = result;
  return {
    companyName: result.target.companyName,
    resolvedUrl: result.resolvedUrl,
    artifact: result.artifact,
    warnings: result.warnings,
    discovery: { links: result.links.length },
    prioritization: {
      degraded: result.prioritizationDegraded,
      pages: result.prioritized.map((page) => ({ url: page.url, rank: page.rank, rationale: page.rationale })),
    },
    extraction: {
      attempted: batch.attempted,
      succeeded: batch.succeeded,
      totalChars: batch.totalChars,
      statusCounts: batch.statusCounts,
      pages: batch.results.map((page) => ({
        url: page.url,
        rank: page.rank,
        status: page.status,
        chars: page.charLength,
        elapsedMs: page.elapsedMs,
        ...('strategy' in page && page.strategy !== null && { strategy: page.strategy }),
        ...('error' in page && { error: page.error }),
        ...(options.includePageText === true && { text: page.text }),
      })),
    },
    providerCalls: result.providerCalls,
    durationMs: result.durationMs,
  };
}

export function formatDiscoveryReport(baseUrl: string, report: DiscoveryReport): object {
  return {
    url: baseUrl,
    total: report.links.length,
    sources: report.sources,
    links: report.links,
    durationMs: report.durationMs,
  };
}
