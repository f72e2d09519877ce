/**
 * Error Taxonomy
 *
 * Fatal errors are thrown out of ResearchPipeline.research(). Page-level
 * and source-level failures never leave their stage: they are recorded in
 * the ExtractionBatch or as ResearchWarnings.
 */

import type { PartialResearch, ProviderErrorKind } from './research.js';

export type ResearchErrorCode =
  | 'DISCOVERY_EXHAUSTED'
  | 'DOMAIN_RESOLUTION_FAILED'
  | 'PROVIDER_FAILED'
  | 'PROVIDERS_EXHAUSTED'
  | 'PIPELINE_CANCELLED'
  | 'RATE_LIMIT_WAIT_EXCEEDED'
  | 'PAGE_FETCH_FAILED'
  | 'PAGE_TIMEOUT'
  | 'CONFIG_INVALID'
  | 'INVALID_TARGET'
  | 'INVALID_ARGUMENTS'
  | 'INTERNAL_ERROR';

export class ResearchError extends Error {
  constructor(
    message: string,
    public readonly code: ResearchErrorCode,
    public readonly fatal: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ResearchError';
  }
}

// ============================================
// FATAL
// ============================================

/**
 * robots, sitemap and crawl all yielded nothing
 */
export class DiscoveryExhaustedError extends ResearchError {
  constructor(
    public readonly baseUrl: string,
    public readonly sourceErrors: string[]
  ) {
    super(`No content discoverable for ${baseUrl}`, 'DISCOVERY_EXHAUSTED', true);
    this.name = 'DiscoveryExhaustedError';
  }
}

export class DomainResolutionError extends ResearchError {
  constructor(public readonly companyName: string, public readonly probed: string[]) {
    super(`Could not resolve a website for "${companyName}"`, 'DOMAIN_RESOLUTION_FAILED', true);
    this.name = 'DomainResolutionError';
  }
}

/**
 * Primary and secondary provider both failed for a required call
 */
export class ProvidersExhaustedError extends ResearchError {
  constructor(
    public readonly purpose: string,
    public readonly failures: ProviderError[]
  ) {
    super(
      `All providers failed for ${purpose}: ${failures.map((f) => `${f.provider}: ${f.message}`).join('; ')}`,
      'PROVIDERS_EXHAUSTED',
      true
    );
    this.name = 'ProvidersExhaustedError';
  }
}

/**
 * Target URL that is not an http(s) address
 */
export class InvalidTargetError extends ResearchError {
  constructor(public readonly url: string) {
    super(`Not an http(s) URL: ${url}`, 'INVALID_TARGET', true);
    this.name = 'InvalidTargetError';
  }
}

/**
 * Tool or SDK call arguments that failed validation
 */
export class InvalidArgumentsError extends ResearchError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'INVALID_ARGUMENTS', false);
    this.name = 'InvalidArgumentsError';
  }
}

export type CancellationReason = 'aborted' | 'timeout';

/**
 * External cancellation or the global timeout; carries what had completed
 */
export class PipelineCancelledError extends ResearchError {
  constructor(
    public readonly reason: CancellationReason,
    public readonly partial: PartialResearch,
    cause?: unknown
  ) {
    super(
      reason === 'timeout' ? 'Research run exceeded its global timeout' : 'Research run was cancelled',
      'PIPELINE_CANCELLED',
      true,
      { cause }
    );
    this.name = 'PipelineCancelledError';
  }
}

// ============================================
// LOCAL (recovered inside a stage)
// ============================================

/**
 * Normalized failure from a provider adapter
 */
export class ProviderError extends ResearchError {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly kind: ProviderErrorKind,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, 'PROVIDER_FAILED', false, options);
    this.name = 'ProviderError';
  }

  /** Failure classes that move the call to the secondary provider */
  get triggersFallback(): boolean {
    return this.kind === 'quota' || this.kind === 'server';
  }
}

export class RateLimitWaitExceededError extends ResearchError {
  constructor(public readonly waitedMs: number) {
    super(`Rate limiter queue wait exceeded ${waitedMs}ms`, 'RATE_LIMIT_WAIT_EXCEEDED', false);
    this.name = 'RateLimitWaitExceededError';
  }
}

export class PageFetchError extends ResearchError {
  constructor(message: string, public readonly url: string, public readonly httpStatus?: number, options?: { cause?: unknown }) {
    super(message, 'PAGE_FETCH_FAILED', false, options);
    this.name = 'PageFetchError';
  }
}

export class PageTimeoutError extends ResearchError {
  constructor(public readonly url: string, public readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`, 'PAGE_TIMEOUT', false);
    this.name = 'PageTimeoutError';
  }
}

// ============================================
// CLASSIFICATION
// ============================================

/**
 * Map an HTTP status from a provider API to an error kind
 */
export function classifyProviderStatus(status: number | undefined, message = ''): ProviderErrorKind {
  const lower = message.toLowerCase();
  if (status === 429) {
    return lower.includes('quota') || lower.includes('insufficient') || lower.includes('billing')
      ? 'quota'
      : 'rate_limit';
  }
  if (status === 401 || status === 403) return 'auth';
  if (status === 408) return 'timeout';
  if (status !== undefined && status >= 500) return 'server';
  if (status !== undefined && status >= 400) return 'invalid_request';
  if (lower.includes('timeout') || lower.includes('timed out')) return 'timeout';
  if (lower.includes('econnrefused') || lower.includes('enotfound') || lower.includes('fetch failed') || lower.includes('network')) {
    return 'network';
  }
  return 'unknown';
}

/**
 * Readable message for a fetch failure, including the low-level cause
 * code (ENOTFOUND, ECONNRESET, certificate errors) when Node reports one.
 */
export function describeFetchFailure(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const cause: unknown = error.cause;
  if (typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string') {
    return `${error.message} (${cause.code})`;
  }
  return error.message;
}

export interface ErrorPayload {
  error: string;
  code: ResearchErrorCode;
  fatal: boolean;
  partial?: PartialResearch;
}

/**
 * Structured form of any error for tool responses
 */
export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof PipelineCancelledError) {
    return { error: error.message, code: error.code, fatal: true, partial: error.partial };
  }
  if (error instanceof ResearchError) {
    return { error: error.message, code: error.code, fatal: error.fatal };
  }
  if (error instanceof Error && error.name === 'ConfigValidationError') {
    return { error: error.message, code: 'CONFIG_INVALID', fatal: true };
  }
  return {
    error: error instanceof Error ? error.message : String(error),
    code: 'INTERNAL_ERROR',
    fatal: true,
  };
}
