/**
 * Research Data Model
 *
 * Every value here is created and consumed within one pipeline run.
 */

// ============================================
// INPUT
// ============================================

export interface ResearchTarget {
  /** Company name used in prompts and for domain resolution */
  companyName: string;
  /** Primary website; resolved by a DomainResolver when absent */
  url?: string;
  /** Free-form hints passed to the prioritizer and synthesizer */
  context?: string;
}

// ============================================
// DISCOVERY
// ============================================

export type DiscoverySource = 'robots' | 'sitemap' | 'crawl';

/** Merge precedence, highest first */
export const DISCOVERY_SOURCES: readonly DiscoverySource[] = ['robots', 'sitemap', 'crawl'];

export interface DiscoveredLink {
  /** Normalized absolute URL (see normalizeUrl) */
  url: string;
  source: DiscoverySource;
  /** 0 for the base page and for robots/sitemap entries */
  depth: number;
}

export interface DiscoverySourceReport {
  count: number;
  error?: string;
}

export interface DiscoveryReport {
  links: DiscoveredLink[];
  sources: Record<DiscoverySource, DiscoverySourceReport>;
  durationMs: number;
}

// ============================================
// PRIORITIZATION
// ============================================

export interface PrioritizedPage extends DiscoveredLink {
  /** 1-based rank, 1 = highest priority */
  rank: number;
  rationale: string;
}

export interface PrioritizationResult {
  pages: PrioritizedPage[];
  /** True when the heuristic fallback chose the pages */
  degraded: boolean;
  degradedReason?: string;
}

// ============================================
// EXTRACTION
// ============================================

export type ExtractionStrategyName = 'readability' | 'selectors';

export type PageStatus = 'success' | 'empty' | 'fetch_error' | 'extract_error' | 'timeout';

export const PAGE_STATUSES: readonly PageStatus[] = [
  'success',
  'empty',
  'fetch_error',
  'extract_error',
  'timeout',
];

export type PageOutcome =
  | { status: 'success'; strategy: ExtractionStrategyName }
  | { status: 'empty'; strategy: null }
  | { status: 'fetch_error'; error: string; httpStatus?: number }
  | { status: 'extract_error'; error: string }
  | { status: 'timeout'; error: string };

export type PageExtractionResult = Readonly<
  PageOutcome & {
    url: string;
    rank: number;
    /** Cleaned text; empty for failures, the best short text for `empty` */
    text: string;
    charLength: number;
    /** Raw body size in bytes, 0 when nothing was fetched */
    byteLength: number;
    elapsedMs: number;
  }
>;

export interface ExtractionBatch {
  /** Ordered by rank */
  results: PageExtractionResult[];
  attempted: number;
  succeeded: number;
  totalChars: number;
  statusCounts: Record<PageStatus, number>;
}

// ============================================
// SYNTHESIS
// ============================================

export interface LeadershipEntry {
  name: string;
  title: string | null;
}

export interface IntelligenceFields {
  companyName: string | null;
  overview: string | null;
  industry: string | null;
  businessModel: string | null;
  targetMarket: string | null;
  valueProposition: string | null;
  companySize: string | null;
  foundingYear: string | null;
  headquarters: string | null;
  services: string[];
  leadership: LeadershipEntry[];
}

export type SoftErrorCode = 'SYNTHESIS_FAILED' | 'NO_CONTENT';

export interface IntelligenceArtifact {
  narrative: string;
  fields: IntelligenceFields;
  /** Pages whose content reached the synthesis prompt, in rank order */
  sourceUrls: string[];
  /** Provider that produced the narrative, null when none was called */
  provider: string | null;
  softError?: { code: SoftErrorCode; message: string };
}

// ============================================
// PROVIDERS
// ============================================

export type CallPurpose = 'page-selection' | 'synthesis' | 'classification' | 'embedding';

export const CALL_PURPOSES: readonly CallPurpose[] = [
  'page-selection',
  'synthesis',
  'classification',
  'embedding',
];

export type ProviderName = 'openai' | 'anthropic';

export const PROVIDER_NAMES: readonly ProviderName[] = ['openai', 'anthropic'];

export type ProviderErrorKind =
  | 'quota'
  | 'rate_limit'
  | 'server'
  | 'timeout'
  | 'auth'
  | 'invalid_request'
  | 'network'
  | 'unknown';

export interface ProviderCallRecord {
  provider: string;
  model: string;
  purpose: CallPurpose;
  attempt: 'primary' | 'secondary';
  inputTokens: number;
  outputTokens: number;
  estimatedCostUsd: number;
  latencyMs: number;
  success: boolean;
  errorKind?: ProviderErrorKind;
}

// ============================================
// RESULT
// ============================================

export type ResearchWarningCode =
  | 'DISCOVERY_SOURCE_FAILED'
  | 'PRIORITIZATION_DEGRADED'
  | 'SYNTHESIS_FAILED'
  | 'NO_CONTENT';

export interface ResearchWarning {
  code: ResearchWarningCode;
  message: string;
}

export interface ResearchResult {
  target: ResearchTarget;
  resolvedUrl: string;
  links: DiscoveredLink[];
  prioritized: PrioritizedPage[];
  prioritizationDegraded: boolean;
  batch: ExtractionBatch;
  artifact: IntelligenceArtifact;
  providerCalls: ProviderCallRecord[];
  warnings: ResearchWarning[];
  durationMs: number;
}

/**
 * Whatever a cancelled run had reached
 */
export interface PartialResearch {
  resolvedUrl?: string;
  links?: DiscoveredLink[];
  prioritized?: PrioritizedPage[];
  batch?: ExtractionBatch;
  providerCalls: ProviderCallRecord[];
}
