/**
 * Configuration Schemas
 *
 * Zod schemas for runtime configuration. Environment strings, config file
 * values and per-call overrides all pass through these.
 */

import { z } from 'zod';
import { TIMEOUTS } from './timeouts.js';

// ============================================
// HELPER SCHEMAS
// ============================================

/**
 * Recognizes 'true', '1', 'yes' as true; everything else as false.
 */
export const booleanStringSchema = z
  .string()
  .optional()
  .transform((val) => {
    if (!val) return false;
    return ['true', '1', 'yes'].includes(val.toLowerCase());
  });

/**
 * Integer parsed from a string or number, with bounds and a default.
 */
export function integerStringSchema(options: { min?: number; max?: number; default: number }) {
  let schema = z.coerce.number().int();
  if (options.min !== undefined) schema = schema.min(options.min);
  if (options.max !== undefined) schema = schema.max(options.max);
  return schema.default(options.default);
}

// ============================================
// LOG LEVEL SCHEMA
// ============================================

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const logConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  prettyPrint: booleanStringSchema.default('false'),
});

export type LogConfig = z.infer<typeof logConfigSchema>;

// ============================================
// PROVIDER ROUTING
// ============================================

export const providerNameSchema = z.enum(['openai', 'anthropic']);

export const providerRouteSchema = z.object({
  primary: providerNameSchema,
  secondary: providerNameSchema.optional(),
});

export type ProviderRoute = z.infer<typeof providerRouteSchema>;

export const DEFAULT_ROUTES = {
  'page-selection': { primary: 'openai', secondary: 'anthropic' },
  synthesis: { primary: 'anthropic', secondary: 'openai' },
  classification: { primary: 'openai', secondary: 'anthropic' },
  embedding: { primary: 'openai' },
} as const satisfies Record<string, ProviderRoute>;

export const routesSchema = z.object({
  'page-selection': providerRouteSchema.default(DEFAULT_ROUTES['page-selection']),
  synthesis: providerRouteSchema.default(DEFAULT_ROUTES.synthesis),
  classification: providerRouteSchema.default(DEFAULT_ROUTES.classification),
  embedding: providerRouteSchema.default(DEFAULT_ROUTES.embedding),
});

export type RoutesConfig = z.infer<typeof routesSchema>;

// ============================================
// PIPELINE CONFIGURATION
// ============================================

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

export const renderModeSchema = z.enum(['never', 'auto', 'always']);
export type RenderMode = z.infer<typeof renderModeSchema>;

export const pipelineConfigSchema = z.object({
  maxLinks: integerStringSchema({ min: 1, max: 10000, default: 1000 }),
  maxCrawlDepth: integerStringSchema({ min: 0, max: 10, default: 3 }),
  maxCrawlPages: integerStringSchema({ min: 0, max: 500, default: 25 }),
  crawlLinksPerPage: integerStringSchema({ min: 1, max: 100, default: 5 }),
  maxSitemaps: integerStringSchema({ min: 1, max: 50, default: 3 }),
  maxPrioritizedPages: integerStringSchema({ min: 1, max: 200, default: 25 }),
  concurrency: integerStringSchema({ min: 1, max: 100, default: 10 }),
  perPageTimeoutMs: integerStringSchema({ min: 100, max: 300000, default: TIMEOUTS.PAGE_EXTRACTION }),
  /** 0 disables the run-wide ceiling */
  globalTimeoutMs: integerStringSchema({ min: 0, max: 3600000, default: 0 }),
  minSubstantialContentLength: integerStringSchema({ min: 1, max: 100000, default: 500 }),
  synthesisMaxChars: integerStringSchema({ min: 1000, max: 4000000, default: 400000 }),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  renderMode: renderModeSchema.default('never'),
  routes: routesSchema.default({}),
});

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;

// ============================================
// PROVIDER CREDENTIALS
// ============================================

export const providersConfigSchema = z.object({
  openai: z
    .object({
      apiKey: z.string().min(1).optional(),
      model: z.string().min(1).default('gpt-4o-mini'),
      embeddingModel: z.string().min(1).default('text-embedding-3-small'),
      baseUrl: z.string().url().optional(),
    })
    .default({}),
  anthropic: z
    .object({
      apiKey: z.string().min(1).optional(),
      model: z.string().min(1).default('claude-3-5-sonnet-latest'),
    })
    .default({}),
});

export type ProvidersConfig = z.infer<typeof providersConfigSchema>;

// ============================================
// RATE LIMITING
// ============================================

export const rateLimitConfigSchema = z.object({
  requestsPerMinute: integerStringSchema({ min: 1, max: 100000, default: 60 }),
  tokensPerMinute: integerStringSchema({ min: 1, max: 100000000, default: 200000 }),
  maxQueueWaitMs: integerStringSchema({ min: 0, max: 3600000, default: 60000 }),
});

export type RateLimitConfig = z.infer<typeof rateLimitConfigSchema>;

// ============================================
// ERROR FORMATTING
// ============================================

export function formatConfigErrors(error: z.ZodError<unknown>): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return `  - ${path}: ${issue.message}`;
    })
    .join('\n');
}

export class ConfigValidationError extends Error {
  constructor(
    public readonly section: string,
    public readonly zodError: z.ZodError
  ) {
    const formatted = formatConfigErrors(zodError);
    super(
      `Configuration validation failed for ${section}:\n${formatted}\n\n` +
      `Please check your environment variables or configuration file.`
    );
    this.name = 'ConfigValidationError';
  }
}
