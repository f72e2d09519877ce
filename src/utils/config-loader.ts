/**
 * Configuration File Loader
 *
 * Loads configuration from .sitescoperc or .sitescoperc.json files.
 * Precedence: per-call overrides > environment variables > config file > defaults
 *
 * Search paths (in order):
 * 1. Current working directory
 * 2. Home directory
 * 3. Package root
 *
 * @example
 * // .sitescoperc
 * {
 *   // comments are allowed
 *   "log": { "level": "debug" },
 *   "pipeline": {
 *     "concurrency": 5,
 *     "routes": { "synthesis": { "primary": "openai" } }
 *   },
 *   "providers": { "openai": { "model": "gpt-4o" } }
 * }
 */

import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import {
  logConfigSchema,
  pipelineConfigSchema,
  providersConfigSchema,
  rateLimitConfigSchema,
  providerNameSchema,
  renderModeSchema,
  DEFAULT_ROUTES,
  ConfigValidationError,
  type LogConfig,
  type PipelineConfig,
  type ProvidersConfig,
  type RateLimitConfig,
  type ProviderRoute,
} from './config-schemas.js';
import { CALL_PURPOSES, type CallPurpose } from '../types/research.js';
import { logger } from './logger.js';

const log = logger.config;

// ============================================
// CONFIG FILE SCHEMA
// ============================================

const fileRouteSchema = z.object({
  primary: providerNameSchema.optional(),
  secondary: z.union([providerNameSchema, z.literal('none')]).optional(),
});

/**
 * Schema for configuration file contents. Every field is optional.
 */
export const configFileSchema = z.object({
  log: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
    prettyPrint: z.boolean().optional(),
  }).optional(),

  pipeline: z.object({
    maxLinks: z.number().int().optional(),
    maxCrawlDepth: z.number().int().optional(),
    maxCrawlPages: z.number().int().optional(),
    crawlLinksPerPage: z.number().int().optional(),
    maxSitemaps: z.number().int().optional(),
    maxPrioritizedPages: z.number().int().optional(),
    concurrency: z.number().int().optional(),
    perPageTimeoutMs: z.number().int().optional(),
    globalTimeoutMs: z.number().int().optional(),
    minSubstantialContentLength: z.number().int().optional(),
    synthesisMaxChars: z.number().int().optional(),
    userAgent: z.string().optional(),
    renderMode: renderModeSchema.optional(),
    routes: z.object({
      'page-selection': fileRouteSchema.optional(),
      synthesis: fileRouteSchema.optional(),
      classification: fileRouteSchema.optional(),
      embedding: fileRouteSchema.optional(),
    }).optional(),
  }).optional(),

  providers: z.object({
    openai: z.object({
      apiKey: z.string().optional(),
      model: z.string().optional(),
      embeddingModel: z.string().optional(),
      baseUrl: z.string().optional(),
    }).optional(),
    anthropic: z.object({
      apiKey: z.string().optional(),
      model: z.string().optional(),
    }).optional(),
  }).optional(),

  rateLimit: z.object({
    requestsPerMinute: z.number().int().optional(),
    tokensPerMinute: z.number().int().optional(),
    maxQueueWaitMs: z.number().int().optional(),
  }).optional(),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

// ============================================
// FILE SEARCH
// ============================================

const CONFIG_FILE_NAMES = ['.sitescoperc', '.sitescoperc.json', 'sitescoperc.json'];

function getPackageRoot(): string {
  // src/utils -> package root
  return join(dirname(fileURLToPath(import.meta.url)), '..', '..');
}

function getSearchPaths(): string[] {
  const paths: string[] = [process.cwd()];

  const home = homedir();
  if (home && !paths.includes(home)) {
    paths.push(home);
  }

  const packageRoot = getPackageRoot();
  if (!paths.includes(packageRoot)) {
    paths.push(packageRoot);
  }

  return paths;
}

function findConfigFile(): string | null {
  const searchPaths = getSearchPaths();

  for (const dir of searchPaths) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        log.debug('Found config file', { path: filePath });
        return filePath;
      }
    }
  }

  log.debug('No config file found', { searchPaths, fileNames: CONFIG_FILE_NAMES });
  return null;
}

// ============================================
// FILE LOADING
// ============================================

/**
 * Remove // and /* *\/ comments outside of string literals.
 */
export function stripJsonComments(content: string): string {
  return content.replace(/("(?:\\.|[^"\\])*")|\/\*[\s\S]*?\*\/|\/\/[^\n]*/g, (_match, str: string | undefined) => str ?? '');
}

/**
 * Parse config file text. Invalid content is logged and ignored.
 */
export function parseConfigFileContent(content: string, source = 'config file'): ConfigFile {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripJsonComments(content));
  } catch (error) {
    log.warn('Config file has invalid JSON', {
      path: source,
      error: error instanceof Error ? error.message : String(error),
    });
    return {};
  }

  const result = configFileSchema.safeParse(parsed);
  if (!result.success) {
    log.warn('Config file validation failed', {
      path: source,
      errors: result.error.issues.map((i) => ({
        path: i.path.join('.'),
        message: i.message,
      })),
    });
    return {};
  }

  log.info('Loaded config file', {
    path: source,
    sections: Object.entries(result.data).filter(([, value]) => value !== undefined).map(([key]) => key),
  });
  return result.data;
}

function loadConfigFile(filePath: string): ConfigFile {
  try {
    return parseConfigFileContent(readFileSync(filePath, 'utf-8'), filePath);
  } catch (error) {
    log.warn('Failed to read config file', { path: filePath, error: String(error) });
    return {};
  }
}

// ============================================
// CACHED CONFIG
// ============================================

let cachedConfigFile: ConfigFile | null = null;
let cachedConfigFilePath: string | null = null;

export function getConfigFile(): ConfigFile {
  if (cachedConfigFile === null) {
    cachedConfigFilePath = findConfigFile();
    cachedConfigFile = cachedConfigFilePath ? loadConfigFile(cachedConfigFilePath) : {};
  }
  return cachedConfigFile;
}

/**
 * Use explicit file contents instead of searching the filesystem.
 */
export function setConfigFile(config: ConfigFile, path: string | null = null): void {
  cachedConfigFile = config;
  cachedConfigFilePath = path;
}

export function clearConfigFileCache(): void {
  cachedConfigFile = null;
  cachedConfigFilePath = null;
}

export function getConfigFilePath(): string | null {
  getConfigFile();
  return cachedConfigFilePath;
}

// ============================================
// MERGE HELPERS
// ============================================

function boolToEnvString(value: boolean | undefined): string | undefined {
  if (value === undefined) return undefined;
  return value ? 'true' : 'false';
}

function env(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

function parseSection<T>(section: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ConfigValidationError(section, result.error);
  }
  return result.data;
}

type NumericPipelineKey =
  | 'maxLinks'
  | 'maxCrawlDepth'
  | 'maxCrawlPages'
  | 'crawlLinksPerPage'
  | 'maxSitemaps'
  | 'maxPrioritizedPages'
  | 'concurrency'
  | 'perPageTimeoutMs'
  | 'globalTimeoutMs'
  | 'minSubstantialContentLength'
  | 'synthesisMaxChars';

/** Numeric pipeline options and their environment variables */
const PIPELINE_ENV_VARS: ReadonlyArray<[NumericPipelineKey, string]> = [
  ['maxLinks', 'SITESCOPE_MAX_LINKS'],
  ['maxCrawlDepth', 'SITESCOPE_MAX_CRAWL_DEPTH'],
  ['maxCrawlPages', 'SITESCOPE_MAX_CRAWL_PAGES'],
  ['crawlLinksPerPage', 'SITESCOPE_CRAWL_LINKS_PER_PAGE'],
  ['maxSitemaps', 'SITESCOPE_MAX_SITEMAPS'],
  ['maxPrioritizedPages', 'SITESCOPE_MAX_PRIORITIZED_PAGES'],
  ['concurrency', 'SITESCOPE_CONCURRENCY'],
  ['perPageTimeoutMs', 'SITESCOPE_PAGE_TIMEOUT_MS'],
  ['globalTimeoutMs', 'SITESCOPE_GLOBAL_TIMEOUT_MS'],
  ['minSubstantialContentLength', 'SITESCOPE_MIN_CONTENT_LENGTH'],
  ['synthesisMaxChars', 'SITESCOPE_SYNTHESIS_MAX_CHARS'],
];

function routeEnvPrefix(purpose: CallPurpose): string {
  return `SITESCOPE_${purpose.replace('-', '_').toUpperCase()}`;
}

function mergeRoute(purpose: CallPurpose, file: ConfigFile): { primary: string; secondary?: string } {
  const fileRoute = file.pipeline?.routes?.[purpose];
  const defaults: ProviderRoute = DEFAULT_ROUTES[purpose];
  const prefix = routeEnvPrefix(purpose);
  const secondary = env(`${prefix}_SECONDARY`) ?? fileRoute?.secondary ?? defaults.secondary;
  return {
    primary: env(`${prefix}_PRIMARY`) ?? fileRoute?.primary ?? defaults.primary,
    secondary: secondary === 'none' ? undefined : secondary,
  };
}

// ============================================
// MERGED CONFIG FUNCTIONS
// ============================================

export function getMergedLogConfig(): LogConfig {
  const file = getConfigFile().log ?? {};

  return parseSection('log', logConfigSchema, {
    level: env('LOG_LEVEL') ?? file.level,
    prettyPrint: env('LOG_PRETTY') ?? boolToEnvString(file.prettyPrint),
  });
}

export type PipelineConfigOverrides = Partial<Omit<PipelineConfig, 'routes'>> & {
  routes?: Partial<Record<CallPurpose, ProviderRoute>>;
};

/**
 * Pipeline options from file and environment, with per-call overrides on top.
 */
export function getMergedPipelineConfig(overrides: PipelineConfigOverrides = {}): PipelineConfig {
  const file = getConfigFile();
  const filePipeline = file.pipeline ?? {};
  const raw: Record<string, unknown> = {
    userAgent: env('SITESCOPE_USER_AGENT') ?? filePipeline.userAgent,
    renderMode: env('SITESCOPE_RENDER_MODE') ?? filePipeline.renderMode,
  };

  for (const [key, envName] of PIPELINE_ENV_VARS) {
    raw[key] = env(envName) ?? filePipeline[key];
  }

  const routes: Record<string, unknown> = {};
  for (const purpose of CALL_PURPOSES) {
    routes[purpose] = overrides.routes?.[purpose] ?? mergeRoute(purpose, file);
  }
  raw.routes = routes;

  for (const [key, value] of Object.entries(overrides)) {
    if (key !== 'routes' && value !== undefined) {
      raw[key] = value;
    }
  }

  return parseSection('pipeline', pipelineConfigSchema, raw);
}

/**
 * Per-run overrides on top of an already merged configuration. Keys left
 * undefined keep the base value, and the result is validated again so a
 * run never sees an out-of-range option.
 *
 * @throws ConfigValidationError when an override is out of range
 */
export function applyPipelineOverrides(base: PipelineConfig, overrides: PipelineConfigOverrides = {}): PipelineConfig {
  const raw: Record<string, unknown> = { ...base };
  const routes: Record<string, unknown> = { ...base.routes };
  for (const [purpose, route] of Object.entries(overrides.routes ?? {})) {
    if (route !== undefined) routes[purpose] = route;
  }
  raw.routes = routes;

  for (const [key, value] of Object.entries(overrides)) {
    if (key !== 'routes' && value !== undefined) {
      raw[key] = value;
    }
  }

  return parseSection('pipeline', pipelineConfigSchema, raw);
}

export function getMergedProvidersConfig(): ProvidersConfig {
  const file = getConfigFile().providers ?? {};

  return parseSection('providers', providersConfigSchema, {
    openai: {
      apiKey: env('OPENAI_API_KEY') ?? file.openai?.apiKey,
      model: env('OPENAI_MODEL') ?? file.openai?.model,
      embeddingModel: env('OPENAI_EMBEDDING_MODEL') ?? file.openai?.embeddingModel,
      baseUrl: env('OPENAI_BASE_URL') ?? file.openai?.baseUrl,
    },
    anthropic: {
      apiKey: env('ANTHROPIC_API_KEY') ?? file.anthropic?.apiKey,
      model: env('ANTHROPIC_MODEL') ?? file.anthropic?.model,
    },
  });
}

export function getMergedRateLimitConfig(): RateLimitConfig {
  const file = getConfigFile().rateLimit ?? {};

  return parseSection('rateLimit', rateLimitConfigSchema, {
    requestsPerMinute: env('SITESCOPE_RPM') ?? file.requestsPerMinute,
    tokensPerMinute: env('SITESCOPE_TPM') ?? file.tokensPerMinute,
    maxQueueWaitMs: env('SITESCOPE_RATE_WAIT_MS') ?? file.maxQueueWaitMs,
  });
}

/**
 * Sample .sitescoperc content
 */
export function generateSampleConfig(): string {
  return JSON.stringify(
    {
      log: { level: 'info', prettyPrint: false },
      pipeline: {
        maxLinks: 1000,
        maxCrawlDepth: 3,
        maxPrioritizedPages: 25,
        concurrency: 10,
        perPageTimeoutMs: 15000,
        routes: DEFAULT_ROUTES,
      },
      providers: {
        openai: { model: 'gpt-4o-mini' },
        anthropic: { model: 'claude-3-5-sonnet-latest' },
      },
      rateLimit: { requestsPerMinute: 60, tokensPerMinute: 200000, maxQueueWaitMs: 60000 },
    },
    null,
    2
  );
}
