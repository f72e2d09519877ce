/**
 * Structured Logger using Pino
 *
 * Provides structured JSON logging with:
 * - Component-based child loggers
 * - Secret redaction for provider keys and HTTP headers
 * - Output to stderr (stdout is reserved for the MCP protocol)
 */

import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Log context metadata
 */
export interface LogContext {
  component?: string;
  company?: string;
  url?: string;
  stage?: string;
  provider?: string;
  purpose?: string;
  durationMs?: number;
  [key: string]: unknown;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  prettyPrint: boolean;
  destination: 'stderr' | 'stdout';
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function envLogLevel(): LogLevel {
  const value = process.env.LOG_LEVEL?.toLowerCase();
  return LOG_LEVELS.find((level) => level === value) ?? 'info';
}

// Logs go to stderr by default; MCP uses stdout for protocol frames
const DEFAULT_CONFIG: LoggerConfig = {
  level: envLogLevel(),
  prettyPrint: process.env.LOG_PRETTY === 'true',
  destination: 'stderr',
};

/**
 * Paths redacted from every log line.
 *
 * See: https://getpino.io/#/docs/redaction
 */
const REDACT_PATHS = [
  '*.authorization',
  '*.Authorization',
  '*.cookie',
  '*.Cookie',
  'headers.authorization',
  'headers.Authorization',
  'headers.cookie',
  'headers["x-api-key"]',
  '*.apiKey',
  '*.api_key',
  '*.token',
  '*.accessToken',
  '*.secret',
  '*.password',
  'providers.openai.apiKey',
  'providers.anthropic.apiKey',
];

/**
 * Build the pino instance for a configuration
 */
function createBaseLogger(config: LoggerConfig = DEFAULT_CONFIG): PinoLogger {
  const options: LoggerOptions = {
    level: config.level,
    base: {
      pid: process.pid,
      service: 'sitescope',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
  };

  const destination = config.destination === 'stderr' ? process.stderr : process.stdout;

  if (config.prettyPrint) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
          destination: config.destination === 'stderr' ? 2 : 1,
        },
      },
    });
  }

  return pino(options, destination);
}

let baseLogger = createBaseLogger();

/**
 * Reconfigure the logger (startup config, tests)
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  baseLogger = createBaseLogger({ ...DEFAULT_CONFIG, ...config });
}

/**
 * The current base pino logger, for libraries that take one directly
 */
export function getLogger(): PinoLogger {
  return baseLogger;
}

/**
 * Component-specific logger wrapper.
 *
 * Resolves the base logger lazily so configureLogger() takes effect for
 * loggers created at module load time.
 */
export class Logger {
  private cached: PinoLogger | null = null;
  private readonly component: string;

  constructor(component: string, parentLogger?: PinoLogger) {
    this.component = component;
    if (parentLogger) {
      this.cached = parentLogger.child({ component });
    }
  }

  /**
   * Child of the current base logger, unless one was bound at creation
   */
  private get logger(): PinoLogger {
    return this.cached ?? baseLogger.child({ component: this.component });
  }

  /**
   * Logger for the same component with extra bound context (a run, a URL)
   */
  child(context: LogContext): Logger {
    const childLogger = new Logger(this.component);
    childLogger.cached = this.logger.child(context);
    return childLogger;
  }

  /**
   * Per-page and per-call detail
   */
  debug(message: string, context?: LogContext): void {
    this.logger.debug(context ?? {}, message);
  }

  /**
   * Stage transitions and run summaries
   */
  info(message: string, context?: LogContext): void {
    this.logger.info(context ?? {}, message);
  }

  /**
   * Degradations the run recovers from
   */
  warn(message: string, context?: LogContext): void {
    this.logger.warn(context ?? {}, message);
  }

  /**
   * Failures. `error` takes unknown since catch blocks provide unknown;
   * an Error is logged with its name, message and stack under `err`.
   */
  error(message: string, context?: LogContext & { error?: unknown }): void {
    if (context?.error) {
      const err = context.error instanceof Error
        ? {
            message: context.error.message,
            name: context.error.name,
            stack: context.error.stack,
          }
        : { message: String(context.error) };

      this.logger.error({ ...context, err }, message);
    } else {
      this.logger.error(context ?? {}, message);
    }
  }

  /**
   * Info line with `durationMs` measured from `startTime`
   */
  timed(message: string, startTime: number, context?: LogContext): void {
    this.info(message, { ...context, durationMs: Date.now() - startTime });
  }
}

/**
 * Pre-configured loggers for each component
 */
export const logger = {
  // Pipeline stages
  pipeline: new Logger('ResearchPipeline'),
  discovery: new Logger('LinkDiscovery'),
  prioritizer: new Logger('PagePrioritizer'),
  coordinator: new Logger('ExtractionCoordinator'),
  synthesizer: new Logger('IntelligenceSynthesizer'),

  // Providers
  router: new Logger('ProviderRouter'),

  // Utils
  rateLimiter: new Logger('RateLimiter'),
  retry: new Logger('Retry'),
  config: new Logger('ConfigLoader'),

  // Server
  server: new Logger('MCPServer'),

  create: (component: string) => new Logger(component),
};

/**
 * Startup line for the MCP server
 */
export function logServerStart(version: string, tools: string[]): void {
  logger.server.info('Server starting', {
    version,
    tools,
    nodeVersion: process.version,
  });
}

/**
 * Shutdown line for the MCP server
 */
export function logServerShutdown(reason?: string): void {
  logger.server.info('Server shutting down', { reason });
}

export default logger;
