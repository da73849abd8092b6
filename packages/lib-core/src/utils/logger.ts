/**
 * Structured Logger
 *
 * Provides JSON-structured logging with module tagging, so operational jobs
 * (token cleanup, database adapters) can be filtered in the log pipeline.
 *
 * Output format:
 * {"timestamp":"2024-01-01T00:00:00.000Z","level":"info","module":"TOKEN-CLEANUP","message":"..."}
 */

/**
 * Log levels in order of severity (lowest to highest).
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log output format.
 */
export type LogFormat = 'json' | 'pretty';

/**
 * Logger configuration for level filtering and output format.
 */
export interface LoggerConfig {
  /** Minimum log level to output (default: 'info') */
  level: LogLevel;
  /** Output format: 'json' for structured logs, 'pretty' for human-readable (default: 'json') */
  format: LogFormat;
  /** Per-module level overrides (optional) */
  moduleOverrides?: Record<string, { level?: LogLevel }>;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: 'info',
  format: 'json',
};

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const LOG_FORMATS: readonly LogFormat[] = ['json', 'pretty'];

/**
 * Global logger configuration (can be overridden at runtime).
 */
let globalLoggerConfig: LoggerConfig = { ...DEFAULT_LOGGER_CONFIG };

/**
 * Set global logger configuration.
 * @param config - Partial configuration to merge with defaults
 */
export function setLoggerConfig(config: Partial<LoggerConfig>): void {
  globalLoggerConfig = { ...DEFAULT_LOGGER_CONFIG, ...config };
}

export function getLoggerConfig(): LoggerConfig {
  return { ...globalLoggerConfig };
}

/**
 * Context included with every log entry.
 */
export interface LogContext {
  /** Module/component name for log categorization */
  module?: string;
  /** Action being performed */
  action?: string;
  /** Correlation identifier (HTTP request or cleanup run) */
  requestId?: string;
  /** Operation duration in milliseconds */
  durationMs?: number;
  /** Additional context fields */
  [key: string]: unknown;
}

/**
 * Logger interface for structured logging.
 */
export interface Logger {
  info(message: string, context?: LogContext): void;
  /** Log warning messages with optional error object */
  warn(message: string, context?: LogContext, error?: Error): void;
  /** Log error messages with optional error object */
  error(message: string, context?: LogContext, error?: Error): void;
  debug(message: string, context?: LogContext): void;
  /** Create a child logger with additional context merged in */
  child(additionalContext: LogContext): Logger;
  /** Create a child logger with module name set */
  module(moduleName: string): Logger;
  /** Start a timer and return a function to log the duration */
  startTimer(label: string): () => void;
}

interface LogEntry extends LogContext {
  timestamp: string;
  level: LogLevel;
  message: string;
  error?: {
    message: string;
    stack?: string;
  };
}

function shouldLog(level: LogLevel, config: LoggerConfig, moduleName?: string): boolean {
  const moduleOverride = moduleName ? config.moduleOverrides?.[moduleName] : undefined;
  const effectiveLevel = moduleOverride?.level ?? config.level;
  return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[effectiveLevel];
}

function formatLogEntry(entry: LogEntry, format: LogFormat): string {
  if (format === 'pretty') {
    const levelColor: Record<LogLevel, string> = {
      debug: '\x1b[90m', // gray
      info: '\x1b[36m', // cyan
      warn: '\x1b[33m', // yellow
      error: '\x1b[31m', // red
    };
    const reset = '\x1b[0m';
    const timestamp = entry.timestamp.substring(11, 23); // HH:mm:ss.SSS
    const moduleTag = entry.module ? `[${entry.module}] ` : '';
    const duration = entry.durationMs !== undefined ? ` (${entry.durationMs}ms)` : '';
    return `${levelColor[entry.level]}${timestamp} ${entry.level.toUpperCase().padEnd(5)}${reset} ${moduleTag}${entry.message}${duration}`;
  }
  return JSON.stringify(entry);
}

/**
 * Create a logger instance with base context.
 *
 * A `config` passed here is merged over the global configuration at call time,
 * so later `setLoggerConfig` calls still apply to fields it does not set.
 *
 * @example
 * const logger = createLogger({ module: 'TOKEN-CLEANUP' });
 * logger.info('Removing 10 expired grants', { count: 10 });
 * // Output: {"timestamp":"...","level":"info","message":"Removing 10 expired grants","module":"TOKEN-CLEANUP","count":10}
 */
export function createLogger(baseContext: LogContext = {}, config?: Partial<LoggerConfig>): Logger {
  const ctx: LogContext = { ...baseContext };

  const log = (level: LogLevel, message: string, extra?: LogContext, error?: Error): void => {
    const effectiveConfig = config ? { ...globalLoggerConfig, ...config } : globalLoggerConfig;
    if (!shouldLog(level, effectiveConfig, ctx.module)) {
      return;
    }

    const entry: LogEntry = {
      ...ctx,
      ...extra,
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(error && {
        error: {
          message: error.message,
          stack: error.stack,
        },
      }),
    };

    const output = formatLogEntry(entry, effectiveConfig.format);

    switch (level) {
      case 'error':
        console.error(output);
        break;
      case 'warn':
        console.warn(output);
        break;
      case 'debug':
        console.debug(output);
        break;
      default:
        console.log(output);
    }
  };

  return {
    info: (msg, extra) => log('info', msg, extra),
    warn: (msg, extra, err) => log('warn', msg, extra, err),
    error: (msg, extra, err) => log('error', msg, extra, err),
    debug: (msg, extra) => log('debug', msg, extra),

    child: (additionalContext) => createLogger({ ...ctx, ...additionalContext }, config),

    module: (moduleName) => createLogger({ ...ctx, module: moduleName }, config),

    startTimer: (label) => {
      const startTime = Date.now();
      return () => {
        log('info', `${label} completed`, { durationMs: Date.now() - startTime });
      };
    },
  };
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isLogFormat(value: string | undefined): value is LogFormat {
  return LOG_FORMATS.some((format) => format === value);
}

/**
 * Initialize logger configuration from environment variables.
 * Should be called once at process startup.
 *
 * Environment variables:
 * - LOG_LEVEL: "debug" | "info" | "warn" | "error" (default: "info")
 * - LOG_FORMAT: "json" | "pretty" (default: "json")
 */
export function initLoggerFromEnv(env: { LOG_LEVEL?: string; LOG_FORMAT?: string }): void {
  const level = isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : DEFAULT_LOGGER_CONFIG.level;
  const format = isLogFormat(env.LOG_FORMAT) ? env.LOG_FORMAT : DEFAULT_LOGGER_CONFIG.format;

  setLoggerConfig({ level, format });
}
