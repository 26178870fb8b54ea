/**
 * @fileoverview Centralized logging infrastructure for Taskforge
 *
 * Uses pino for structured logging with:
 * - Configurable log levels
 * - JSON output for production
 * - Pretty printing for development
 * - Context-aware child loggers
 *
 * All output goes to stderr so log lines never interleave with the menu.
 */

import pino from 'pino';

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
  'silent',
];

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  pretty?: boolean;
}

export interface LogContext {
  component?: string;
  taskId?: string;
  [key: string]: unknown;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

// =============================================================================
// Logger Factory
// =============================================================================

function resolvePretty(): boolean {
  const flag = process.env.LOG_PRETTY;
  if (flag !== undefined) {
    return flag === 'true' || flag === '1';
  }
  return process.env.NODE_ENV !== 'production';
}

/**
 * Create a configured pino logger instance
 */
function createPinoLogger(options: LoggerOptions = {}): pino.Logger {
  // Default to 'warn' so the interactive menu stays quiet
  const envLevel = process.env.LOG_LEVEL;
  const level = options.level ?? (isLogLevel(envLevel) ? envLevel : 'warn');
  const pretty = options.pretty ?? resolvePretty();

  const pinoOptions: pino.LoggerOptions = {
    level,
    name: options.name ?? 'taskforge',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
      bindings: (bindings) => ({
        pid: bindings.pid,
        name: bindings.name,
      }),
    },
  };

  if (pretty) {
    return pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino(pinoOptions, pino.destination(2));
}

// =============================================================================
// Logger Wrapper Class
// =============================================================================

export class TaskforgeLogger {
  private pino: pino.Logger;
  private context: LogContext;

  constructor(options: LoggerOptions = {}, context: LogContext = {}) {
    this.pino = createPinoLogger(options);
    this.context = context;
  }

  /**
   * Child loggers share the parent's pino instance (and its transport)
   */
  private static fromPino(pinoLogger: pino.Logger, context: LogContext): TaskforgeLogger {
    const logger: TaskforgeLogger = Object.create(TaskforgeLogger.prototype);
    logger.pino = pinoLogger;
    logger.context = context;
    return logger;
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): TaskforgeLogger {
    return TaskforgeLogger.fromPino(this.pino.child(context), { ...this.context, ...context });
  }

  getContext(): LogContext {
    return { ...this.context };
  }

  get level(): string {
    return this.pino.level;
  }

  trace(msg: string, data?: Record<string, unknown>): void {
    this.pino.trace(data ?? {}, msg);
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.pino.debug(data ?? {}, msg);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.pino.info(data ?? {}, msg);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.pino.warn(data ?? {}, msg);
  }

  /**
   * Log at error level
   */
  error(msg: string, error?: Error | Record<string, unknown>): void {
    if (error instanceof Error) {
      this.pino.error({ err: error }, msg);
    } else {
      this.pino.error(error ?? {}, msg);
    }
  }

  /**
   * Log at fatal level
   */
  fatal(msg: string, error?: Error | Record<string, unknown>): void {
    if (error instanceof Error) {
      this.pino.fatal({ err: error }, msg);
    } else {
      this.pino.fatal(error ?? {}, msg);
    }
  }
}

// =============================================================================
// Singleton Logger
// =============================================================================

let defaultLogger: TaskforgeLogger | null = null;

/**
 * Get the default logger instance. Options only apply on first creation.
 */
export function getLogger(options?: LoggerOptions): TaskforgeLogger {
  if (!defaultLogger) {
    defaultLogger = new TaskforgeLogger(options);
  }
  return defaultLogger;
}

/**
 * Create a component-specific logger
 */
export function createLogger(component: string, context?: LogContext): TaskforgeLogger {
  return getLogger().child({ component, ...context });
}

/**
 * Reset the default logger (for testing, or to re-read LOG_LEVEL)
 */
export function resetLogger(): void {
  defaultLogger = null;
}
