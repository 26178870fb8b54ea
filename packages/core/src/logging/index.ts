/**
 * @fileoverview Logging exports
 */

export {
  TaskforgeLogger,
  LOG_LEVELS,
  isLogLevel,
  getLogger,
  createLogger,
  resetLogger,
  type LogLevel,
  type LoggerOptions,
  type LogContext,
} from './logger.js';
