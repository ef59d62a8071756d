/**
 * fiber-timed-scheduler
 *
 * Timed wakeups for suspended lightweight threads: many producers, one worker,
 * deadline order.
 */

export * from './scheduler/index.js';
export * from './queue/index.js';
export * from './timing/index.js';
export * from './errors/index.js';
export * from './config/index.js';
export {
  Logger,
  createLogger,
  getLogger,
  resetLogger,
  isDebugEnabled,
  logger,
  type LogContext,
  type LogEntry,
  type LogFormat,
  type LogLevel,
  type LoggerOptions,
} from './utils/logger.js';
