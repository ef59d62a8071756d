/**
 * Errors Module
 */

export { SchedulerError, isSchedulerError, toError } from './base-error.js';
export type { SchedulerErrorCode, SchedulerErrorOptions } from './base-error.js';
export {
  InvalidArgumentError,
  RejectedExecutionError,
  UnsupportedOperationError,
  InterruptedError,
  IllegalStateError,
  ConfigurationError,
} from './scheduler-errors.js';
