/**
 * Base Error Class
 *
 * Every error the scheduler package raises carries a stable `code` that
 * callers can switch on instead of matching messages.
 */

export type SchedulerErrorCode =
  | 'NULL_ARGUMENT'
  | 'INVALID_ARGUMENT'
  | 'REJECTED'
  | 'UNSUPPORTED'
  | 'INTERRUPTED'
  | 'ILLEGAL_STATE'
  | 'CONFIGURATION';

export interface SchedulerErrorOptions {
  /** Underlying failure, exposed as the standard `Error.cause` */
  cause?: unknown;
  context?: Record<string, unknown>;
}

export class SchedulerError extends Error {
  public readonly code: SchedulerErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(code: SchedulerErrorCode, message: string, options: SchedulerErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'SchedulerError';
    this.code = code;
    this.context = options.context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

export function isSchedulerError(error: unknown): error is SchedulerError {
  return error instanceof SchedulerError;
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
