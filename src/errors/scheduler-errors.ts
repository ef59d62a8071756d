import { SchedulerError } from './base-error.js';

/**
 * A required argument was missing or malformed
 */
export class InvalidArgumentError extends SchedulerError {
  public readonly argument: string;

  constructor(
    argument: string,
    message: string,
    options: { code?: 'NULL_ARGUMENT' | 'INVALID_ARGUMENT'; context?: Record<string, unknown> } = {}
  ) {
    super(options.code ?? 'INVALID_ARGUMENT', message, { context: { argument, ...options.context } });
    this.name = 'InvalidArgumentError';
    this.argument = argument;
  }

  static nullArgument(argument: string): InvalidArgumentError {
    return new InvalidArgumentError(argument, `${argument} must not be null or undefined`, {
      code: 'NULL_ARGUMENT',
    });
  }
}

/**
 * A wakeup was submitted after shutdown began
 */
export class RejectedExecutionError extends SchedulerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super('REJECTED', message, { context });
    this.name = 'RejectedExecutionError';
  }
}

/**
 * Operation intentionally not supported by a wakeup handle
 */
export class UnsupportedOperationError extends SchedulerError {
  public readonly operation: string;

  constructor(operation: string) {
    super('UNSUPPORTED', `${operation} is not supported`, { context: { operation } });
    this.name = 'UnsupportedOperationError';
    this.operation = operation;
  }
}

/**
 * A blocking wait was interrupted. Carries no failure; callers treat it as a signal.
 */
export class InterruptedError extends SchedulerError {
  constructor(message: string = 'Wait interrupted') {
    super('INTERRUPTED', message);
    this.name = 'InterruptedError';
  }
}

export class IllegalStateError extends SchedulerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super('ILLEGAL_STATE', message, { context });
    this.name = 'IllegalStateError';
  }
}

export class ConfigurationError extends SchedulerError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], cause?: unknown) {
    super('CONFIGURATION', message, { context: { issues }, cause });
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}
