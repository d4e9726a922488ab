/**
 * Error Types
 *
 * Each error carries a stable code so log consumers can filter on it.
 */

export type ErrorCode =
  | 'CONFIG_ERROR'
  | 'SCHEDULE_ERROR'
  | 'QUEUE_FULL'
  | 'UNKNOWN_METHOD'
  | 'TASK_EXECUTION_ERROR'
  | 'AUTH_ERROR'
  | 'CANCELLED';

export class CheckinError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Missing or ambiguous configuration. Fatal to the affected account.
 */
export class ConfigError extends CheckinError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_ERROR', message, options);
  }
}

/**
 * Malformed schedule expression. Fatal to that one schedule entry.
 */
export class ScheduleError extends CheckinError {
  readonly expression: string;

  constructor(expression: string, reason: string) {
    super('SCHEDULE_ERROR', `Invalid schedule "${expression}": ${reason}`);
    this.expression = expression;
  }
}

/**
 * A task was dropped because the account queue was full.
 * Attached to the warning event, never thrown.
 */
export class QueueFullWarning extends CheckinError {
  readonly task: string;

  constructor(task: string) {
    super('QUEUE_FULL', `Task queue is full, dropping task ${task}`);
    this.task = task;
  }
}

export class UnknownMethodError extends CheckinError {
  readonly method: string;

  constructor(method: string) {
    super('UNKNOWN_METHOD', `unknown method "${method}"`);
    this.method = method;
  }
}

/**
 * The remote operation failed.
 */
export class TaskExecutionError extends CheckinError {
  readonly task: string;

  constructor(task: string, cause: unknown) {
    super('TASK_EXECUTION_ERROR', `Task ${task} failed: ${getErrorMessage(cause)}`, { cause });
    this.task = task;
  }
}

export class AuthError extends CheckinError {
  readonly account: string;

  constructor(account: string, cause: unknown) {
    super('AUTH_ERROR', `Authentication failed for ${account}: ${getErrorMessage(cause)}`, { cause });
    this.account = account;
  }
}

/**
 * Graceful shutdown. Not a failure.
 */
export class CancelledError extends CheckinError {
  constructor(message: string = 'operation cancelled') {
    super('CANCELLED', message);
  }
}

export function isCancellation(error: unknown): boolean {
  if (error instanceof CancelledError) {
    return true;
  }
  if (error instanceof AggregateError) {
    return error.errors.length > 0 && error.errors.every(isCancellation);
  }
  return false;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
