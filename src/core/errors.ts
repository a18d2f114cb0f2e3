import { FailureReason } from './result';

export class JobQueueError extends Error {
  readonly reason: FailureReason;

  constructor(message: string, reason: FailureReason = 'backend', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'JobQueueError';
    this.reason = reason;
  }
}

export class ConnectionError extends JobQueueError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'connection', options);
    this.name = 'ConnectionError';
  }
}

export class NoSuchJobError extends JobQueueError {
  constructor(jobId: string) {
    super(`No such job: ${jobId}`, 'not_found');
    this.name = 'NoSuchJobError';
  }
}

export class InvalidJobIdError extends JobQueueError {
  constructor(message: string) {
    super(message, 'invalid_id');
    this.name = 'InvalidJobIdError';
  }
}

export class InvalidJobOperationError extends JobQueueError {
  constructor(message: string) {
    super(message, 'invalid_operation');
    this.name = 'InvalidJobOperationError';
  }
}

/**
 * Raised for a backend address or option that can't be used. Never
 * returned through a Result: it only happens while building a client.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}

export function reasonOf(error: unknown): FailureReason {
  return error instanceof JobQueueError ? error.reason : 'backend';
}
