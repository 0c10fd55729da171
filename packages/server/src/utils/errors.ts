import { ErrorCode, FailureKind } from '@coursewright/shared';

// --- HTTP-facing errors, rendered by errorHandler ---

export abstract class AppError extends Error {
  abstract readonly statusCode: number;
  abstract readonly code: ErrorCode;
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.details = details;
  }
}

export class NotFoundError extends AppError {
  readonly statusCode = 404;
  readonly code = ErrorCode.NOT_FOUND;
}

export class RateLimitError extends AppError {
  readonly statusCode = 429;
  readonly code = ErrorCode.RATE_LIMITED;
}

/** A synchronously executed task reached its terminal failed state. */
export class TaskFailedError extends AppError {
  readonly statusCode = 502;
  readonly code = ErrorCode.TASK_FAILED;
}

/** The job queue is shutting down and accepts no new work. */
export class ServiceUnavailableError extends AppError {
  readonly statusCode = 503;
  readonly code = ErrorCode.SERVICE_UNAVAILABLE;
}

// --- Errors raised by collaborators inside a job ---

/**
 * Network, timeout or provider failure while calling the LLM. Retryable at
 * the job envelope unless raised inside a step that degrades instead.
 */
export class TransportError extends Error {
  readonly kind = FailureKind.TRANSPORT;

  constructor(
    message: string,
    readonly provider: string,
    readonly status?: number,
    readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

/** A required static input (credential, payload) is missing. Never retried. */
export class ConfigurationError extends Error {
  readonly kind = FailureKind.CONFIGURATION;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
