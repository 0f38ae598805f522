/**
 * Custom Application Errors
 * Domain-specific error classes for the publishing pipeline.
 */

/**
 * Base application error class.
 * All domain errors should extend this.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Resource not found error (404).
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string) {
    const message = identifier
      ? `${resource} '${identifier}' not found`
      : `${resource} not found`;
    super(message, 404);
  }
}

/**
 * Bad request error (400).
 */
export class BadRequestError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

/**
 * Unparsable manual time entry. Callers re-prompt.
 */
export class InvalidTimeInputError extends BadRequestError {
  constructor(public input: string) {
    super(`Invalid time '${input}': use seconds (123), mm:ss (2:03) or h:mm:ss`);
  }
}

/**
 * External service error (502).
 */
export class ExternalServiceError extends AppError {
  constructor(service: string, detail?: string, originalError?: Error) {
    super(detail ? `External service error: ${service}: ${detail}` : `External service error: ${service}`, 502);
    if (originalError) {
      this.stack = originalError.stack;
    }
  }
}

/**
 * Misconfigured homily marker. Fatal: raised at startup, never retried.
 */
export class MarkerConfigError extends AppError {
  constructor(public marker: string, reason: string) {
    super(`Homily marker '${marker}' is misconfigured: ${reason}`, 500, false);
  }
}
