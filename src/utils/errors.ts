/**
 * Custom error classes for different failure scenarios
 * Each carries the HTTP status the error middleware answers with
 */

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Validation error (400)
 */
export class ValidationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 400, true, context);
  }
}

/**
 * Authentication error (401)
 */
export class AuthenticationError extends AppError {
  constructor(message: string = 'Authentication required', context?: Record<string, unknown>) {
    super(message, 401, true, context);
  }
}

/**
 * Resource not found error (404)
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string, context?: Record<string, unknown>) {
    const message = identifier
      ? `${resource} with identifier '${identifier}' not found`
      : `${resource} not found`;
    super(message, 404, true, context);
  }
}

/**
 * Conflict error (409) - concurrent writes and duplicate resources
 */
export class ConflictError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 409, true, context);
  }
}

/**
 * External service error (502)
 */
export class ExternalServiceError extends AppError {
  constructor(service: string, message: string, context?: Record<string, unknown>) {
    super(`${service} error: ${message}`, 502, true, context);
  }
}

/**
 * Database error (500)
 */
export class DatabaseError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 500, true, context);
  }
}

/**
 * Missing or unusable configuration (500)
 */
export class ConfigError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 500, false, context);
  }
}

/**
 * A save raced another write for the same call and lost
 */
export class SessionConflictError extends ConflictError {
  constructor(callId: string, expectedVersion: number) {
    super('Session was modified by a concurrent turn', { callId, expectedVersion });
  }
}

/**
 * A stored session record could not be decoded. Fatal for the turn.
 */
export class SessionCorruptedError extends AppError {
  constructor(callId: string, detail: string) {
    super(`Session record for call '${callId}' is corrupted: ${detail}`, 500, false, { callId });
  }
}

/**
 * The state machine was asked to move along an edge it does not have. Fatal for the turn.
 */
export class InvalidTransitionError extends AppError {
  constructor(from: string, to: string, reason?: string) {
    super(
      reason ? `Cannot move from '${from}' to '${to}': ${reason}` : `Cannot move from '${from}' to '${to}'`,
      500,
      false,
      { from, to }
    );
  }
}

/**
 * An extraction layer or collaborator call ran past its time limit
 */
export class LayerTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = 'LayerTimeoutError';
    Object.setPrototypeOf(this, LayerTimeoutError.prototype);
  }
}

/**
 * Check if error is operational (expected) vs programming error
 */
export function isOperationalError(error: unknown): boolean {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}
