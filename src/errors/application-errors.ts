/**
 * Application error hierarchy. Every error carries a stable code, a category
 * for grouping, and the HTTP status it maps to.
 */

export type ErrorCategory =
  | 'validation'
  | 'authentication'
  | 'authorization'
  | 'not_found'
  | 'conflict'
  | 'business_logic'
  | 'external_service'
  | 'database'
  | 'rate_limit'
  | 'system';

export type FieldErrors = Record<string, string[]>;

export class ApplicationError extends Error {
  readonly timestamp: string;

  constructor(
    message: string,
    readonly code: string,
    readonly category: ErrorCategory,
    readonly statusCode: number,
    readonly details: Record<string, unknown> = {},
    readonly suggestedAction?: string
  ) {
    super(message);
    this.name = new.target.name;
    this.timestamp = new Date().toISOString();
  }
}

export class ValidationError extends ApplicationError {
  constructor(message: string, readonly fieldErrors: FieldErrors = {}) {
    super(message, 'VALIDATION_ERROR', 'validation', 400, {}, 'Check the request parameters and try again');
  }
}

export class AuthenticationError extends ApplicationError {
  constructor(message = 'Authentication required') {
    super(message, 'AUTHENTICATION_ERROR', 'authentication', 401, {}, 'Provide valid credentials');
  }
}

export class AuthorizationError extends ApplicationError {
  constructor(message = 'Permission denied') {
    super(message, 'AUTHORIZATION_ERROR', 'authorization', 403);
  }
}

export class NotFoundError extends ApplicationError {
  constructor(readonly resource: string, readonly resourceId: string | number) {
    super(`${resource} with id ${resourceId} not found`, 'NOT_FOUND', 'not_found', 404, {
      resource,
      id: resourceId,
    });
  }
}

export class ConflictError extends ApplicationError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'CONFLICT', 'conflict', 409, details);
  }
}

export class BusinessLogicError extends ApplicationError {
  constructor(message: string, code = 'BUSINESS_RULE_VIOLATION', details: Record<string, unknown> = {}) {
    super(message, code, 'business_logic', 400, details);
  }
}

export class ExternalServiceError extends ApplicationError {
  constructor(
    readonly service: string,
    message: string,
    readonly retryAfter = 300
  ) {
    super(`${service}: ${message}`, 'EXTERNAL_SERVICE_ERROR', 'external_service', 503, { service }, 'Try again later');
  }
}

export class DatabaseError extends ApplicationError {
  constructor(message: string, readonly operation?: string) {
    super(message, 'DATABASE_ERROR', 'database', 500, operation ? { operation } : {});
  }
}

export class RateLimitError extends ApplicationError {
  constructor(message = 'Too many requests, please try again later', readonly retryAfter = 60) {
    super(message, 'RATE_LIMIT_EXCEEDED', 'rate_limit', 429, {}, `Retry after ${retryAfter} seconds`);
  }
}

/**
 * Seconds a client should wait before retrying, for errors that carry one
 */
export function retryAfterSeconds(error: ApplicationError): number | undefined {
  if (error instanceof RateLimitError || error instanceof ExternalServiceError) {
    return error.retryAfter;
  }
  return undefined;
}
