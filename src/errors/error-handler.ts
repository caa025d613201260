import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { config } from '../config.js';
import { logger } from '../utils/logger.js';
import { captureError } from '../utils/sentry.js';
import { recordError } from '../observability/metrics.js';
import {
  ApplicationError,
  ValidationError,
  retryAfterSeconds,
  type ErrorCategory,
  type FieldErrors,
} from './application-errors.js';

const MAX_RECENT_ERRORS = 100;

interface ErrorOccurrence {
  code: string;
  message: string;
  path?: string;
  timestamp: string;
}

export interface ErrorStatistics {
  total_errors: number;
  error_counts: Record<string, number>;
  top_errors: Array<{ code: string; count: number }>;
  recent_errors: ErrorOccurrence[];
}

/**
 * Counts errors by code and keeps a bounded window of recent occurrences
 */
export class ErrorTracker {
  private readonly counts = new Map<string, number>();
  private recent: ErrorOccurrence[] = [];

  record(code: string, message: string, path?: string): void {
    this.counts.set(code, (this.counts.get(code) ?? 0) + 1);
    this.recent.push({ code, message, path, timestamp: new Date().toISOString() });
    if (this.recent.length > MAX_RECENT_ERRORS) {
      this.recent = this.recent.slice(-MAX_RECENT_ERRORS);
    }
  }

  getStatistics(): ErrorStatistics {
    const errorCounts = Object.fromEntries(this.counts);
    const topErrors = [...this.counts.entries()]
      .sort((a, b) => b[1] - a[1])
      .slice(0, 10)
      .map(([code, count]) => ({ code, count }));

    return {
      total_errors: [...this.counts.values()].reduce((sum, count) => sum + count, 0),
      error_counts: errorCounts,
      top_errors: topErrors,
      recent_errors: this.recent.slice(-10),
    };
  }

  reset(): void {
    this.counts.clear();
    this.recent = [];
  }
}

export const errorTracker = new ErrorTracker();

export interface ErrorResponseBody {
  detail: string;
  error: {
    code: string;
    message: string;
    category: ErrorCategory;
    timestamp: string;
    suggested_action?: string;
    field_errors?: FieldErrors;
  };
}

export function toErrorResponse(error: ApplicationError): ErrorResponseBody {
  return {
    detail: error.message,
    error: {
      code: error.code,
      message: error.message,
      category: error.category,
      timestamp: error.timestamp,
      ...(error.suggestedAction ? { suggested_action: error.suggestedAction } : {}),
      ...(error instanceof ValidationError && Object.keys(error.fieldErrors).length > 0
        ? { field_errors: error.fieldErrors }
        : {}),
    },
  };
}

/**
 * Convert zod issues to field errors keyed by dotted path
 */
export function fromZodError(error: ZodError, message = 'Invalid request parameters'): ValidationError {
  const fieldErrors: FieldErrors = {};
  for (const issue of error.issues) {
    const field = issue.path.length > 0 ? issue.path.join('.') : '_root';
    (fieldErrors[field] ??= []).push(issue.message);
  }
  return new ValidationError(message, fieldErrors);
}

function hasStringProp<K extends string>(value: unknown, key: K): value is Record<K, string> {
  return typeof value === 'object' && value !== null && key in value && typeof Reflect.get(value, key) === 'string';
}

/**
 * Normalize anything thrown inside a handler to an ApplicationError
 */
export function normalizeError(err: unknown): ApplicationError {
  if (err instanceof ApplicationError) {
    return err;
  }
  if (err instanceof ZodError) {
    return fromZodError(err);
  }
  // body-parser errors
  if (err instanceof SyntaxError && 'body' in err) {
    return new ApplicationError('Invalid JSON in request body', 'INVALID_JSON', 'validation', 400);
  }
  if (hasStringProp(err, 'type') && err.type === 'entity.too.large') {
    return new ApplicationError('Request body too large', 'PAYLOAD_TOO_LARGE', 'validation', 413);
  }

  const message = err instanceof Error ? err.message : String(err);
  const exposed = config.NODE_ENV === 'production' ? 'Internal server error' : message;
  return new ApplicationError(exposed, 'INTERNAL_ERROR', 'system', 500);
}

/**
 * Error handling middleware
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const error = normalizeError(err);

  errorTracker.record(error.code, error.message, req.path);
  recordError(error.code);

  if (error.statusCode >= 500) {
    logger.error('API', `${req.method} ${req.path} failed`, err);
    captureError(err, { path: req.path, method: req.method, code: error.code });
  } else {
    logger.warn('API', `${req.method} ${req.path} → ${error.statusCode} ${error.code}: ${error.message}`);
  }

  const retryAfter = retryAfterSeconds(error);
  if (retryAfter !== undefined) {
    res.setHeader('Retry-After', String(retryAfter));
  }

  res.status(error.statusCode).json(toErrorResponse(error));
}

/**
 * Fallback for unmatched routes
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new ApplicationError(`Route ${req.method} ${req.path} not found`, 'NOT_FOUND', 'not_found', 404));
}
