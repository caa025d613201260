import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  AuthenticationError,
  AuthorizationError,
  BusinessLogicError,
  ExternalServiceError,
  NotFoundError,
  RateLimitError,
  ValidationError,
  retryAfterSeconds,
} from './application-errors.js';
import { ErrorTracker, normalizeError, toErrorResponse } from './error-handler.js';

describe('application errors', () => {
  it('map to HTTP status codes', () => {
    expect([
      new ValidationError('bad').statusCode,
      new AuthenticationError().statusCode,
      new AuthorizationError().statusCode,
      new NotFoundError('Job', 3).statusCode,
      new BusinessLogicError('closed').statusCode,
      new RateLimitError().statusCode,
      new ExternalServiceError('openai', 'down').statusCode,
    ]).toEqual([400, 401, 403, 404, 400, 429, 503]);
  });

  it('exposes a retry delay where one applies', () => {
    expect(retryAfterSeconds(new RateLimitError())).toBe(60);
    expect(retryAfterSeconds(new ExternalServiceError('openai', 'quota', 30))).toBe(30);
    expect(retryAfterSeconds(new NotFoundError('Job', 3))).toBeUndefined();
  });
});

describe('toErrorResponse', () => {
  it('includes field errors and the suggested action', () => {
    const error = new ValidationError('Invalid request parameters', { page: ['Expected number'] });

    expect(toErrorResponse(error)).toEqual({
      detail: 'Invalid request parameters',
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Invalid request parameters',
        category: 'validation',
        timestamp: error.timestamp,
        suggested_action: 'Check the request parameters and try again',
        field_errors: { page: ['Expected number'] },
      },
    });
  });

  it('omits empty optional parts', () => {
    const error = new BusinessLogicError('Job is closed', 'JOB_CLOSED');

    expect(toErrorResponse(error).error).toEqual({
      code: 'JOB_CLOSED',
      message: 'Job is closed',
      category: 'business_logic',
      timestamp: error.timestamp,
    });
  });
});

describe('normalizeError', () => {
  it('turns zod issues into field errors', () => {
    const parsed = z.object({ page: z.number() }).safeParse({ page: 'x' });
    if (parsed.success) {
      throw new Error('expected a parse failure');
    }

    const error = normalizeError(parsed.error);

    expect(error).toBeInstanceOf(ValidationError);
    expect(toErrorResponse(error).error.field_errors).toEqual({ page: ['Expected number, received string'] });
  });

  it('maps oversized bodies to 413', () => {
    expect(normalizeError({ type: 'entity.too.large' })).toMatchObject({ statusCode: 413, code: 'PAYLOAD_TOO_LARGE' });
  });

  it('wraps unknown errors as internal errors', () => {
    expect(normalizeError(new Error('boom'))).toMatchObject({
      statusCode: 500,
      code: 'INTERNAL_ERROR',
      category: 'system',
      message: 'boom',
    });
  });
});

describe('ErrorTracker', () => {
  it('counts by code and ranks the most frequent', () => {
    const tracker = new ErrorTracker();
    tracker.record('NOT_FOUND', 'a', '/jobs/1');
    tracker.record('VALIDATION_ERROR', 'b');
    tracker.record('NOT_FOUND', 'c', '/jobs/2');

    const stats = tracker.getStatistics();

    expect(stats.total_errors).toBe(3);
    expect(stats.error_counts).toEqual({ NOT_FOUND: 2, VALIDATION_ERROR: 1 });
    expect(stats.top_errors).toEqual([
      { code: 'NOT_FOUND', count: 2 },
      { code: 'VALIDATION_ERROR', count: 1 },
    ]);
    expect(stats.recent_errors.map((occurrence) => occurrence.message)).toEqual(['a', 'b', 'c']);
  });

  it('reports the last 10 occurrences', () => {
    const tracker = new ErrorTracker();
    for (let i = 0; i < 120; i++) {
      tracker.record('INTERNAL_ERROR', `error ${i}`);
    }

    const stats = tracker.getStatistics();

    expect(stats.total_errors).toBe(120);
    expect(stats.recent_errors).toHaveLength(10);
    expect(stats.recent_errors[9].message).toBe('error 119');

    tracker.reset();
    expect(tracker.getStatistics().total_errors).toBe(0);
  });
});
