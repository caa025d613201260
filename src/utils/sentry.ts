import * as Sentry from '@sentry/node';
import { config } from '../config.js';
import { logger } from './logger.js';

let sentryEnabled = false;

/**
 * Initialize Sentry when SENTRY_DSN is configured. No-op otherwise.
 */
export function initSentry(): boolean {
  if (!config.SENTRY_DSN) {
    logger.info('Sentry', 'Disabled (no SENTRY_DSN)');
    return false;
  }

  Sentry.init({
    dsn: config.SENTRY_DSN,
    environment: config.NODE_ENV,
    release: `${config.APP_NAME}@${config.APP_VERSION}`,
    tracesSampleRate: config.NODE_ENV === 'production' ? 0.1 : 1.0,
  });
  sentryEnabled = true;
  logger.info('Sentry', `Initialized (${config.NODE_ENV})`);
  return true;
}

/**
 * Add a breadcrumb for tracking operation flow
 * Breadcrumbs create a trail of events leading up to errors
 */
export function addBreadcrumb(
  category: string,
  message: string,
  data?: Record<string, unknown>,
  level: Sentry.SeverityLevel = 'info'
): void {
  Sentry.addBreadcrumb({
    category,
    message,
    data,
    level,
    timestamp: Date.now() / 1000,
  });
}

/**
 * Execute a function within a scoped Sentry context
 * Tags added within the scope don't affect other operations
 */
export async function withSentryScope<T>(
  tags: Record<string, string>,
  callback: () => Promise<T>
): Promise<T> {
  return Sentry.withScope(async (scope) => {
    for (const [key, value] of Object.entries(tags)) {
      scope.setTag(key, value);
    }
    return callback();
  });
}

/**
 * Report an error with extra context. Returns the event id, or null when Sentry is off.
 */
export function captureError(error: unknown, context?: Record<string, unknown>): string | null {
  if (!sentryEnabled) {
    return null;
  }
  return Sentry.captureException(error, context ? { extra: context } : undefined);
}

/**
 * Add a breadcrumb for external API calls (scrapers, LLM)
 */
export function addApiCallBreadcrumb(
  service: string,
  operation: string,
  data?: Record<string, unknown>
): void {
  addBreadcrumb('http', `${service}: ${operation}`, data);
}

/**
 * Add a breadcrumb for scheduled task runs
 */
export function addTaskBreadcrumb(
  task: string,
  action: 'start' | 'complete' | 'fail' | 'skip',
  data?: Record<string, unknown>
): void {
  addBreadcrumb('scheduler', `${task}: ${action}`, data, action === 'fail' ? 'error' : 'info');
}

export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (sentryEnabled) {
    await Sentry.close(timeoutMs);
  }
}
