import type { NextFunction, Request, RequestHandler, Response } from 'express';
import rateLimit from 'express-rate-limit';
import { RateLimitError } from '../errors/application-errors.js';
import { recordHttpRequest } from '../observability/metrics.js';
import { logger } from '../utils/logger.js';

const RATE_WINDOW_MS = 60 * 1000;

/**
 * Allow-list CORS. `*` in the list allows any origin.
 */
export function corsMiddleware(origins: readonly string[]): RequestHandler {
  const allowAll = origins.includes('*');

  return (req: Request, res: Response, next: NextFunction) => {
    const origin = req.headers.origin;
    if (origin && (allowAll || origins.includes(origin))) {
      res.setHeader('Access-Control-Allow-Origin', allowAll ? '*' : origin);
      if (!allowAll) {
        res.setHeader('Vary', 'Origin');
        res.setHeader('Access-Control-Allow-Credentials', 'true');
      }
      res.setHeader('Access-Control-Allow-Methods', 'GET,POST,PUT,DELETE,OPTIONS');
      res.setHeader('Access-Control-Allow-Headers', 'Content-Type,Authorization');
    }

    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
      return;
    }
    next();
  };
}

export const UNMATCHED_ROUTE = 'unmatched';

/**
 * Route label for metrics: the mount prefix plus the matched route pattern.
 * Requests that matched no route share one label.
 */
export function routeLabel(url: string, routePath: string | undefined): string {
  if (routePath === undefined) {
    return UNMATCHED_ROUTE;
  }

  const segments = (url.split('?')[0] ?? '').split('/').filter((segment) => segment.length > 0);
  const routeSegments = routePath.split('/').filter((segment) => segment.length > 0);
  // mount paths match case-insensitively
  const base = segments.slice(0, Math.max(0, segments.length - routeSegments.length)).map((segment) => segment.toLowerCase());
  const label = [...base, ...routeSegments].join('/');
  return `/${label}`;
}

// req.route is typed loosely by express
function matchedRoutePath(req: Request): string | undefined {
  const route: unknown = req.route;
  if (typeof route !== 'object' || route === null) {
    return undefined;
  }
  const path: unknown = Reflect.get(route, 'path');
  return typeof path === 'string' ? path : undefined;
}

// Request logging and timing
export function requestLogger(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const started = process.hrtime.bigint();

    res.on('finish', () => {
      const seconds = Number(process.hrtime.bigint() - started) / 1e9;
      const route = routeLabel(req.originalUrl, matchedRoutePath(req));
      recordHttpRequest(req.method, route, res.statusCode, seconds);
      logger.info('HTTP', `${req.method} ${req.originalUrl} ${res.statusCode} ${(seconds * 1000).toFixed(1)}ms`);
    });

    next();
  };
}

/**
 * Per-IP limit; rejections go through the error handler as 429s
 */
export function apiRateLimiter(perMinute: number): RequestHandler {
  return rateLimit({
    windowMs: RATE_WINDOW_MS,
    limit: perMinute,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req, _res, next) => {
      logger.warn('RateLimit', `API rate limit exceeded: ${req.ip}`);
      next(new RateLimitError('Too many requests, please try again later', RATE_WINDOW_MS / 1000));
    },
  });
}
