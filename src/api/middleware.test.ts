import { describe, it, expect } from 'vitest';
import { routeLabel, UNMATCHED_ROUTE } from './middleware.js';

describe('routeLabel', () => {
  it('joins the mount prefix with the matched route pattern', () => {
    expect(routeLabel('/api/v1/jobs/42?fields=all', '/:id')).toBe('/api/v1/jobs/:id');
    expect(routeLabel('/api/v1/analysis/jobs/7/analyze', '/jobs/:id/analyze')).toBe('/api/v1/analysis/jobs/:id/analyze');
    expect(routeLabel('/api/v1/jobs/statistics/summary', '/statistics/summary')).toBe('/api/v1/jobs/statistics/summary');
  });

  it('labels non-numeric ids by their pattern', () => {
    expect(routeLabel('/api/v1/jobs/abc', '/:id')).toBe('/api/v1/jobs/:id');
    expect(routeLabel('/api/v1/jobs/some-long-random-token', '/:id')).toBe('/api/v1/jobs/:id');
  });

  it('lowercases the mount prefix', () => {
    expect(routeLabel('/API/V1/Jobs/7', '/:id')).toBe('/api/v1/jobs/:id');
  });

  it('labels mount roots without a trailing slash', () => {
    expect(routeLabel('/api/v1/jobs?page=2', '/')).toBe('/api/v1/jobs');
    expect(routeLabel('/api/v1/jobs/', '/')).toBe('/api/v1/jobs');
    expect(routeLabel('/?a=1', '/')).toBe('/');
  });

  it('gives every unmatched request one label', () => {
    expect(routeLabel('/x/y/z?q=1', undefined)).toBe(UNMATCHED_ROUTE);
    expect(routeLabel('/api/v1/nothing-here', undefined)).toBe('unmatched');
  });
});
