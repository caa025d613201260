import { describe, it, expect, vi } from 'vitest';
import axios, { AxiosError, AxiosHeaders, type AxiosResponse } from 'axios';
import type { ScrapedJob } from '../core/types.js';
import { BaseScraper, ScrapingError, ScrapingRateLimitError, parseRelativeDate, type ScrapingConfig } from './base.js';

function response(data: string): AxiosResponse {
  return { data, status: 200, statusText: 'OK', headers: {}, config: { headers: new AxiosHeaders() } };
}

function httpError(status: number): AxiosError {
  const failed: AxiosResponse = { ...response(''), status, statusText: 'Error' };
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', undefined, undefined, failed);
}

class TestScraper extends BaseScraper {
  readonly name = 'indeed';

  async searchJobs(): Promise<ScrapedJob[]> {
    return [];
  }

  fetch(url: string): Promise<string> {
    return this.fetchPage(url);
  }
}

function createScraper(config: Partial<ScrapingConfig> = {}) {
  const http = axios.create();
  const get = vi.spyOn(http, 'get');
  const wait = vi.fn(async (_ms: number) => {});
  const clock = { now: 0 };
  const scraper = new TestScraper(config, http, wait, () => clock.now);
  return { scraper, get, wait, clock };
}

describe('fetchPage', () => {
  it('retries server errors with exponential backoff', async () => {
    const { scraper, get, wait } = createScraper();
    get.mockRejectedValueOnce(httpError(503)).mockResolvedValueOnce(response('<html>ok</html>'));

    await expect(scraper.fetch('https://example.com/jobs')).resolves.toBe('<html>ok</html>');

    expect(wait.mock.calls).toEqual([[2000]]);
    expect(scraper.getStats()).toEqual({ requests: 2, errors: 1, jobsFound: 0 });
  });

  it('throws a rate limit error once 429 retries are exhausted', async () => {
    const { scraper, get, wait } = createScraper();
    get.mockRejectedValue(httpError(429));

    const failure = scraper.fetch('https://example.com/jobs');

    await expect(failure).rejects.toBeInstanceOf(ScrapingRateLimitError);
    await expect(failure).rejects.toThrow('indeed: rate limited after 3 attempts');
    expect(get).toHaveBeenCalledTimes(3);
    expect(wait.mock.calls).toEqual([[2000], [4000]]);
  });

  it('does not retry client errors', async () => {
    const { scraper, get } = createScraper();
    get.mockRejectedValueOnce(httpError(404));

    const failure = scraper.fetch('https://example.com/missing');

    await expect(failure).rejects.toBeInstanceOf(ScrapingError);
    await expect(failure).rejects.toThrow('indeed: request failed: HTTP 404');
    expect(get).toHaveBeenCalledTimes(1);
  });

  it('keeps a minimum gap between requests', async () => {
    const { scraper, get, wait, clock } = createScraper();
    get.mockResolvedValue(response('<html></html>'));

    await scraper.fetch('https://example.com/1');
    clock.now = 500;
    await scraper.fetch('https://example.com/2');

    expect(wait.mock.calls).toEqual([[1500]]);
  });

  it('waits for the one-minute window when the per-minute limit is reached', async () => {
    const { scraper, get, wait, clock } = createScraper({ rateLimitPerMinute: 2, delayBetweenRequestsMs: 0 });
    get.mockResolvedValue(response('<html></html>'));

    await scraper.fetch('https://example.com/1');
    clock.now = 10;
    await scraper.fetch('https://example.com/2');
    clock.now = 20;
    await scraper.fetch('https://example.com/3');

    expect(wait.mock.calls).toEqual([[59980]]);
  });
});

describe('parseRelativeDate', () => {
  const now = new Date('2024-03-10T12:00:00Z');

  it('parses relative phrases', () => {
    expect(parseRelativeDate('Posted 3 days ago', now)).toEqual(new Date('2024-03-07T12:00:00Z'));
    expect(parseRelativeDate('30+ days ago', now)).toEqual(new Date('2024-02-09T12:00:00Z'));
    expect(parseRelativeDate('5 hours ago', now)).toEqual(new Date('2024-03-10T07:00:00Z'));
    expect(parseRelativeDate('Just posted', now)).toEqual(now);
  });

  it('falls back to absolute dates', () => {
    expect(parseRelativeDate('2024-01-15', now)).toEqual(new Date('2024-01-15T00:00:00Z'));
  });

  it('returns null for unknown text', () => {
    expect(parseRelativeDate('not a date', now)).toBeNull();
    expect(parseRelativeDate(null, now)).toBeNull();
  });
});
