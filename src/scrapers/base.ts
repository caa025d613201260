import axios, { type AxiosInstance } from 'axios';
import type { ScrapedJob, SourcePlatform } from '../core/types.js';
import { logger } from '../utils/logger.js';
import { addApiCallBreadcrumb } from '../utils/sentry.js';

const MINUTE_MS = 60 * 1000;
const DAY_MS = 24 * 60 * MINUTE_MS;

export interface ScrapingConfig {
  maxPages: number;
  delayBetweenRequestsMs: number;
  timeoutMs: number;
  maxRetries: number;
  rateLimitPerMinute: number;
}

export const DEFAULT_SCRAPING_CONFIG: ScrapingConfig = {
  maxPages: 5,
  delayBetweenRequestsMs: 2000,
  timeoutMs: 30000,
  maxRetries: 3,
  rateLimitPerMinute: 30,
};

export interface SearchOptions {
  location?: string;
  maxPages?: number;
  remoteOnly?: boolean;
  /** Only postings from the last N days */
  datePostedDays?: number;
}

export interface ScraperStats {
  requests: number;
  errors: number;
  jobsFound: number;
}

export class ScrapingError extends Error {
  constructor(
    readonly scraper: string,
    message: string,
    readonly status?: number
  ) {
    super(`${scraper}: ${message}`);
    this.name = 'ScrapingError';
  }
}

/**
 * The site kept answering 429 after every retry
 */
export class ScrapingRateLimitError extends ScrapingError {
  constructor(scraper: string, attempts: number) {
    super(scraper, `rate limited after ${attempts} attempts`, 429);
    this.name = 'ScrapingRateLimitError';
  }
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

const RELATIVE_UNITS: Record<string, number> = {
  minute: MINUTE_MS,
  hour: 60 * MINUTE_MS,
  day: DAY_MS,
  week: 7 * DAY_MS,
  month: 30 * DAY_MS,
};

/**
 * "3 days ago", "30+ days ago", "Just posted", "Today" or an absolute date
 */
export function parseRelativeDate(text: string | null | undefined, now = new Date()): Date | null {
  if (!text) {
    return null;
  }
  const lower = text.trim().toLowerCase();
  if (/\b(?:just posted|today|now)\b/.test(lower)) {
    return new Date(now);
  }
  if (/\byesterday\b/.test(lower)) {
    return new Date(now.getTime() - DAY_MS);
  }

  const match = /(\d+)\+?\s*(minute|hour|day|week|month)s?\s+ago/.exec(lower);
  if (match) {
    const unit = RELATIVE_UNITS[match[2] ?? ''] ?? DAY_MS;
    return new Date(now.getTime() - Number(match[1]) * unit);
  }

  const parsed = Date.parse(text);
  return Number.isNaN(parsed) ? null : new Date(parsed);
}

function statusOf(error: unknown): number | undefined {
  return axios.isAxiosError(error) ? error.response?.status : undefined;
}

function isRetryable(status: number | undefined): boolean {
  return status === undefined || status === 429 || status >= 500;
}

/**
 * Base for HTML job board scrapers: throttled fetches with retry, shared stats
 */
export abstract class BaseScraper {
  abstract readonly name: SourcePlatform;

  protected readonly config: ScrapingConfig;
  protected stats: ScraperStats = { requests: 0, errors: 0, jobsFound: 0 };
  private requestTimes: number[] = [];
  private lastRequestAt: number | null = null;

  constructor(
    config: Partial<ScrapingConfig> = {},
    protected readonly http: AxiosInstance = axios.create(),
    protected readonly wait: Sleep = sleep,
    private readonly clock: () => number = Date.now
  ) {
    this.config = { ...DEFAULT_SCRAPING_CONFIG, ...config };
  }

  abstract searchJobs(query: string, options?: SearchOptions): Promise<ScrapedJob[]>;

  getStats(): ScraperStats {
    return { ...this.stats };
  }

  /**
   * Sliding one-minute window plus a minimum gap between requests
   */
  protected async throttle(): Promise<void> {
    const now = this.clock();
    this.requestTimes = this.requestTimes.filter((time) => time > now - MINUTE_MS);

    if (this.requestTimes.length >= this.config.rateLimitPerMinute) {
      const oldest = this.requestTimes[0] ?? now;
      const waitMs = MINUTE_MS - (now - oldest);
      if (waitMs > 0) {
        logger.warn('Scraper', `${this.name}: rate limit reached, sleeping ${waitMs}ms`);
        await this.wait(waitMs);
      }
    }

    if (this.lastRequestAt !== null) {
      const gap = this.clock() - this.lastRequestAt;
      if (gap < this.config.delayBetweenRequestsMs) {
        await this.wait(this.config.delayBetweenRequestsMs - gap);
      }
    }

    const startedAt = this.clock();
    this.requestTimes.push(startedAt);
    this.lastRequestAt = startedAt;
  }

  /**
   * GET a page as text. 429 and 5xx are retried with exponential backoff.
   */
  protected async fetchPage(url: string, headers: Record<string, string> = {}): Promise<string> {
    await this.throttle();

    const attempts = Math.max(1, this.config.maxRetries);
    for (let attempt = 0; attempt < attempts; attempt++) {
      this.stats.requests++;
      addApiCallBreadcrumb(this.name, 'GET', { url, attempt });
      try {
        const response = await this.http.get<string>(url, {
          timeout: this.config.timeoutMs,
          headers,
          responseType: 'text',
        });
        return response.data;
      } catch (error) {
        this.stats.errors++;
        const status = statusOf(error);
        const isLast = attempt === attempts - 1;

        if (status === 429 && isLast) {
          throw new ScrapingRateLimitError(this.name, attempts);
        }
        if (!isRetryable(status) || isLast) {
          const reason = status !== undefined ? `HTTP ${status}` : error instanceof Error ? error.message : String(error);
          throw new ScrapingError(this.name, `request failed: ${reason}`, status);
        }

        const backoffMs = 2 ** attempt * this.config.delayBetweenRequestsMs;
        logger.warn('Scraper', `${this.name}: ${status ?? 'network error'}, retrying in ${backoffMs}ms`);
        await this.wait(backoffMs);
      }
    }

    throw new ScrapingError(this.name, 'request failed');
  }
}
