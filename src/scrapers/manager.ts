import pLimit from 'p-limit';
import type { ScrapedJob } from '../core/types.js';
import {
  classifyError,
  isRecoverableErrorType,
  recoveryHandler,
  type RecoverableErrorType,
  type UserFriendlyErrorHandler,
} from '../errors/recovery.js';
import { logger } from '../utils/logger.js';
import { captureError } from '../utils/sentry.js';
import type { BaseScraper, ScraperStats, SearchOptions } from './base.js';

export type Scraper = Pick<BaseScraper, 'name' | 'searchJobs' | 'getStats'>;

export interface ScraperRun {
  scraper: string;
  jobs: number;
  error?: string;
  errorType?: RecoverableErrorType;
  userMessage?: string;
}

export interface ScrapeAllResult {
  jobs: ScrapedJob[];
  runs: ScraperRun[];
}

export interface ScraperManagerStats {
  totalJobsFound: number;
  totalErrors: number;
  scrapers: Record<string, ScraperStats>;
}

function recoveryTypeFor(scraper: string, error: unknown): RecoverableErrorType | null {
  const named = [`${scraper}_scraping_blocked`, `${scraper}_rate_limit`].find(isRecoverableErrorType);
  return named ?? classifyError(error);
}

/**
 * Runs every registered scraper for a query. One failing scraper never stops the others.
 */
export class ScraperManager {
  private readonly scrapers = new Map<string, Scraper>();
  private totalJobsFound = 0;
  private totalErrors = 0;

  constructor(
    private readonly recovery: Pick<UserFriendlyErrorHandler, 'handleError'> = recoveryHandler,
    private readonly concurrency = 2
  ) {}

  register(scraper: Scraper): void {
    this.scrapers.set(scraper.name, scraper);
    logger.info('Scrapers', `Registered scraper: ${scraper.name}`);
  }

  get names(): string[] {
    return [...this.scrapers.keys()];
  }

  async scrapeAll(query: string, options: SearchOptions = {}): Promise<ScrapeAllResult> {
    const limit = pLimit(this.concurrency);
    const results = await Promise.all(
      [...this.scrapers.values()].map((scraper) => limit(() => this.runScraper(scraper, query, options)))
    );

    const jobs = results.flatMap((result) => result.jobs);
    this.totalJobsFound += jobs.length;
    return { jobs, runs: results.map((result) => result.run) };
  }

  getStats(): ScraperManagerStats {
    const scrapers: Record<string, ScraperStats> = {};
    for (const [name, scraper] of this.scrapers) {
      scrapers[name] = scraper.getStats();
    }
    return { totalJobsFound: this.totalJobsFound, totalErrors: this.totalErrors, scrapers };
  }

  private async runScraper(
    scraper: Scraper,
    query: string,
    options: SearchOptions
  ): Promise<{ jobs: ScrapedJob[]; run: ScraperRun }> {
    try {
      const jobs = await scraper.searchJobs(query, options);
      return { jobs, run: { scraper: scraper.name, jobs: jobs.length } };
    } catch (error) {
      this.totalErrors++;
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Scrapers', `${scraper.name} failed for "${query}"`, message);
      captureError(error, { scraper: scraper.name, query });

      const run: ScraperRun = { scraper: scraper.name, jobs: 0, error: message };
      const errorType = recoveryTypeFor(scraper.name, error);
      if (errorType) {
        const recovery = await this.recovery.handleError(errorType, error, {
          additionalData: { scraper: scraper.name, query, location: options.location },
        });
        run.errorType = errorType;
        run.userMessage = recovery.user_message;
      }
      return { jobs: [], run };
    }
  }
}
