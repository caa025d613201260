import { load, type Cheerio, type CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import type { ScrapedJob } from '../core/types.js';
import { cleanText } from '../services/normalizer.js';
import { isRemoteLocation } from '../utils/location-normalizer.js';
import { logger } from '../utils/logger.js';
import { parseSalary } from '../utils/salary-parser.js';
import { extractSkills } from '../utils/skill-extractor.js';
import { BaseScraper, parseRelativeDate, type SearchOptions } from './base.js';

const SEARCH_URL = 'https://www.indeed.com/jobs';
const VIEW_URL = 'https://www.indeed.com/viewjob';
const JOBS_PER_PAGE = 10;
const DEFAULT_DATE_POSTED_DAYS = 7;

const USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:122.0) Gecko/20100101 Firefox/122.0',
];

// Card markup changes often; each field tries several selectors in order
const SELECTORS = {
  title: ['h2.jobTitle', 'a[data-jk]', 'span[title]'],
  company: ['span.companyName', '[data-testid="company-name"]', 'div.companyName'],
  location: ['[data-testid="text-location"]', '[data-testid="job-location"]', '.locationsContainer', '.companyLocation'],
  salary: ['.salaryText', '.salary-snippet', '.salary-snippet-container'],
  snippet: ['.job-snippet', '.summary', '[data-testid="job-snippet"]'],
  date: ['span.date', '[data-testid="myJobsStateDate"]'],
  nextPage: 'a[aria-label="Next Page"], a[data-testid="pagination-page-next"], a.pn',
};

export function buildSearchUrl(query: string, options: SearchOptions = {}, page = 0): string {
  const params = new URLSearchParams({ q: query });
  if (options.location) {
    params.set('l', options.location);
  }
  params.set('start', String(page * JOBS_PER_PAGE));
  params.set('fromage', String(options.datePostedDays ?? DEFAULT_DATE_POSTED_DAYS));
  if (options.remoteOnly) {
    params.set('remotejob', '1');
  }
  return `${SEARCH_URL}?${params.toString()}`;
}

function firstText(card: Cheerio<Element>, selectors: string[]): string | null {
  for (const selector of selectors) {
    const found = card.find(selector).first();
    if (found.length > 0) {
      const text = cleanText(found.text());
      if (text) {
        return text;
      }
    }
  }
  return null;
}

function parseCard(card: Cheerio<Element>, now: Date): ScrapedJob | null {
  const jobId = card.attr('data-jk') ?? card.find('a[data-jk]').first().attr('data-jk') ?? null;
  const title = firstText(card, SELECTORS.title) ?? card.find('span[title]').first().attr('title') ?? null;
  if (!title) {
    return null;
  }

  const location = firstText(card, SELECTORS.location);
  const description = firstText(card, SELECTORS.snippet);
  const salary = parseSalary(firstText(card, SELECTORS.salary));

  return {
    title,
    companyName: firstText(card, SELECTORS.company) ?? 'Unknown Company',
    location,
    description,
    requirements: null,
    salaryMin: salary.min,
    salaryMax: salary.max,
    salaryCurrency: salary.currency,
    salaryPeriod: salary.period,
    employmentType: null,
    experienceLevel: null,
    postedDate: parseRelativeDate(firstText(card, SELECTORS.date), now),
    sourcePlatform: 'indeed',
    sourceJobId: jobId,
    sourceUrl: jobId ? `${VIEW_URL}?jk=${encodeURIComponent(jobId)}` : null,
    skills: extractSkills(description),
    isRemote: isRemoteLocation(`${location ?? ''} ${description ?? ''}`),
    companyLogoUrl: null,
  };
}

function findCards($: CheerioAPI): Cheerio<Element> {
  const divs = $('div[data-jk]');
  if (divs.length > 0) {
    return divs;
  }
  const anchors = $('a[data-jk]');
  return anchors.length > 0 ? anchors : $('td.resultContent');
}

export interface SearchPage {
  jobs: ScrapedJob[];
  hasNextPage: boolean;
}

/**
 * Job cards of one search results page
 */
export function parseSearchPage(html: string, now = new Date()): SearchPage {
  const $ = load(html);
  const jobs: ScrapedJob[] = [];

  findCards($).each((_, element) => {
    const job = parseCard($(element), now);
    if (job) {
      jobs.push(job);
    }
  });

  return { jobs, hasNextPage: $(SELECTORS.nextPage).length > 0 };
}

export class IndeedScraper extends BaseScraper {
  readonly name = 'indeed';

  async searchJobs(query: string, options: SearchOptions = {}): Promise<ScrapedJob[]> {
    const maxPages = options.maxPages ?? this.config.maxPages;
    const found: ScrapedJob[] = [];
    logger.info('Indeed', `Searching "${query}" in ${options.location ?? 'anywhere'} (max ${maxPages} pages)`);

    for (let page = 0; page < maxPages; page++) {
      let html: string;
      try {
        html = await this.fetchPage(buildSearchUrl(query, options, page), this.requestHeaders());
      } catch (error) {
        // Nothing fetched yet: let the caller handle the failure
        if (page === 0) {
          throw error;
        }
        logger.warn('Indeed', `Stopping at page ${page + 1}`, error instanceof Error ? error.message : error);
        break;
      }

      const { jobs, hasNextPage } = parseSearchPage(html);
      if (jobs.length === 0) {
        logger.info('Indeed', `No jobs on page ${page + 1}`);
        break;
      }
      found.push(...jobs);
      this.stats.jobsFound += jobs.length;
      logger.debug('Indeed', `Page ${page + 1}: ${jobs.length} jobs`);

      if (!hasNextPage) {
        break;
      }
    }

    logger.info('Indeed', `Found ${found.length} jobs for "${query}"`);
    return found;
  }

  private requestHeaders(): Record<string, string> {
    return {
      'User-Agent': USER_AGENTS[Math.floor(Math.random() * USER_AGENTS.length)] ?? '',
      Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'Accept-Language': 'en-US,en;q=0.5',
    };
  }
}
