import { describe, it, expect, vi } from 'vitest';
import axios, { AxiosHeaders, type AxiosResponse } from 'axios';
import { IndeedScraper, buildSearchUrl, parseSearchPage } from './indeed.js';

const NOW = new Date('2024-03-10T12:00:00Z');

const RESULTS_PAGE = `
<div class="mosaic">
  <div class="job_seen_beacon" data-jk="abc123">
    <h2 class="jobTitle"><a data-jk="abc123"><span title="Senior Product Manager">Senior Product Manager</span></a></h2>
    <span class="companyName">Acme Corp</span>
    <div data-testid="text-location">Remote</div>
    <div class="salary-snippet">$120,000 - $150,000 a year</div>
    <div class="job-snippet">Lead roadmap planning with SQL and agile teams.</div>
    <span class="date">Posted 3 days ago</span>
  </div>
  <div data-jk="def456">
    <h2 class="jobTitle">Business Analyst</h2>
    <div class="companyLocation">Austin, TX</div>
    <div class="salaryText">$45 - $55 an hour</div>
    <div class="job-snippet">Hourly contract role.</div>
  </div>
  <div data-jk="empty"></div>
</div>
<a aria-label="Next Page" href="/jobs?start=10">Next</a>
`;

const LAST_PAGE = `
<div data-jk="ghi789">
  <h2 class="jobTitle">Operations Manager</h2>
  <span class="companyName">Globex</span>
</div>
`;

function response(data: string): AxiosResponse {
  return { data, status: 200, statusText: 'OK', headers: {}, config: { headers: new AxiosHeaders() } };
}

describe('buildSearchUrl', () => {
  it('encodes query, location, paging and filters', () => {
    expect(buildSearchUrl('Product Manager', { location: 'New York, NY', remoteOnly: true }, 1)).toBe(
      'https://www.indeed.com/jobs?q=Product+Manager&l=New+York%2C+NY&start=10&fromage=7&remotejob=1'
    );
  });

  it('omits absent filters', () => {
    expect(buildSearchUrl('Analyst', { datePostedDays: 3 })).toBe('https://www.indeed.com/jobs?q=Analyst&start=0&fromage=3');
  });
});

describe('parseSearchPage', () => {
  it('extracts job cards and skips cards without a title', () => {
    const { jobs, hasNextPage } = parseSearchPage(RESULTS_PAGE, NOW);

    expect(hasNextPage).toBe(true);
    expect(jobs).toHaveLength(2);
    expect(jobs[0]).toEqual({
      title: 'Senior Product Manager',
      companyName: 'Acme Corp',
      location: 'Remote',
      description: 'Lead roadmap planning with SQL and agile teams.',
      requirements: null,
      salaryMin: 120000,
      salaryMax: 150000,
      salaryCurrency: 'USD',
      salaryPeriod: 'annual',
      employmentType: null,
      experienceLevel: null,
      postedDate: new Date('2024-03-07T12:00:00Z'),
      sourcePlatform: 'indeed',
      sourceJobId: 'abc123',
      sourceUrl: 'https://www.indeed.com/viewjob?jk=abc123',
      skills: ['sql', 'agile'],
      isRemote: true,
      companyLogoUrl: null,
    });
    expect(jobs[1]).toMatchObject({
      title: 'Business Analyst',
      companyName: 'Unknown Company',
      location: 'Austin, TX',
      salaryMin: 45,
      salaryMax: 55,
      salaryPeriod: 'hourly',
      postedDate: null,
      skills: [],
      isRemote: false,
    });
  });

  it('reports the last page', () => {
    expect(parseSearchPage(LAST_PAGE, NOW).hasNextPage).toBe(false);
  });
});

describe('IndeedScraper', () => {
  it('follows pages until there is no next page', async () => {
    const http = axios.create();
    const get = vi
      .spyOn(http, 'get')
      .mockResolvedValueOnce(response(RESULTS_PAGE))
      .mockResolvedValueOnce(response(LAST_PAGE));
    const scraper = new IndeedScraper({ delayBetweenRequestsMs: 0 }, http, async () => {});

    const jobs = await scraper.searchJobs('Product Manager', { location: 'Remote' });

    expect(jobs.map((job) => job.title)).toEqual(['Senior Product Manager', 'Business Analyst', 'Operations Manager']);
    expect(get.mock.calls.map(([url]) => url)).toEqual([
      'https://www.indeed.com/jobs?q=Product+Manager&l=Remote&start=0&fromage=7',
      'https://www.indeed.com/jobs?q=Product+Manager&l=Remote&start=10&fromage=7',
    ]);
    expect(scraper.getStats()).toEqual({ requests: 2, errors: 0, jobsFound: 3 });
  });

  it('stops at maxPages', async () => {
    const http = axios.create();
    const get = vi.spyOn(http, 'get').mockResolvedValue(response(RESULTS_PAGE));
    const scraper = new IndeedScraper({ delayBetweenRequestsMs: 0 }, http, async () => {});

    const jobs = await scraper.searchJobs('Analyst', { maxPages: 2 });

    expect(get).toHaveBeenCalledTimes(2);
    expect(jobs).toHaveLength(4);
  });

  it('keeps earlier pages when a later page fails', async () => {
    const http = axios.create();
    vi.spyOn(http, 'get')
      .mockResolvedValueOnce(response(RESULTS_PAGE))
      .mockRejectedValue(new Error('socket hang up'));
    const scraper = new IndeedScraper({ delayBetweenRequestsMs: 0, maxRetries: 1 }, http, async () => {});

    const jobs = await scraper.searchJobs('Analyst');

    expect(jobs).toHaveLength(2);
  });

  it('fails when the first page cannot be fetched', async () => {
    const http = axios.create();
    vi.spyOn(http, 'get').mockRejectedValue(new Error('socket hang up'));
    const scraper = new IndeedScraper({ delayBetweenRequestsMs: 0, maxRetries: 1 }, http, async () => {});

    await expect(scraper.searchJobs('Analyst')).rejects.toThrow('indeed: request failed: socket hang up');
  });
});
