import { describe, it, expect, vi } from 'vitest';
import type { JobCreateInput, ScrapedJob } from '../core/types.js';
import { ConflictError } from '../errors/application-errors.js';
import { fakeJobRepository, makeJob } from '../testing/fixtures.js';
import { JobIngestionService, toJobCreateInput } from './ingestion.js';

const DESCRIPTION = 'Build dashboards in SQL and Python for the growth analytics team every week.';

function scraped(overrides: Partial<ScrapedJob> = {}): ScrapedJob {
  return {
    title: 'Data Analyst',
    companyName: 'Acme Corp',
    location: 'sf',
    description: DESCRIPTION,
    requirements: null,
    salaryMin: 50,
    salaryMax: 60,
    salaryCurrency: 'USD',
    salaryPeriod: 'hourly',
    employmentType: 'Contract',
    experienceLevel: null,
    postedDate: null,
    sourcePlatform: 'indeed',
    sourceJobId: 'a1',
    sourceUrl: 'https://example.com/jobs/a1',
    skills: [],
    isRemote: false,
    companyLogoUrl: null,
    ...overrides,
  };
}

describe('toJobCreateInput', () => {
  it('normalizes location, annualizes salary and extracts skills', () => {
    expect(toJobCreateInput({ ...scraped(), sourceUrl: 'https://example.com/jobs/a1' })).toEqual({
      title: 'Data Analyst',
      companyName: 'Acme Corp',
      companyId: null,
      location: 'San Francisco',
      salaryMin: 104000,
      salaryMax: 124800,
      currency: 'USD',
      description: DESCRIPTION,
      requirements: null,
      jobLevel: null,
      employmentType: 'Contract',
      remoteFriendly: false,
      postedDate: null,
      expiresDate: null,
      sourceUrl: 'https://example.com/jobs/a1',
      sourcePlatform: 'indeed',
      companyLogoUrl: null,
      extractedSkills: ['python', 'sql'],
    });
  });

  it('marks remote locations as remote friendly', () => {
    const input = toJobCreateInput({ ...scraped({ location: 'wfh', salaryMin: null, salaryMax: null }), sourceUrl: 'https://example.com/jobs/a1' });

    expect(input.location).toBe('Remote');
    expect(input.remoteFriendly).toBe(true);
    expect(input.salaryMin).toBeNull();
  });
});

describe('JobIngestionService', () => {
  it('validates, deduplicates and inserts', async () => {
    const jobs = fakeJobRepository();
    const invalidate = vi.fn().mockResolvedValue(2);
    jobs.findBySourceUrl.mockImplementation(async (url: string) =>
      url === 'https://example.com/jobs/c3' ? makeJob({ sourceUrl: url }) : null
    );
    jobs.findActiveByTitleAndCompany.mockResolvedValue(null);
    jobs.create.mockImplementation(async (input: JobCreateInput) => {
      if (input.sourceUrl === 'https://example.com/jobs/d4') {
        throw new ConflictError(`Job with source_url ${input.sourceUrl} already exists`);
      }
      return makeJob({ id: 2, sourceUrl: input.sourceUrl });
    });

    const service = new JobIngestionService(jobs, invalidate);
    const result = await service.execute([
      scraped(),
      scraped({ sourceUrl: 'https://example.com/jobs/a1-copy' }),
      scraped({ title: 'Short description', description: 'Too short' }),
      scraped({ title: 'Marketing Manager', sourceUrl: null }),
      scraped({ title: 'Finance Manager', sourceUrl: 'https://example.com/jobs/c3' }),
      scraped({ title: 'Strategy Consultant', sourceUrl: 'https://example.com/jobs/d4' }),
    ]);

    expect(result).toEqual({ processed: 6, inserted: 1, duplicates: 3, invalid: 2 });
    expect(jobs.create).toHaveBeenCalledTimes(2);
    expect(jobs.create.mock.calls[0]?.[0]).toMatchObject({ sourceUrl: 'https://example.com/jobs/a1', salaryMin: 104000 });
    expect(invalidate).toHaveBeenCalledWith('jobs');
  });

  it('treats an active job with the same title and company as stored', async () => {
    const jobs = fakeJobRepository();
    jobs.findBySourceUrl.mockResolvedValue(null);
    jobs.findActiveByTitleAndCompany.mockResolvedValue(makeJob());
    const invalidate = vi.fn();

    const result = await new JobIngestionService(jobs, invalidate).execute([scraped()]);

    expect(result).toEqual({ processed: 1, inserted: 0, duplicates: 1, invalid: 0 });
    expect(jobs.findActiveByTitleAndCompany).toHaveBeenCalledWith('Data Analyst', 'Acme Corp');
    expect(jobs.create).not.toHaveBeenCalled();
    expect(invalidate).not.toHaveBeenCalled();
  });

  it('propagates unexpected insert failures', async () => {
    const jobs = fakeJobRepository();
    jobs.findBySourceUrl.mockResolvedValue(null);
    jobs.findActiveByTitleAndCompany.mockResolvedValue(null);
    jobs.create.mockRejectedValue(new Error('connection reset'));

    await expect(new JobIngestionService(jobs, vi.fn()).execute([scraped()])).rejects.toThrow('connection reset');
  });
});
