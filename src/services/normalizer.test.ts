import { describe, it, expect } from 'vitest';
import type { ScrapedJob } from '../core/types.js';
import { JobDeduplicator, NormalizerService, calculateRelevanceScore, validateJobData } from './normalizer.js';

const LONG_DESCRIPTION = 'Own the quarterly planning process and partner with finance on forecasting.';

function scrapedJob(overrides: Partial<ScrapedJob> = {}): ScrapedJob {
  return {
    title: 'Business Analyst',
    companyName: 'Acme Corp',
    location: 'Austin, TX',
    description: LONG_DESCRIPTION,
    requirements: null,
    salaryMin: null,
    salaryMax: null,
    salaryCurrency: 'USD',
    salaryPeriod: null,
    employmentType: null,
    experienceLevel: null,
    postedDate: null,
    sourcePlatform: 'indeed',
    sourceJobId: null,
    sourceUrl: 'https://example.com/jobs/1',
    skills: [],
    isRemote: false,
    companyLogoUrl: null,
    ...overrides,
  };
}

describe('JobDeduplicator', () => {
  it('ignores case and surrounding whitespace', () => {
    const dedup = new JobDeduplicator();

    expect(dedup.isDuplicate(scrapedJob())).toBe(false);
    expect(dedup.isDuplicate(scrapedJob({ title: '  business analyst ', companyName: 'ACME CORP' }))).toBe(true);
    expect(dedup.isDuplicate(scrapedJob({ location: 'Remote' }))).toBe(false);
    expect(dedup.getStats()).toEqual({ uniqueJobs: 2, totalProcessed: 3, duplicates: 1 });
  });

  it('starts over after reset', () => {
    const dedup = new JobDeduplicator();
    dedup.isDuplicate(scrapedJob());
    dedup.reset();

    expect(dedup.isDuplicate(scrapedJob())).toBe(false);
  });
});

describe('validateJobData', () => {
  it('accepts a complete job', () => {
    expect(validateJobData(scrapedJob())).toEqual({ valid: true });
  });

  it('rejects short titles', () => {
    expect(validateJobData(scrapedJob({ title: 'QA' }))).toEqual({
      valid: false,
      reason: 'title shorter than 3 characters',
    });
  });

  it('rejects a missing company', () => {
    expect(validateJobData(scrapedJob({ companyName: ' ' }))).toEqual({ valid: false, reason: 'missing company_name' });
  });

  it('rejects short descriptions', () => {
    expect(validateJobData(scrapedJob({ description: 'Too short' }))).toEqual({
      valid: false,
      reason: 'description shorter than 50 characters (9)',
    });
  });
});

describe('calculateRelevanceScore', () => {
  it('combines title, skills, salary and employer', () => {
    const score = calculateRelevanceScore({
      title: 'Senior Product Manager',
      companyName: 'Google',
      skills: ['Strategy', 'Leadership', 'SQL'],
      salaryMin: 130000,
    });
    expect(score).toBe(0.587);
  });

  it('gives unknown employers a small baseline', () => {
    expect(calculateRelevanceScore({ title: 'Nurse', companyName: 'Local Clinic', skills: [], salaryMin: null })).toBe(
      0.05
    );
  });
});

describe('NormalizerService', () => {
  it('cleans text and drops invalid and duplicate jobs', async () => {
    const service = new NormalizerService();

    const result = await service.execute([
      scrapedJob({ title: 'Business\u200B   Analyst ' }),
      scrapedJob({ sourceUrl: 'https://example.com/jobs/2' }),
      scrapedJob({ title: 'Ops Lead', description: 'short' }),
    ]);

    expect(result.invalid).toBe(1);
    expect(result.duplicates).toBe(1);
    expect(result.jobs).toHaveLength(1);
    expect(result.jobs[0]?.title).toBe('Business Analyst');
  });
});
