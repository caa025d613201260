import type { IService } from '../core/interfaces.js';
import type { IngestionResult, JobCreateInput, ScrapedJob } from '../core/types.js';
import { ConflictError } from '../errors/application-errors.js';
import { invalidatePrefix } from '../cache/redis.js';
import type { JobRepository } from '../repositories/job.js';
import { normalizeLocation } from '../utils/location-normalizer.js';
import { logger } from '../utils/logger.js';
import { annualizeSalary } from '../utils/salary-parser.js';
import { extractSkills } from '../utils/skill-extractor.js';
import { JOBS_CACHE_PREFIX, type Invalidate } from './job-service.js';
import { NormalizerService } from './normalizer.js';

type IngestionRepository = Pick<JobRepository, 'findBySourceUrl' | 'findActiveByTitleAndCompany' | 'create'>;

/**
 * Scraped job → insert input. Salaries are stored as yearly figures.
 */
export function toJobCreateInput(job: ScrapedJob & { sourceUrl: string }): JobCreateInput {
  const annual = (amount: number | null) => (amount === null ? null : annualizeSalary(amount, job.salaryPeriod));
  const location = normalizeLocation(job.location);

  return {
    title: job.title,
    companyName: job.companyName,
    companyId: null,
    location,
    salaryMin: annual(job.salaryMin),
    salaryMax: annual(job.salaryMax),
    currency: job.salaryCurrency,
    description: job.description,
    requirements: job.requirements,
    jobLevel: job.experienceLevel,
    employmentType: job.employmentType,
    remoteFriendly: job.isRemote || location === 'Remote',
    postedDate: job.postedDate,
    expiresDate: null,
    sourceUrl: job.sourceUrl,
    sourcePlatform: job.sourcePlatform,
    companyLogoUrl: job.companyLogoUrl,
    extractedSkills: job.skills.length > 0 ? job.skills : extractSkills(job.description, job.requirements),
  };
}

function hasSourceUrl(job: ScrapedJob): job is ScrapedJob & { sourceUrl: string } {
  return job.sourceUrl !== null && job.sourceUrl.length > 0;
}

/**
 * JobIngestionService - validates, deduplicates and stores scraped jobs
 */
export class JobIngestionService implements IService<ScrapedJob[], IngestionResult> {
  constructor(
    private readonly jobs: IngestionRepository,
    private readonly invalidate: Invalidate = invalidatePrefix,
    private readonly normalizer = new NormalizerService()
  ) {}

  async execute(scraped: ScrapedJob[]): Promise<IngestionResult> {
    const { jobs, invalid, duplicates } = await this.normalizer.execute(scraped);
    const result: IngestionResult = { processed: scraped.length, inserted: 0, duplicates, invalid };

    for (const job of jobs) {
      if (!hasSourceUrl(job)) {
        logger.debug('Ingestion', `Skipping "${job.title}": no source URL`);
        result.invalid++;
        continue;
      }
      if (await this.isStored(job)) {
        result.duplicates++;
        continue;
      }

      try {
        await this.jobs.create(toJobCreateInput(job));
        result.inserted++;
      } catch (error) {
        // Inserted concurrently by another run
        if (error instanceof ConflictError) {
          result.duplicates++;
          continue;
        }
        throw error;
      }
    }

    if (result.inserted > 0) {
      await this.invalidate(JOBS_CACHE_PREFIX);
    }
    logger.info(
      'Ingestion',
      `Processed ${result.processed}: ${result.inserted} inserted, ${result.duplicates} duplicates, ${result.invalid} invalid`
    );
    return result;
  }

  private async isStored(job: ScrapedJob & { sourceUrl: string }): Promise<boolean> {
    if (await this.jobs.findBySourceUrl(job.sourceUrl)) {
      return true;
    }
    return (await this.jobs.findActiveByTitleAndCompany(job.title, job.companyName)) !== null;
  }
}
