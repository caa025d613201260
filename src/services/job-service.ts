import type { IService } from '../core/interfaces.js';
import type {
  Job,
  JobCreateInput,
  JobSearchFilters,
  JobStatistics,
  JobUpdateInput,
  Page,
  PaginationParams,
} from '../core/types.js';
import { NotFoundError, ValidationError } from '../errors/application-errors.js';
import type { JobRepository } from '../repositories/job.js';
import { invalidatePrefix } from '../cache/redis.js';
import { extractSkills } from '../utils/skill-extractor.js';
import { logger } from '../utils/logger.js';

export const JOBS_CACHE_PREFIX = 'jobs';

export type Invalidate = (prefix: string) => Promise<number>;

export interface JobSearchInput {
  filters: JobSearchFilters;
  pagination: PaginationParams;
}

/**
 * JobService - job CRUD and search on top of the repository
 */
export class JobService implements IService<JobSearchInput, Page<Job>> {
  constructor(
    private readonly jobs: JobRepository,
    private readonly invalidate: Invalidate = invalidatePrefix
  ) {}

  async execute(input: JobSearchInput): Promise<Page<Job>> {
    return this.search(input.filters, input.pagination);
  }

  search(filters: JobSearchFilters, pagination: PaginationParams): Promise<Page<Job>> {
    return this.jobs.search(filters, pagination);
  }

  async getById(id: number): Promise<Job> {
    const job = await this.jobs.findById(id);
    if (!job) {
      throw new NotFoundError('Job', id);
    }
    return job;
  }

  getStatistics(): Promise<JobStatistics> {
    return this.jobs.getStatistics();
  }

  async create(input: JobCreateInput): Promise<Job> {
    const extractedSkills =
      input.extractedSkills.length > 0 ? input.extractedSkills : extractSkills(input.description, input.requirements);

    const job = await this.jobs.create({ ...input, extractedSkills });
    logger.info('Jobs', `Created job ${job.id}: ${job.title} @ ${job.companyName}`);
    await this.invalidate(JOBS_CACHE_PREFIX);
    return job;
  }

  async update(id: number, input: JobUpdateInput): Promise<Job> {
    if (input.salaryMin !== undefined || input.salaryMax !== undefined) {
      const existing = await this.getById(id);
      const salaryMin = input.salaryMin === undefined ? existing.salaryMin : input.salaryMin;
      const salaryMax = input.salaryMax === undefined ? existing.salaryMax : input.salaryMax;
      if (salaryMin !== null && salaryMax !== null && salaryMin > salaryMax) {
        throw new ValidationError('salary_min must be less than or equal to salary_max', {
          salary_max: ['salary_min must be less than or equal to salary_max'],
        });
      }
    }

    const job = await this.jobs.update(id, input);
    if (!job) {
      throw new NotFoundError('Job', id);
    }
    logger.info('Jobs', `Updated job ${id}`);
    await this.invalidate(JOBS_CACHE_PREFIX);
    return job;
  }

  async delete(id: number): Promise<void> {
    const deleted = await this.jobs.softDelete(id);
    if (!deleted) {
      throw new NotFoundError('Job', id);
    }
    logger.info('Jobs', `Deactivated job ${id}`);
    await this.invalidate(JOBS_CACHE_PREFIX);
  }
}
