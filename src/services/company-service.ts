import type {
  Company,
  CompanyCreateInput,
  CompanySearchFilters,
  CompanyStatistics,
  CompanyUpdateInput,
  Job,
  Page,
  PaginationParams,
} from '../core/types.js';
import { ConflictError, NotFoundError } from '../errors/application-errors.js';
import type { CompanyRepository } from '../repositories/company.js';
import type { JobRepository } from '../repositories/job.js';
import { invalidatePrefix } from '../cache/redis.js';
import { logger } from '../utils/logger.js';
import type { Invalidate } from './job-service.js';

export const COMPANIES_CACHE_PREFIX = 'companies';

export class CompanyService {
  constructor(
    private readonly companies: CompanyRepository,
    private readonly jobs: JobRepository,
    private readonly invalidate: Invalidate = invalidatePrefix
  ) {}

  search(filters: CompanySearchFilters, pagination: PaginationParams): Promise<Page<Company>> {
    return this.companies.search(filters, pagination);
  }

  async getById(id: number): Promise<Company> {
    const company = await this.companies.findById(id);
    if (!company) {
      throw new NotFoundError('Company', id);
    }
    return company;
  }

  getStatistics(): Promise<CompanyStatistics> {
    return this.companies.getStatistics();
  }

  /**
   * Active jobs posted under the company's exact name
   */
  async listJobs(id: number, pagination: PaginationParams): Promise<Page<Job>> {
    const company = await this.getById(id);
    return this.jobs.search({ companyExact: company.name }, pagination);
  }

  async create(input: CompanyCreateInput): Promise<Company> {
    const existing = await this.companies.findByName(input.name);
    if (existing) {
      throw new ConflictError(`Company "${input.name}" already exists`, { id: existing.id });
    }

    const company = await this.companies.create(input);
    logger.info('Companies', `Created company ${company.id}: ${company.name}`);
    await this.invalidate(COMPANIES_CACHE_PREFIX);
    return company;
  }

  async update(id: number, input: CompanyUpdateInput): Promise<Company> {
    if (input.name !== undefined) {
      const sameName = await this.companies.findByName(input.name);
      if (sameName && sameName.id !== id) {
        throw new ConflictError(`Company "${input.name}" already exists`, { id: sameName.id });
      }
    }

    const company = await this.companies.update(id, input);
    if (!company) {
      throw new NotFoundError('Company', id);
    }
    await this.invalidate(COMPANIES_CACHE_PREFIX);
    return company;
  }

  async delete(id: number): Promise<void> {
    const deleted = await this.companies.softDelete(id);
    if (!deleted) {
      throw new NotFoundError('Company', id);
    }
    logger.info('Companies', `Deactivated company ${id}`);
    await this.invalidate(COMPANIES_CACHE_PREFIX);
  }

  async refreshJobCounts(): Promise<number> {
    const updated = await this.companies.refreshJobCounts();
    if (updated > 0) {
      await this.invalidate(COMPANIES_CACHE_PREFIX);
    }
    return updated;
  }
}
