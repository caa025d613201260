import type { QueryResultRow } from 'pg';
import type { Queryable } from '../db/client.js';
import { SqlBuilder, buildOrderBy, containsPattern, type SortSpec } from '../db/sql.js';
import { buildPage } from '../schemas/common.js';
import { logger } from '../utils/logger.js';
import {
  EMPLOYMENT_TYPES,
  SOURCE_PLATFORMS,
  type Job,
  type JobCreateInput,
  type JobSearchFilters,
  type JobStatistics,
  type JobUpdateInput,
  type Page,
  type PaginationParams,
} from '../core/types.js';
import { oneOf, toNameCounts, toNumberOrNull, translateDbError } from './row-utils.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface JobRow extends QueryResultRow {
  id: number;
  title: string;
  company_name: string;
  company_id: number | null;
  location: string | null;
  salary_min: number | null;
  salary_max: number | null;
  currency: string;
  description: string | null;
  requirements: string | null;
  job_level: string | null;
  employment_type: string | null;
  remote_friendly: boolean;
  posted_date: Date | null;
  expires_date: Date | null;
  source_url: string;
  source_platform: string;
  company_logo_url: string | null;
  ai_fit_score: number | null;
  ai_summary: string | null;
  extracted_skills: string[] | null;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
}

export function mapJobRow(row: JobRow): Job {
  return {
    id: row.id,
    title: row.title,
    companyName: row.company_name,
    companyId: row.company_id,
    location: row.location,
    salaryMin: toNumberOrNull(row.salary_min),
    salaryMax: toNumberOrNull(row.salary_max),
    currency: row.currency,
    description: row.description,
    requirements: row.requirements,
    jobLevel: row.job_level,
    employmentType: oneOf(EMPLOYMENT_TYPES, row.employment_type),
    remoteFriendly: row.remote_friendly,
    postedDate: row.posted_date,
    expiresDate: row.expires_date,
    sourceUrl: row.source_url,
    sourcePlatform: oneOf(SOURCE_PLATFORMS, row.source_platform) ?? 'manual',
    companyLogoUrl: row.company_logo_url,
    aiFitScore: toNumberOrNull(row.ai_fit_score),
    aiSummary: row.ai_summary,
    extractedSkills: row.extracted_skills ?? [],
    isActive: row.is_active,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export const JOB_SORT: SortSpec = {
  columns: {
    posted_date: 'posted_date',
    created_at: 'created_at',
    updated_at: 'updated_at',
    title: 'title',
    company_name: 'company_name',
    location: 'location',
    salary_min: 'salary_min',
    salary_max: 'salary_max',
    ai_fit_score: 'ai_fit_score',
  },
  defaultOrderBy: 'posted_date DESC NULLS LAST, id DESC',
  tiebreaker: 'id',
};

// Column order used by INSERT and partial UPDATE
const JOB_COLUMNS: Array<[keyof JobUpdateInput, string]> = [
  ['title', 'title'],
  ['companyName', 'company_name'],
  ['companyId', 'company_id'],
  ['location', 'location'],
  ['salaryMin', 'salary_min'],
  ['salaryMax', 'salary_max'],
  ['currency', 'currency'],
  ['description', 'description'],
  ['requirements', 'requirements'],
  ['jobLevel', 'job_level'],
  ['employmentType', 'employment_type'],
  ['remoteFriendly', 'remote_friendly'],
  ['postedDate', 'posted_date'],
  ['expiresDate', 'expires_date'],
  ['sourceUrl', 'source_url'],
  ['sourcePlatform', 'source_platform'],
  ['companyLogoUrl', 'company_logo_url'],
  ['aiFitScore', 'ai_fit_score'],
  ['aiSummary', 'ai_summary'],
  ['extractedSkills', 'extracted_skills'],
  ['isActive', 'is_active'],
];

/**
 * Translate search filters to conjunctive predicates over active jobs
 */
export function applyJobFilters(builder: SqlBuilder, filters: JobSearchFilters, now = new Date()): SqlBuilder {
  builder.where('is_active = TRUE');

  if (filters.query !== undefined) {
    const p = builder.param(containsPattern(filters.query));
    builder.where(`(title ILIKE ${p} OR company_name ILIKE ${p} OR description ILIKE ${p})`);
  }
  if (filters.location !== undefined) {
    builder.where(`location ILIKE ${builder.param(containsPattern(filters.location))}`);
  }
  if (filters.company !== undefined) {
    builder.where(`company_name ILIKE ${builder.param(containsPattern(filters.company))}`);
  }
  if (filters.companyExact !== undefined) {
    builder.where(`LOWER(company_name) = LOWER(${builder.param(filters.companyExact)})`);
  }
  if (filters.jobType !== undefined) {
    builder.where(`employment_type = ${builder.param(filters.jobType)}`);
  }
  if (filters.jobLevel !== undefined) {
    builder.where(`job_level ILIKE ${builder.param(containsPattern(filters.jobLevel))}`);
  }
  if (filters.sourcePlatform !== undefined) {
    builder.where(`source_platform = ${builder.param(filters.sourcePlatform)}`);
  }
  if (filters.salaryMin !== undefined) {
    const p = builder.param(filters.salaryMin);
    builder.where(`(salary_min >= ${p} OR salary_max >= ${p})`);
  }
  if (filters.salaryMax !== undefined) {
    const p = builder.param(filters.salaryMax);
    builder.where(`(salary_max <= ${p} OR salary_min <= ${p})`);
  }
  if (filters.isRemote !== undefined) {
    builder.where(`remote_friendly = ${builder.param(filters.isRemote)}`);
  }
  if (filters.hasSalary === true) {
    builder.where('(salary_min IS NOT NULL OR salary_max IS NOT NULL)');
  } else if (filters.hasSalary === false) {
    builder.where('(salary_min IS NULL AND salary_max IS NULL)');
  }
  if (filters.postedDaysAgo !== undefined) {
    const cutoff = new Date(now.getTime() - filters.postedDaysAgo * DAY_MS);
    builder.where(`posted_date >= ${builder.param(cutoff)}`);
  }
  for (const skill of filters.skills ?? []) {
    const pattern = builder.param(containsPattern(skill));
    const exact = builder.param(skill);
    builder.where(`(description ILIKE ${pattern} OR requirements ILIKE ${pattern} OR ${exact} = ANY(extracted_skills))`);
  }

  return builder;
}

export interface JobRepository {
  search(filters: JobSearchFilters, pagination: PaginationParams): Promise<Page<Job>>;
  findById(id: number): Promise<Job | null>;
  findBySourceUrl(sourceUrl: string): Promise<Job | null>;
  findActiveByTitleAndCompany(title: string, companyName: string): Promise<Job | null>;
  findWithoutAnalysis(limit: number): Promise<Job[]>;
  create(input: JobCreateInput): Promise<Job>;
  update(id: number, input: JobUpdateInput): Promise<Job | null>;
  softDelete(id: number): Promise<boolean>;
  deactivateOlderThan(cutoff: Date): Promise<number>;
  countCreatedSince(since: Date): Promise<number>;
  getStatistics(now?: Date): Promise<JobStatistics>;
}

export class PgJobRepository implements JobRepository {
  constructor(private readonly db: Queryable) {}

  async search(filters: JobSearchFilters, pagination: PaginationParams): Promise<Page<Job>> {
    const builder = applyJobFilters(new SqlBuilder(), filters);
    const where = builder.whereClause();
    const orderBy = buildOrderBy(pagination, JOB_SORT);

    const countResult = await this.db.query<{ count: number }>(
      `SELECT COUNT(*)::int AS count FROM jobs ${where}`,
      [...builder.params]
    );
    const total = countResult.rows[0]?.count ?? 0;

    const limitOffset = builder.limitOffset(pagination);
    const result = await this.db.query<JobRow>(`SELECT * FROM jobs ${where} ${orderBy} ${limitOffset}`, builder.params);

    logger.debug('JobRepo', `Search matched ${total} jobs`, { filters, page: pagination.page });
    return buildPage(result.rows.map(mapJobRow), total, pagination);
  }

  async findById(id: number): Promise<Job | null> {
    const result = await this.db.query<JobRow>('SELECT * FROM jobs WHERE id = $1', [id]);
    const row = result.rows[0];
    return row ? mapJobRow(row) : null;
  }

  async findBySourceUrl(sourceUrl: string): Promise<Job | null> {
    const result = await this.db.query<JobRow>('SELECT * FROM jobs WHERE source_url = $1', [sourceUrl]);
    const row = result.rows[0];
    return row ? mapJobRow(row) : null;
  }

  async findActiveByTitleAndCompany(title: string, companyName: string): Promise<Job | null> {
    const result = await this.db.query<JobRow>(
      `SELECT * FROM jobs
       WHERE is_active = TRUE AND LOWER(title) = LOWER($1) AND LOWER(company_name) = LOWER($2)
       LIMIT 1`,
      [title, companyName]
    );
    const row = result.rows[0];
    return row ? mapJobRow(row) : null;
  }

  async findWithoutAnalysis(limit: number): Promise<Job[]> {
    const result = await this.db.query<JobRow>(
      `SELECT j.* FROM jobs j
       WHERE j.is_active = TRUE
         AND NOT EXISTS (SELECT 1 FROM analyses a WHERE a.job_id = j.id AND a.analysis_type = 'job_match')
       ORDER BY j.created_at DESC
       LIMIT $1`,
      [limit]
    );
    return result.rows.map(mapJobRow);
  }

  async create(input: JobCreateInput): Promise<Job> {
    const builder = new SqlBuilder();
    const columns: string[] = [];
    const placeholders: string[] = [];
    const values: JobUpdateInput = input;
    for (const [key, column] of JOB_COLUMNS) {
      const value = values[key];
      if (value !== undefined) {
        columns.push(column);
        placeholders.push(builder.param(value));
      }
    }

    try {
      const result = await this.db.query<JobRow>(
        `INSERT INTO jobs (${columns.join(', ')}) VALUES (${placeholders.join(', ')}) RETURNING *`,
        builder.params
      );
      const row = result.rows[0];
      if (!row) {
        throw new Error('INSERT returned no row');
      }
      return mapJobRow(row);
    } catch (error) {
      throw translateDbError(error, 'jobs.create', `Job with source_url ${input.sourceUrl} already exists`);
    }
  }

  async update(id: number, input: JobUpdateInput): Promise<Job | null> {
    const builder = new SqlBuilder();
    const sets: string[] = [];
    for (const [key, column] of JOB_COLUMNS) {
      const value = input[key];
      if (value !== undefined) {
        sets.push(`${column} = ${builder.param(value)}`);
      }
    }
    if (sets.length === 0) {
      return this.findById(id);
    }
    sets.push('updated_at = NOW()');

    try {
      const result = await this.db.query<JobRow>(
        `UPDATE jobs SET ${sets.join(', ')} WHERE id = ${builder.param(id)} RETURNING *`,
        builder.params
      );
      const row = result.rows[0];
      return row ? mapJobRow(row) : null;
    } catch (error) {
      throw translateDbError(error, 'jobs.update', 'Another job already uses this source_url');
    }
  }

  async softDelete(id: number): Promise<boolean> {
    const result = await this.db.query(
      'UPDATE jobs SET is_active = FALSE, updated_at = NOW() WHERE id = $1 AND is_active = TRUE',
      [id]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async deactivateOlderThan(cutoff: Date): Promise<number> {
    const result = await this.db.query(
      `UPDATE jobs SET is_active = FALSE, updated_at = NOW()
       WHERE is_active = TRUE AND COALESCE(posted_date, created_at) < $1`,
      [cutoff]
    );
    return result.rowCount ?? 0;
  }

  async countCreatedSince(since: Date): Promise<number> {
    const result = await this.db.query<{ count: number }>(
      'SELECT COUNT(*)::int AS count FROM jobs WHERE created_at >= $1',
      [since]
    );
    return result.rows[0]?.count ?? 0;
  }

  async getStatistics(now = new Date()): Promise<JobStatistics> {
    const weekAgo = new Date(now.getTime() - 7 * DAY_MS);

    const totals = await this.db.query<{
      total_jobs: number;
      active_jobs: number;
      recent_jobs: number;
      jobs_with_salary: number;
      remote_jobs: number;
      average_salary_min: number | null;
      average_salary_max: number | null;
    }>(
      `SELECT
         COUNT(*)::int AS total_jobs,
         COUNT(*) FILTER (WHERE is_active)::int AS active_jobs,
         COUNT(*) FILTER (WHERE is_active AND posted_date >= $1)::int AS recent_jobs,
         COUNT(*) FILTER (WHERE is_active AND (salary_min IS NOT NULL OR salary_max IS NOT NULL))::int AS jobs_with_salary,
         COUNT(*) FILTER (WHERE is_active AND remote_friendly)::int AS remote_jobs,
         ROUND(AVG(salary_min) FILTER (WHERE is_active))::float8 AS average_salary_min,
         ROUND(AVG(salary_max) FILTER (WHERE is_active))::float8 AS average_salary_max
       FROM jobs`,
      [weekAgo]
    );

    const topCompanies = await this.db.query<{ name: string | null; count: number }>(
      `SELECT company_name AS name, COUNT(*)::int AS count FROM jobs
       WHERE is_active = TRUE
       GROUP BY company_name ORDER BY count DESC, name ASC LIMIT 10`
    );
    const topLocations = await this.db.query<{ name: string | null; count: number }>(
      `SELECT location AS name, COUNT(*)::int AS count FROM jobs
       WHERE is_active = TRUE AND location IS NOT NULL
       GROUP BY location ORDER BY count DESC, name ASC LIMIT 10`
    );

    const row = totals.rows[0];
    return {
      totalJobs: row?.total_jobs ?? 0,
      activeJobs: row?.active_jobs ?? 0,
      recentJobs: row?.recent_jobs ?? 0,
      jobsWithSalary: row?.jobs_with_salary ?? 0,
      remoteJobs: row?.remote_jobs ?? 0,
      averageSalaryMin: toNumberOrNull(row?.average_salary_min),
      averageSalaryMax: toNumberOrNull(row?.average_salary_max),
      topCompanies: toNameCounts(topCompanies.rows),
      topLocations: toNameCounts(topLocations.rows),
    };
  }
}
