import type { QueryResultRow } from 'pg';
import type { Queryable } from '../db/client.js';
import { SqlBuilder, buildOrderBy, containsPattern, type SortSpec } from '../db/sql.js';
import { buildPage } from '../schemas/common.js';
import {
  COMPANY_SIZES,
  COMPANY_TYPES,
  type Company,
  type CompanyCreateInput,
  type CompanySearchFilters,
  type CompanyStatistics,
  type CompanyUpdateInput,
  type Page,
  type PaginationParams,
} from '../core/types.js';
import { oneOf, toNameCounts, toNumberOrNull, translateDbError } from './row-utils.js';

export interface CompanyRow extends QueryResultRow {
  id: number;
  name: string;
  description: string | null;
  website: string | null;
  industry: string | null;
  size: string | null;
  company_type: string | null;
  founded_year: number | null;
  headquarters_location: string | null;
  headquarters_country: string | null;
  headquarters_state: string | null;
  headquarters_city: string | null;
  logo_url: string | null;
  linkedin_url: string | null;
  glassdoor_url: string | null;
  glassdoor_rating: number | null;
  employee_count: number | null;
  tags: string[] | null;
  benefits: string[] | null;
  culture_keywords: string[] | null;
  is_active: boolean;
  is_hiring: boolean;
  job_count: number;
  created_at: Date;
  updated_at: Date;
}

export function mapCompanyRow(row: CompanyRow): Company {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    website: row.website,
    industry: row.industry,
    size: oneOf(COMPANY_SIZES, row.size),
    companyType: oneOf(COMPANY_TYPES, row.company_type),
    foundedYear: row.founded_year,
    headquartersLocation: row.headquarters_location,
    headquartersCountry: row.headquarters_country,
    headquartersState: row.headquarters_state,
    headquartersCity: row.headquarters_city,
    logoUrl: row.logo_url,
    linkedinUrl: row.linkedin_url,
    glassdoorUrl: row.glassdoor_url,
    glassdoorRating: toNumberOrNull(row.glassdoor_rating),
    employeeCount: row.employee_count,
    tags: row.tags ?? [],
    benefits: row.benefits ?? [],
    cultureKeywords: row.culture_keywords ?? [],
    isActive: row.is_active,
    isHiring: row.is_hiring,
    jobCount: row.job_count,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export const COMPANY_SORT: SortSpec = {
  columns: {
    name: 'name',
    job_count: 'job_count',
    glassdoor_rating: 'glassdoor_rating',
    founded_year: 'founded_year',
    employee_count: 'employee_count',
    created_at: 'created_at',
    updated_at: 'updated_at',
  },
  defaultOrderBy: 'job_count DESC, glassdoor_rating DESC NULLS LAST, name ASC',
  tiebreaker: 'id',
};

const COMPANY_COLUMNS: Array<[keyof CompanyUpdateInput, string]> = [
  ['name', 'name'],
  ['description', 'description'],
  ['website', 'website'],
  ['industry', 'industry'],
  ['size', 'size'],
  ['companyType', 'company_type'],
  ['foundedYear', 'founded_year'],
  ['headquartersLocation', 'headquarters_location'],
  ['headquartersCountry', 'headquarters_country'],
  ['headquartersState', 'headquarters_state'],
  ['headquartersCity', 'headquarters_city'],
  ['logoUrl', 'logo_url'],
  ['linkedinUrl', 'linkedin_url'],
  ['glassdoorUrl', 'glassdoor_url'],
  ['glassdoorRating', 'glassdoor_rating'],
  ['employeeCount', 'employee_count'],
  ['tags', 'tags'],
  ['benefits', 'benefits'],
  ['cultureKeywords', 'culture_keywords'],
  ['isActive', 'is_active'],
  ['isHiring', 'is_hiring'],
];

export function applyCompanyFilters(builder: SqlBuilder, filters: CompanySearchFilters): SqlBuilder {
  builder.where('is_active = TRUE');

  if (filters.query !== undefined) {
    const p = builder.param(containsPattern(filters.query));
    builder.where(`(name ILIKE ${p} OR description ILIKE ${p})`);
  }
  if (filters.industry !== undefined) {
    builder.where(`industry ILIKE ${builder.param(containsPattern(filters.industry))}`);
  }
  if (filters.size !== undefined) {
    builder.where(`size = ${builder.param(filters.size)}`);
  }
  if (filters.companyType !== undefined) {
    builder.where(`company_type = ${builder.param(filters.companyType)}`);
  }
  if (filters.location !== undefined) {
    const p = builder.param(containsPattern(filters.location));
    builder.where(
      `(headquarters_location ILIKE ${p} OR headquarters_city ILIKE ${p} OR headquarters_state ILIKE ${p} OR headquarters_country ILIKE ${p})`
    );
  }
  if (filters.minRating !== undefined) {
    builder.where(`glassdoor_rating >= ${builder.param(filters.minRating)}`);
  }
  if (filters.isHiring !== undefined) {
    builder.where(`is_hiring = ${builder.param(filters.isHiring)}`);
  }
  if (filters.hasJobs === true) {
    builder.where('job_count > 0');
  } else if (filters.hasJobs === false) {
    builder.where('job_count = 0');
  }
  if (filters.foundedAfter !== undefined) {
    builder.where(`founded_year >= ${builder.param(filters.foundedAfter)}`);
  }
  if (filters.foundedBefore !== undefined) {
    builder.where(`founded_year <= ${builder.param(filters.foundedBefore)}`);
  }
  if (filters.tags !== undefined && filters.tags.length > 0) {
    builder.where(`tags @> ${builder.param(filters.tags)}::text[]`);
  }

  return builder;
}

export interface CompanyRepository {
  search(filters: CompanySearchFilters, pagination: PaginationParams): Promise<Page<Company>>;
  findById(id: number): Promise<Company | null>;
  findByName(name: string): Promise<Company | null>;
  create(input: CompanyCreateInput): Promise<Company>;
  update(id: number, input: CompanyUpdateInput): Promise<Company | null>;
  softDelete(id: number): Promise<boolean>;
  refreshJobCounts(): Promise<number>;
  getStatistics(): Promise<CompanyStatistics>;
}

export class PgCompanyRepository implements CompanyRepository {
  constructor(private readonly db: Queryable) {}

  async search(filters: CompanySearchFilters, pagination: PaginationParams): Promise<Page<Company>> {
    const builder = applyCompanyFilters(new SqlBuilder(), filters);
    const where = builder.whereClause();
    const orderBy = buildOrderBy(pagination, COMPANY_SORT);

    const countResult = await this.db.query<{ count: number }>(
      `SELECT COUNT(*)::int AS count FROM companies ${where}`,
      [...builder.params]
    );
    const total = countResult.rows[0]?.count ?? 0;

    const limitOffset = builder.limitOffset(pagination);
    const result = await this.db.query<CompanyRow>(
      `SELECT * FROM companies ${where} ${orderBy} ${limitOffset}`,
      builder.params
    );
    return buildPage(result.rows.map(mapCompanyRow), total, pagination);
  }

  async findById(id: number): Promise<Company | null> {
    const result = await this.db.query<CompanyRow>('SELECT * FROM companies WHERE id = $1', [id]);
    const row = result.rows[0];
    return row ? mapCompanyRow(row) : null;
  }

  async findByName(name: string): Promise<Company | null> {
    const result = await this.db.query<CompanyRow>('SELECT * FROM companies WHERE LOWER(name) = LOWER($1) LIMIT 1', [
      name,
    ]);
    const row = result.rows[0];
    return row ? mapCompanyRow(row) : null;
  }

  async create(input: CompanyCreateInput): Promise<Company> {
    const builder = new SqlBuilder();
    const columns: string[] = [];
    const placeholders: string[] = [];
    const values: CompanyUpdateInput = input;
    for (const [key, column] of COMPANY_COLUMNS) {
      const value = values[key];
      if (value !== undefined) {
        columns.push(column);
        placeholders.push(builder.param(value));
      }
    }

    try {
      const result = await this.db.query<CompanyRow>(
        `INSERT INTO companies (${columns.join(', ')}) VALUES (${placeholders.join(', ')}) RETURNING *`,
        builder.params
      );
      const row = result.rows[0];
      if (!row) {
        throw new Error('INSERT returned no row');
      }
      return mapCompanyRow(row);
    } catch (error) {
      throw translateDbError(error, 'companies.create', `Company "${input.name}" already exists`);
    }
  }

  async update(id: number, input: CompanyUpdateInput): Promise<Company | null> {
    const builder = new SqlBuilder();
    const sets: string[] = [];
    for (const [key, column] of COMPANY_COLUMNS) {
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
      const result = await this.db.query<CompanyRow>(
        `UPDATE companies SET ${sets.join(', ')} WHERE id = ${builder.param(id)} RETURNING *`,
        builder.params
      );
      const row = result.rows[0];
      return row ? mapCompanyRow(row) : null;
    } catch (error) {
      throw translateDbError(error, 'companies.update', `Company "${input.name ?? ''}" already exists`);
    }
  }

  async softDelete(id: number): Promise<boolean> {
    const result = await this.db.query(
      'UPDATE companies SET is_active = FALSE, updated_at = NOW() WHERE id = $1 AND is_active = TRUE',
      [id]
    );
    return (result.rowCount ?? 0) > 0;
  }

  /**
   * Recompute job_count from active jobs, matched by company_id or by name
   */
  async refreshJobCounts(): Promise<number> {
    const result = await this.db.query(
      `UPDATE companies c SET job_count = sub.count, updated_at = NOW()
       FROM (
         SELECT c2.id, COUNT(j.id)::int AS count
         FROM companies c2
         LEFT JOIN jobs j ON j.is_active = TRUE
           AND (j.company_id = c2.id OR (j.company_id IS NULL AND LOWER(j.company_name) = LOWER(c2.name)))
         GROUP BY c2.id
       ) sub
       WHERE c.id = sub.id AND c.job_count <> sub.count`
    );
    return result.rowCount ?? 0;
  }

  async getStatistics(): Promise<CompanyStatistics> {
    const totals = await this.db.query<{
      total_companies: number;
      active_companies: number;
      hiring_companies: number;
      well_rated_companies: number;
    }>(
      `SELECT
         COUNT(*)::int AS total_companies,
         COUNT(*) FILTER (WHERE is_active)::int AS active_companies,
         COUNT(*) FILTER (WHERE is_active AND is_hiring)::int AS hiring_companies,
         COUNT(*) FILTER (WHERE is_active AND glassdoor_rating >= 4.0)::int AS well_rated_companies
       FROM companies`
    );
    const industries = await this.db.query<{ name: string | null; count: number }>(
      `SELECT industry AS name, COUNT(*)::int AS count FROM companies
       WHERE is_active = TRUE AND industry IS NOT NULL
       GROUP BY industry ORDER BY count DESC, name ASC LIMIT 10`
    );
    const countries = await this.db.query<{ name: string | null; count: number }>(
      `SELECT headquarters_country AS name, COUNT(*)::int AS count FROM companies
       WHERE is_active = TRUE AND headquarters_country IS NOT NULL
       GROUP BY headquarters_country ORDER BY count DESC, name ASC LIMIT 10`
    );
    const sizes = await this.db.query<{ name: string | null; count: number }>(
      `SELECT size AS name, COUNT(*)::int AS count FROM companies
       WHERE is_active = TRUE AND size IS NOT NULL
       GROUP BY size`
    );

    const sizeDistribution: Record<string, number> = {};
    for (const { name, count } of toNameCounts(sizes.rows)) {
      sizeDistribution[name] = count;
    }

    const row = totals.rows[0];
    return {
      totalCompanies: row?.total_companies ?? 0,
      activeCompanies: row?.active_companies ?? 0,
      hiringCompanies: row?.hiring_companies ?? 0,
      wellRatedCompanies: row?.well_rated_companies ?? 0,
      topIndustries: toNameCounts(industries.rows),
      topCountries: toNameCounts(countries.rows),
      sizeDistribution,
    };
  }
}
