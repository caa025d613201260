import { z } from 'zod';
import {
  EMPLOYMENT_TYPES,
  SOURCE_PLATFORMS,
  type JobCreateInput,
  type JobSearchFilters,
  type JobUpdateInput,
  type PaginationParams,
} from '../core/types.js';
import { MAX_INT, checkRange, optionalText, paginationShape, queryBoolean, stringList, toPaginationParams } from './common.js';

const SALARY_RANGE_MESSAGE = 'salary_min must be less than or equal to salary_max';

// ----------------------------------------------------------------------------
// Query: list & search
// ----------------------------------------------------------------------------

export const jobSearchQuerySchema = z
  .object({
    ...paginationShape,
    query: optionalText(200),
    location: optionalText(),
    company: optionalText(),
    job_type: z.enum(EMPLOYMENT_TYPES).optional(),
    job_level: optionalText(50),
    source_platform: z.enum(SOURCE_PLATFORMS).optional(),
    salary_min: z.coerce.number().int().min(0, 'salary_min must be non-negative').max(MAX_INT).optional(),
    salary_max: z.coerce.number().int().min(0, 'salary_max must be non-negative').max(MAX_INT).optional(),
    is_remote: queryBoolean,
    has_salary: queryBoolean,
    posted_days_ago: z.coerce.number().int().min(1).max(365).optional(),
    skills: stringList,
  })
  .superRefine((value, ctx) => checkRange(value.salary_min, value.salary_max, ctx, 'salary_max', SALARY_RANGE_MESSAGE));

export type JobSearchQuery = z.infer<typeof jobSearchQuerySchema>;

export function toJobSearch(parsed: JobSearchQuery): { filters: JobSearchFilters; pagination: PaginationParams } {
  return {
    filters: {
      query: parsed.query,
      location: parsed.location,
      company: parsed.company,
      jobType: parsed.job_type,
      jobLevel: parsed.job_level,
      sourcePlatform: parsed.source_platform,
      salaryMin: parsed.salary_min,
      salaryMax: parsed.salary_max,
      isRemote: parsed.is_remote,
      hasSalary: parsed.has_salary,
      postedDaysAgo: parsed.posted_days_ago,
      skills: parsed.skills,
    },
    pagination: toPaginationParams(parsed),
  };
}

// ----------------------------------------------------------------------------
// Body: create & update
// ----------------------------------------------------------------------------

const jobFields = {
  title: z.string().trim().min(1).max(255),
  company_name: z.string().trim().min(1).max(255),
  company_id: z.number().int().positive().max(MAX_INT).nullish(),
  location: z.string().trim().max(255).nullish(),
  salary_min: z.number().int().min(0).max(MAX_INT).nullish(),
  salary_max: z.number().int().min(0).max(MAX_INT).nullish(),
  currency: z.string().trim().length(3).toUpperCase(),
  description: z.string().nullish(),
  requirements: z.string().nullish(),
  job_level: z.string().trim().max(50).nullish(),
  employment_type: z.enum(EMPLOYMENT_TYPES).nullish(),
  remote_friendly: z.boolean(),
  posted_date: z.coerce.date().nullish(),
  expires_date: z.coerce.date().nullish(),
  source_url: z.string().trim().url().max(1000),
  source_platform: z.enum(SOURCE_PLATFORMS),
  company_logo_url: z.string().trim().url().max(1000).nullish(),
  extracted_skills: z.array(z.string().trim().min(1).max(100)).max(100),
};

export const jobCreateSchema = z
  .object({
    ...jobFields,
    currency: jobFields.currency.default('USD'),
    remote_friendly: jobFields.remote_friendly.default(false),
    source_platform: jobFields.source_platform.default('manual'),
    extracted_skills: jobFields.extracted_skills.optional(),
  })
  .superRefine((value, ctx) => checkRange(value.salary_min, value.salary_max, ctx, 'salary_max', SALARY_RANGE_MESSAGE));

export const jobUpdateSchema = z
  .object({ ...jobFields, is_active: z.boolean() })
  .partial()
  .superRefine((value, ctx) => checkRange(value.salary_min, value.salary_max, ctx, 'salary_max', SALARY_RANGE_MESSAGE));

export type JobCreateBody = z.infer<typeof jobCreateSchema>;
export type JobUpdateBody = z.infer<typeof jobUpdateSchema>;

/**
 * Skills are left empty here; the service extracts them when the body has none
 */
export function toJobCreateInput(body: JobCreateBody): JobCreateInput {
  return {
    title: body.title,
    companyName: body.company_name,
    companyId: body.company_id ?? null,
    location: body.location ?? null,
    salaryMin: body.salary_min ?? null,
    salaryMax: body.salary_max ?? null,
    currency: body.currency,
    description: body.description ?? null,
    requirements: body.requirements ?? null,
    jobLevel: body.job_level ?? null,
    employmentType: body.employment_type ?? null,
    remoteFriendly: body.remote_friendly,
    postedDate: body.posted_date ?? null,
    expiresDate: body.expires_date ?? null,
    sourceUrl: body.source_url,
    sourcePlatform: body.source_platform,
    companyLogoUrl: body.company_logo_url ?? null,
    extractedSkills: body.extracted_skills ?? [],
  };
}

/**
 * Only keys present in the body end up defined
 */
export function toJobUpdateInput(body: JobUpdateBody): JobUpdateInput {
  return {
    title: body.title,
    companyName: body.company_name,
    companyId: body.company_id,
    location: body.location,
    salaryMin: body.salary_min,
    salaryMax: body.salary_max,
    currency: body.currency,
    description: body.description,
    requirements: body.requirements,
    jobLevel: body.job_level,
    employmentType: body.employment_type,
    remoteFriendly: body.remote_friendly,
    postedDate: body.posted_date,
    expiresDate: body.expires_date,
    sourceUrl: body.source_url,
    sourcePlatform: body.source_platform,
    companyLogoUrl: body.company_logo_url,
    extractedSkills: body.extracted_skills,
    isActive: body.is_active,
  };
}
