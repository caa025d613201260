import { z } from 'zod';
import {
  COMPANY_SIZES,
  COMPANY_TYPES,
  type CompanyCreateInput,
  type CompanySearchFilters,
  type CompanyUpdateInput,
  type PaginationParams,
} from '../core/types.js';
import { MAX_INT, checkRange, optionalText, paginationShape, queryBoolean, stringList, toPaginationParams } from './common.js';

const MIN_FOUNDED_YEAR = 1800;

export const companySearchQuerySchema = z
  .object({
    ...paginationShape,
    query: optionalText(200),
    industry: optionalText(100),
    company_size: z.enum(COMPANY_SIZES).optional(),
    company_type: z.enum(COMPANY_TYPES).optional(),
    location: optionalText(),
    min_rating: z.coerce.number().min(0).max(5).optional(),
    is_hiring: queryBoolean,
    has_jobs: queryBoolean,
    founded_after: z.coerce.number().int().min(MIN_FOUNDED_YEAR).max(MAX_INT).optional(),
    founded_before: z.coerce.number().int().min(MIN_FOUNDED_YEAR).max(MAX_INT).optional(),
    tags: stringList,
  })
  .superRefine((value, ctx) =>
    checkRange(value.founded_after, value.founded_before, ctx, 'founded_before', 'founded_after must not be later than founded_before')
  );

export type CompanySearchQuery = z.infer<typeof companySearchQuerySchema>;

export function toCompanySearch(parsed: CompanySearchQuery): { filters: CompanySearchFilters; pagination: PaginationParams } {
  return {
    filters: {
      query: parsed.query,
      industry: parsed.industry,
      size: parsed.company_size,
      companyType: parsed.company_type,
      location: parsed.location,
      minRating: parsed.min_rating,
      isHiring: parsed.is_hiring,
      hasJobs: parsed.has_jobs,
      foundedAfter: parsed.founded_after,
      foundedBefore: parsed.founded_before,
      tags: parsed.tags,
    },
    pagination: toPaginationParams(parsed),
  };
}

const textList = z.array(z.string().trim().min(1).max(100)).max(100);

const companyFields = {
  name: z.string().trim().min(1).max(255),
  description: z.string().nullish(),
  website: z.string().trim().url().max(500).nullish(),
  industry: z.string().trim().max(100).nullish(),
  size: z.enum(COMPANY_SIZES).nullish(),
  company_type: z.enum(COMPANY_TYPES).nullish(),
  founded_year: z
    .number()
    .int()
    .min(MIN_FOUNDED_YEAR)
    .refine((year) => year <= new Date().getFullYear(), 'founded_year cannot be in the future')
    .nullish(),
  headquarters_location: z.string().trim().max(255).nullish(),
  headquarters_country: z.string().trim().max(100).nullish(),
  headquarters_state: z.string().trim().max(100).nullish(),
  headquarters_city: z.string().trim().max(100).nullish(),
  logo_url: z.string().trim().url().max(500).nullish(),
  linkedin_url: z.string().trim().url().max(500).nullish(),
  glassdoor_url: z.string().trim().url().max(500).nullish(),
  glassdoor_rating: z.number().min(0).max(5).nullish(),
  employee_count: z.number().int().min(0).max(MAX_INT).nullish(),
  tags: textList,
  benefits: textList,
  culture_keywords: textList,
  is_hiring: z.boolean(),
};

export const companyCreateSchema = z.object({
  ...companyFields,
  tags: companyFields.tags.default([]),
  benefits: companyFields.benefits.default([]),
  culture_keywords: companyFields.culture_keywords.default([]),
  is_hiring: companyFields.is_hiring.default(true),
});

export const companyUpdateSchema = z.object({ ...companyFields, is_active: z.boolean() }).partial();

export type CompanyCreateBody = z.infer<typeof companyCreateSchema>;
export type CompanyUpdateBody = z.infer<typeof companyUpdateSchema>;

export function toCompanyCreateInput(body: CompanyCreateBody): CompanyCreateInput {
  return {
    name: body.name,
    description: body.description ?? null,
    website: body.website ?? null,
    industry: body.industry ?? null,
    size: body.size ?? null,
    companyType: body.company_type ?? null,
    foundedYear: body.founded_year ?? null,
    headquartersLocation: body.headquarters_location ?? null,
    headquartersCountry: body.headquarters_country ?? null,
    headquartersState: body.headquarters_state ?? null,
    headquartersCity: body.headquarters_city ?? null,
    logoUrl: body.logo_url ?? null,
    linkedinUrl: body.linkedin_url ?? null,
    glassdoorUrl: body.glassdoor_url ?? null,
    glassdoorRating: body.glassdoor_rating ?? null,
    employeeCount: body.employee_count ?? null,
    tags: body.tags,
    benefits: body.benefits,
    cultureKeywords: body.culture_keywords,
    isHiring: body.is_hiring,
  };
}

export function toCompanyUpdateInput(body: CompanyUpdateBody): CompanyUpdateInput {
  return {
    name: body.name,
    description: body.description,
    website: body.website,
    industry: body.industry,
    size: body.size,
    companyType: body.company_type,
    foundedYear: body.founded_year,
    headquartersLocation: body.headquarters_location,
    headquartersCountry: body.headquarters_country,
    headquartersState: body.headquarters_state,
    headquartersCity: body.headquarters_city,
    logoUrl: body.logo_url,
    linkedinUrl: body.linkedin_url,
    glassdoorUrl: body.glassdoor_url,
    glassdoorRating: body.glassdoor_rating,
    employeeCount: body.employee_count,
    tags: body.tags,
    benefits: body.benefits,
    cultureKeywords: body.culture_keywords,
    isHiring: body.is_hiring,
    isActive: body.is_active,
  };
}
