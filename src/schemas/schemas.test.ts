import { describe, it, expect } from 'vitest';
import type { z } from 'zod';
import { analysisCreateSchema, analysisListQuerySchema } from './analysis.js';
import { MAX_INT, MAX_PAGE, idParamSchema, paginationSchema } from './common.js';
import { companyCreateSchema, companySearchQuerySchema, toCompanySearch } from './company.js';
import { jobCreateSchema, jobSearchQuerySchema } from './job.js';

function failedFields<I, O>(result: z.SafeParseReturnType<I, O>): string[] {
  return result.success ? [] : [...new Set(result.error.issues.map((issue) => issue.path.join('.')))];
}

describe('pagination', () => {
  it('defaults to the first page of 20, newest first', () => {
    expect(paginationSchema.parse({})).toEqual({ page: 1, size: 20, sort_by: undefined, sort_order: 'desc' });
  });

  it('caps the page number', () => {
    expect(paginationSchema.parse({ page: String(MAX_PAGE), size: '100' })).toMatchObject({ page: 1_000_000, size: 100 });
    expect(failedFields(paginationSchema.safeParse({ page: '1000000000000000000' }))).toEqual(['page']);
    expect(failedFields(paginationSchema.safeParse({ page: '1e400' }))).toEqual(['page']);
  });
});

describe('integer bounds', () => {
  it('keeps ids inside the INTEGER range', () => {
    expect(idParamSchema.safeParse(String(MAX_INT)).success).toBe(true);
    expect(idParamSchema.safeParse('2147483648').success).toBe(false);
  });

  it('rejects fractional, oversized and infinite salary filters', () => {
    expect(jobSearchQuerySchema.parse({ salary_min: '2147483647' }).salary_min).toBe(2147483647);
    expect(failedFields(jobSearchQuerySchema.safeParse({ salary_min: '50000.5' }))).toEqual(['salary_min']);
    expect(failedFields(jobSearchQuerySchema.safeParse({ salary_max: '3000000000' }))).toEqual(['salary_max']);
    expect(failedFields(jobSearchQuerySchema.safeParse({ salary_min: '1e400' }))).toEqual(['salary_min']);
  });

  it('rejects oversized integers in job bodies', () => {
    const result = jobCreateSchema.safeParse({
      title: 'Engineer',
      company_name: 'Acme Corp',
      source_url: 'https://example.com/jobs/1',
      company_id: 2_147_483_648,
      salary_max: 2_147_483_648,
    });

    expect(failedFields(result)).toEqual(['company_id', 'salary_max']);
  });

  it('rejects oversized integers in company and analysis input', () => {
    expect(failedFields(companyCreateSchema.safeParse({ name: 'Acme Corp', employee_count: 3_000_000_000 }))).toEqual([
      'employee_count',
    ]);
    expect(failedFields(companySearchQuerySchema.safeParse({ founded_after: '1e400' }))).toEqual(['founded_after']);
    expect(failedFields(analysisCreateSchema.safeParse({ job_id: 2_147_483_648 }))).toEqual(['job_id']);
    expect(failedFields(analysisListQuerySchema.safeParse({ job_id: '2147483648' }))).toEqual(['job_id']);
  });
});

describe('company search query', () => {
  it('keeps the company size filter apart from the page size', () => {
    const { filters, pagination } = toCompanySearch(companySearchQuerySchema.parse({ company_size: 'startup', size: '10' }));

    expect(filters.size).toBe('startup');
    expect(pagination).toEqual({ page: 1, size: 10, sortBy: undefined, sortOrder: 'desc' });
  });

  it('defaults pagination when no params are given', () => {
    const { filters, pagination } = toCompanySearch(companySearchQuerySchema.parse({}));

    expect(filters.size).toBeUndefined();
    expect(pagination).toEqual({ page: 1, size: 20, sortBy: undefined, sortOrder: 'desc' });
  });

  it('treats a company size word as an invalid page size', () => {
    expect(failedFields(companySearchQuerySchema.safeParse({ size: 'startup' }))).toEqual(['size']);
  });
});
