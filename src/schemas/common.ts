import { z } from 'zod';
import type { Page, PaginationParams } from '../core/types.js';

export const MAX_PAGE_SIZE = 100;
export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE = 1_000_000;

// Upper bound of a Postgres INTEGER column
export const MAX_INT = 2_147_483_647;

/**
 * Trimmed optional string - empty strings count as absent
 */
export const optionalText = (max = 255) =>
  z
    .string()
    .trim()
    .max(max)
    .optional()
    .transform((value) => (value ? value : undefined));

/**
 * Query-string boolean: true/false/1/0
 */
export const queryBoolean = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => (value === undefined ? undefined : value === 'true' || value === '1'));

/**
 * Repeated params or a comma-separated string → trimmed, non-empty items
 */
export const stringList = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((value) => {
    if (value === undefined) {
      return undefined;
    }
    const items = (Array.isArray(value) ? value : [value])
      .flatMap((item) => item.split(','))
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
    return items.length > 0 ? items : undefined;
  });

export const paginationShape = {
  page: z.coerce.number().int().min(1).max(MAX_PAGE).default(1),
  size: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE),
  sort_by: optionalText(50),
  sort_order: z.enum(['asc', 'desc']).default('desc'),
};

export const paginationSchema = z.object(paginationShape);

export function toPaginationParams(parsed: z.infer<typeof paginationSchema>): PaginationParams {
  return {
    page: parsed.page,
    size: parsed.size,
    sortBy: parsed.sort_by,
    sortOrder: parsed.sort_order,
  };
}

/**
 * offset/limit for a page: page N, size S → skip (N-1)*S, take S
 */
export function pageToOffset(pagination: Pick<PaginationParams, 'page' | 'size'>): { offset: number; limit: number } {
  return { offset: (pagination.page - 1) * pagination.size, limit: pagination.size };
}

export function buildPage<T>(items: T[], totalCount: number, pagination: Pick<PaginationParams, 'page' | 'size'>): Page<T> {
  const totalPages = totalCount === 0 ? 0 : Math.ceil(totalCount / pagination.size);
  return {
    items,
    totalCount,
    page: pagination.page,
    size: pagination.size,
    totalPages,
    hasNext: pagination.page < totalPages,
    hasPrevious: pagination.page > 1,
  };
}

export interface PageResponse<R> {
  items: R[];
  total_count: number;
  page: number;
  size: number;
  total_pages: number;
  has_next: boolean;
  has_previous: boolean;
}

export function toPageResponse<T, R>(page: Page<T>, mapItem: (item: T) => R): PageResponse<R> {
  return {
    items: page.items.map(mapItem),
    total_count: page.totalCount,
    page: page.page,
    size: page.size,
    total_pages: page.totalPages,
    has_next: page.hasNext,
    has_previous: page.hasPrevious,
  };
}

export const idParamSchema = z.coerce.number().int().positive().max(MAX_INT);

/**
 * Adds an issue when both bounds are present and min > max
 */
export function checkRange(
  min: number | null | undefined,
  max: number | null | undefined,
  ctx: z.RefinementCtx,
  field: string,
  message: string
): void {
  if (min !== null && min !== undefined && max !== null && max !== undefined && min > max) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: [field], message });
  }
}
