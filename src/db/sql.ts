import { ValidationError } from '../errors/application-errors.js';
import type { PaginationParams } from '../core/types.js';
import { pageToOffset } from '../schemas/common.js';

/**
 * Collects WHERE conditions and their positional parameters ($1, $2, ...).
 * Values are always bound, never interpolated into the SQL text.
 */
export class SqlBuilder {
  readonly params: unknown[] = [];
  private readonly conditions: string[] = [];

  param(value: unknown): string {
    this.params.push(value);
    return `$${this.params.length}`;
  }

  where(condition: string): this {
    this.conditions.push(condition);
    return this;
  }

  get conditionCount(): number {
    return this.conditions.length;
  }

  whereClause(): string {
    return this.conditions.length > 0 ? `WHERE ${this.conditions.join(' AND ')}` : '';
  }

  limitOffset(pagination: Pick<PaginationParams, 'page' | 'size'>): string {
    const { offset, limit } = pageToOffset(pagination);
    return `LIMIT ${this.param(limit)} OFFSET ${this.param(offset)}`;
  }
}

/**
 * Escape LIKE wildcards so user input matches literally
 */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

export function containsPattern(value: string): string {
  return `%${escapeLike(value)}%`;
}

export interface SortSpec {
  /** API sort key → SQL column */
  columns: Record<string, string>;
  defaultOrderBy: string;
  /** Appended to custom sorts so paging is stable */
  tiebreaker: string;
}

/**
 * ORDER BY for a whitelisted sort key. Unknown keys are rejected.
 */
export function buildOrderBy(pagination: Pick<PaginationParams, 'sortBy' | 'sortOrder'>, spec: SortSpec): string {
  if (!pagination.sortBy) {
    return `ORDER BY ${spec.defaultOrderBy}`;
  }

  const column = Object.prototype.hasOwnProperty.call(spec.columns, pagination.sortBy)
    ? spec.columns[pagination.sortBy]
    : undefined;
  if (!column) {
    throw new ValidationError(`Cannot sort by "${pagination.sortBy}"`, {
      sort_by: [`Must be one of: ${Object.keys(spec.columns).join(', ')}`],
    });
  }

  const direction = pagination.sortOrder === 'asc' ? 'ASC' : 'DESC';
  return `ORDER BY ${column} ${direction} NULLS LAST, ${spec.tiebreaker} ${direction}`;
}
