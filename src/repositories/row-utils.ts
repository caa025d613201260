import { ConflictError, DatabaseError } from '../errors/application-errors.js';
import type { NameCount } from '../core/types.js';

/**
 * Narrow a DB value to one of the allowed literals
 */
export function oneOf<T extends string>(allowed: readonly T[], value: unknown): T | null {
  return allowed.find((item) => item === value) ?? null;
}

export function toNumberOrNull(value: unknown): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toNameCounts(rows: Array<{ name: string | null; count: number }>): NameCount[] {
  return rows.filter((row) => row.name !== null).map((row) => ({ name: row.name ?? '', count: row.count }));
}

function pgErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Map driver errors to application errors. Unique violations become 409s.
 */
export function translateDbError(error: unknown, operation: string, conflictMessage = 'Resource already exists'): Error {
  const code = pgErrorCode(error);
  if (code === '23505') {
    return new ConflictError(conflictMessage);
  }
  if (code !== undefined && /^(08|57P)/.test(code)) {
    return new DatabaseError('Database connection lost', operation);
  }
  return error instanceof Error ? error : new DatabaseError(String(error), operation);
}
