import { z } from 'zod';
import { fromZodError } from '../errors/error-handler.js';
import { ValidationError } from '../errors/application-errors.js';
import { idParamSchema } from '../schemas/common.js';

/**
 * Parse request input, turning zod failures into a 400 with field errors
 */
export function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown, message?: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw fromZodError(result.error, message);
  }
  return result.data;
}

export function parseId(raw: string | undefined, name = 'id'): number {
  const result = idParamSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(`Invalid ${name}: ${raw ?? ''}`, { [name]: ['Must be a positive integer'] });
  }
  return result.data;
}
