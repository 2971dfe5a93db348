import { z } from 'zod';
import { fromZodError, ValidationError } from '../middleware/errorHandler';
import { idParamSchema } from '../validation/catalog.schemas';

/**
 * Utility to safely extract string param from Express request params
 */
export function getStringParam(param: string | string[] | undefined): string {
  return (Array.isArray(param) ? param[0] : param) ?? '';
}

/** First value of a query string parameter, or undefined. */
export function getQueryString(value: unknown): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  return typeof first === 'string' ? first : undefined;
}

export function getIdParam(param: string | string[] | undefined, name = 'id'): number {
  const parsed = idParamSchema.safeParse(getStringParam(param));
  if (!parsed.success) {
    throw new ValidationError(`Invalid ${name}`, 400, name);
  }
  return parsed.data;
}

/** Parses request input, turning the first zod issue into a field-scoped ValidationError. */
export function parseInput<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw fromZodError(parsed.error);
  }
  return parsed.data;
}
