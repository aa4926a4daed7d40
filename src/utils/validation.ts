import { z } from 'zod';
import { ValidationError } from './errors';

/** Largest value a Postgres `integer` / `serial` id column holds. */
export const MAX_ID = 2147483647;

/**
 * Parse a request body, reporting the first failing field as a ValidationError.
 */
export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const [issue] = result.error.issues;
    throw new ValidationError(issue ? issue.message : 'Invalid input');
  }
  return result.data;
}

/** True when `id` can name a stored row. */
export function isStorableId(id: number): boolean {
  return Number.isInteger(id) && id > 0 && id <= MAX_ID;
}

/** Positive integer path parameter, or null when the segment is not one. */
export function parseIdParam(raw: string): number | null {
  if (!/^\d+$/.test(raw)) return null;
  const id = Number(raw);
  return isStorableId(id) ? id : null;
}

/** Positive integer `limit`; any other value means "no limit". */
export function parseLimit(raw: unknown): number | undefined {
  if (typeof raw !== 'string' || !/^\d+$/.test(raw)) return undefined;
  const limit = Number(raw);
  return Number.isSafeInteger(limit) && limit > 0 ? limit : undefined;
}
