import type { z } from 'zod';
import { SweepError, type SweepErrorCode } from './errors.js';

/**
 * Parse a value against a schema, rethrowing failures as a SweepError
 * carrying the zod issues in its context.
 */
export function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  code: SweepErrorCode
): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const detail = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new SweepError(detail, code, { issues: result.error.issues });
  }
  return result.data;
}
