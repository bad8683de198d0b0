/**
 * Schema pieces shared by the stored entity models.
 */

import { z } from 'zod';

/**
 * Stored id column: a positive integer written without leading zeros.
 */
export const idColumn = z
  .string()
  .regex(/^[1-9]\d*$/, 'must be a positive integer')
  .transform((value, ctx) => {
    const id = Number(value);
    if (!Number.isSafeInteger(id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `must not exceed ${Number.MAX_SAFE_INTEGER}`,
      });
      return z.NEVER;
    }
    return id;
  });

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * Check that a string has no unpaired UTF-16 surrogate, i.e. that it
 * survives encoding to UTF-8 unchanged.
 */
export function isWellFormed(value: string): boolean {
  return !LONE_SURROGATE.test(value);
}

/**
 * Free-text field stored as UTF-8.
 */
export const text = z.string().refine(isWellFormed, 'must be valid Unicode text');

/**
 * Flatten zod issues into one line.
 *
 * Numeric path heads (tuple positions of a raw row) are replaced by the
 * column name at that position.
 */
export function describeIssues(error: z.ZodError, columns: readonly string[] = []): string {
  return error.issues
    .map((issue) => {
      const [head, ...rest] = issue.path;
      const label =
        typeof head === 'number' && head < columns.length
          ? [columns[head], ...rest].join('.')
          : issue.path.join('.');
      return label ? `${label}: ${issue.message}` : issue.message;
    })
    .join('; ');
}
