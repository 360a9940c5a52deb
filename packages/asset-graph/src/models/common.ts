import { z } from 'zod';

const ISO_8601 = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

export const IsoDateSchema = z
  .string()
  .regex(ISO_8601, 'must be an ISO-8601 date')
  .refine(v => !Number.isNaN(Date.parse(v)), 'must be a valid calendar date');

/** Flatten zod issues into `path: message` strings. */
export function formatIssues(error: z.ZodError, fallbackPath: string): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : fallbackPath;
    return `${path}: ${issue.message}`;
  });
}
