/**
 * Zod schemas for command-line option values.
 */

import { z, type ZodError } from 'zod';

const LIMIT_MESSAGE = 'Limit must be a non-negative integer.';

/**
 * Raw `--limit` text to a row count
 */
export const LimitSchema = z
  .string()
  .trim()
  .regex(/^\d+$/, LIMIT_MESSAGE)
  .transform(Number)
  .refine(Number.isSafeInteger, LIMIT_MESSAGE);

/**
 * Options object handed over by Commander for the inspect command
 */
export const InspectCommandOptionsSchema = z.object({
  verbose: z.boolean().optional(),
  json: z.boolean().optional(),
  table: z.string().min(1, 'Table name must not be empty.').optional(),
  limit: z.number().int().nonnegative().optional(),
  engineMarker: z.string().min(1, 'Engine marker must not be empty.').optional(),
});

/**
 * Join zod issues into one line, each prefixed with its option path
 */
export function formatIssues(error: ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
