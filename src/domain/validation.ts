/**
 * rental-repairs-core - Input Validation
 *
 * Aggregates and application services validate command input with the same
 * zod schemas, so malformed input is rejected before anything is mutated.
 */

import { z } from 'zod';
import { ValidationException } from './exceptions';

/**
 * Convert zod issues into a field → messages record.
 * Root-level issues are keyed by `_`.
 */
export function collectIssues(error: z.ZodError): Record<string, string[]> {
  const errors: Record<string, string[]> = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join('.') : '_';
    (errors[key] ??= []).push(issue.message);
  }
  return errors;
}

/**
 * Parse `input` with `schema` or throw a ValidationException.
 *
 * @example
 * ```typescript
 * const input = validateInput(RegisterWorkerSchema, raw, 'Invalid worker registration');
 * ```
 */
export function validateInput<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  input: unknown,
  message: string = 'Validation Failed',
): z.output<TSchema> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationException(message, collectIssues(result.error));
  }
  return result.data;
}

/** Shared field schemas */
export const EmailSchema = z.string().trim().toLowerCase().email('must be a valid email address');

export const IdentifierSchema = z.string().trim().min(1, 'is required');

export const NonEmptyTextSchema = (max: number) =>
  z.string().trim().min(1, 'cannot be empty').max(max, `must be at most ${max} characters`);
