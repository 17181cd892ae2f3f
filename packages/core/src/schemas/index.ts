/**
 * Zod validation schemas for Sprint Garden
 *
 * Runtime validation for everything that crosses a process boundary:
 * provider payloads, API request bodies and persisted dreams.
 */

import { z } from 'zod';

import { ValidationError } from '../errors.js';

export * from './jira.js';
export * from './linear.js';
export * from './dream.js';

// ============================================================================
// Primitive Schemas
// ============================================================================

export const ProviderNameSchema = z.enum(['jira', 'linear']);

// ============================================================================
// Helpers
// ============================================================================

export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Parse input or throw a ValidationError listing every issue
 */
export function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  context: string
): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = formatZodIssues(result.error);
    throw new ValidationError(`Invalid ${context}: ${issues.join('; ')}`, issues);
  }
  return result.data;
}
