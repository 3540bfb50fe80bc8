/**
 * @fileoverview Output Validation Utilities
 *
 * zod validation of model output, with issues flattened to `path: message` lines.
 *
 * @packageDocumentation
 */

import { z } from 'zod';

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: string; details: string[] };

/** Accepts schemas whose input differs from their output (transforms, coercion). */
export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate JSON against a Zod schema
 */
export function validateJSON<T>(json: unknown, schema: Schema<T>): ValidationResult<T> {
  const parsed = schema.safeParse(json);
  if (parsed.success) {
    return { success: true, data: parsed.data };
  }
  return {
    success: false,
    error: 'Schema validation failed',
    details: formatZodIssues(parsed.error),
  };
}
