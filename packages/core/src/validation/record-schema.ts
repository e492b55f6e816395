import { z } from 'zod';
import { ValidationError, type FieldValidationError } from '../errors/tidesync-error.js';
import type { SyncRecord } from '../types/record.js';

/** Largest distance from the epoch a `Date` can hold, in ms */
export const MAX_TIMESTAMP_MS = 8.64e15;

/**
 * Zod schema for a record as callers hand it to the engine.
 */
export const recordSchema = z.object({
  id: z.string().min(1, 'id must not be empty'),
  version: z
    .number()
    .int('version must be an integer')
    .nonnegative('version must be >= 0')
    .safe('version must be a safe integer'),
  updatedAt: z
    .number()
    .int('updatedAt must be an integer timestamp')
    .min(-MAX_TIMESTAMP_MS, 'updatedAt is outside the Date range')
    .max(MAX_TIMESTAMP_MS, 'updatedAt is outside the Date range'),
  payload: z.record(z.string(), z.string()),
});

/**
 * Convert zod issues into field-level validation errors
 */
export function toFieldErrors(error: z.ZodError, prefix = ''): FieldValidationError[] {
  return error.issues.map((issue) => {
    const path = issue.path.map(String).join('.');
    return {
      path: prefix && path ? `${prefix}.${path}` : prefix || path || '(root)',
      message: issue.message,
    };
  });
}

/**
 * Validate an unknown value as a record.
 *
 * @throws ValidationError (TIDE_V100) listing every failing field
 */
export function parseRecord(value: unknown): SyncRecord {
  const result = recordSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(toFieldErrors(result.error));
  }
  return result.data;
}
