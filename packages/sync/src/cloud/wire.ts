import { MAX_TIMESTAMP_MS, ValidationError, toFieldErrors, type SyncRecord } from '@tidesync/core';
import { z } from 'zod';

/**
 * Record as carried on the wire. `updatedAt` goes out as ISO-8601 and is
 * accepted back as ISO-8601 or epoch milliseconds.
 */
export interface WireRecord {
  id: string;
  version: number;
  updatedAt: string | number;
  payload: Record<string, string>;
}

const timestampSchema = z.union([
  z.number().int().min(-MAX_TIMESTAMP_MS).max(MAX_TIMESTAMP_MS),
  z
    .string()
    .datetime({ offset: true })
    .transform((value) => Date.parse(value)),
]);

export const wireRecordSchema = z.object({
  id: z.string().min(1),
  version: z.number().int().nonnegative().safe(),
  updatedAt: timestampSchema,
  payload: z.record(z.string(), z.string()),
});

export const uploadResponseSchema = z.object({
  acceptedIds: z.array(z.string()),
});

export const downloadResponseSchema = z.object({
  records: z.array(wireRecordSchema),
});

/**
 * Encode a record for an upload request body
 */
export function toWireRecord(record: SyncRecord): WireRecord {
  return {
    id: record.id,
    version: record.version,
    updatedAt: new Date(record.updatedAt).toISOString(),
    payload: { ...record.payload },
  };
}

/**
 * Validate a response body against a schema.
 *
 * @throws ValidationError (TIDE_V100) with paths prefixed by `label`
 */
export function decodeBody<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  body: unknown,
  label: string
): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new ValidationError(toFieldErrors(result.error, label), { source: label });
  }
  return result.data;
}
