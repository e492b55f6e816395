import { describe, expect, it } from 'vitest';
import { ValidationError } from '../errors/index.js';
import { cloneRecord } from '../types/record.js';
import { parseRecord, recordSchema } from '../validation/record-schema.js';

describe('parseRecord', () => {
  it('should accept a well-formed record', () => {
    const record = parseRecord({ id: 'r1', version: 1, updatedAt: 1000, payload: { k: 'v' } });
    expect(record).toEqual({ id: 'r1', version: 1, updatedAt: 1000, payload: { k: 'v' } });
  });

  it('should reject an empty id', () => {
    expect(() => parseRecord({ id: '', version: 1, updatedAt: 0, payload: {} })).toThrow(
      'Validation failed: id: id must not be empty'
    );
  });

  it('should reject fractional and negative versions', () => {
    expect(() => parseRecord({ id: 'a', version: 1.5, updatedAt: 0, payload: {} })).toThrow(
      'version must be an integer'
    );
    expect(() => parseRecord({ id: 'a', version: -1, updatedAt: 0, payload: {} })).toThrow(
      'version must be >= 0'
    );
  });

  it('should reject versions past the safe integer range', () => {
    expect(() =>
      parseRecord({ id: 'a', version: Number.MAX_SAFE_INTEGER + 1, updatedAt: 0, payload: {} })
    ).toThrow('Validation failed: version: version must be a safe integer');
    expect(
      parseRecord({ id: 'a', version: Number.MAX_SAFE_INTEGER, updatedAt: 0, payload: {} }).version
    ).toBe(Number.MAX_SAFE_INTEGER);
  });

  it('should reject timestamps a Date cannot hold', () => {
    expect(() => parseRecord({ id: 'a', version: 1, updatedAt: 1e16, payload: {} })).toThrow(
      'Validation failed: updatedAt: updatedAt is outside the Date range'
    );
    expect(() => parseRecord({ id: 'a', version: 1, updatedAt: -1e16, payload: {} })).toThrow(
      'Validation failed: updatedAt: updatedAt is outside the Date range'
    );
    expect(parseRecord({ id: 'a', version: 1, updatedAt: 8.64e15, payload: {} }).updatedAt).toBe(
      8.64e15
    );
  });

  it('should reject fractional timestamps', () => {
    expect(() => parseRecord({ id: 'a', version: 1, updatedAt: 1.5, payload: {} })).toThrow(
      'updatedAt must be an integer timestamp'
    );
  });

  it('should report the nested path of non-string payload values', () => {
    try {
      parseRecord({ id: 'a', version: 0, updatedAt: 0, payload: { count: 3 } });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.errors.map((e) => e.path)).toEqual(['payload.count']);
      }
    }
  });

  it('should reject non-objects', () => {
    expect(recordSchema.safeParse('r1').success).toBe(false);
    expect(() => parseRecord(null)).toThrow(ValidationError);
  });
});

describe('cloneRecord', () => {
  it('should copy the payload', () => {
    const original = { id: 'r1', version: 1, updatedAt: 0, payload: { k: 'v' } };
    const copy = cloneRecord(original);

    copy.payload.k = 'changed';
    expect(original.payload.k).toBe('v');
    expect(copy).not.toBe(original);
  });
});
