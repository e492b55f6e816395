import type { SyncRecord } from '@tidesync/core';
import { describe, expect, it } from 'vitest';
import { ConflictResolver, recordsEqual, resolveConflict } from './conflict.js';

function makeRecord(version: number, updatedAt: number, payload: Record<string, string> = {}): SyncRecord {
  return { id: 'r1', version, updatedAt, payload };
}

describe('resolveConflict', () => {
  describe('highest-version-wins', () => {
    it('should pick the strictly greater version', () => {
      const local = makeRecord(5, 100);
      const remote = makeRecord(3, 900);

      expect(resolveConflict(local, remote)).toEqual({ record: local, winner: 'local' });
      expect(resolveConflict(remote, local).winner).toBe('remote');
    });

    it('should keep local on a version tie', () => {
      const local = makeRecord(5, 100, { side: 'local' });
      const remote = makeRecord(5, 200, { side: 'remote' });

      const resolution = resolveConflict(local, remote, 'highest-version-wins');
      expect(resolution.record).toBe(local);
      expect(resolution.winner).toBe('local');
    });

    it('should return the argument itself when resolving a record with itself', () => {
      const record = makeRecord(2, 10);
      expect(resolveConflict(record, record).record).toBe(record);
    });
  });

  describe('last-write-wins', () => {
    it('should pick the later updatedAt regardless of version', () => {
      const local = makeRecord(9, 100);
      const remote = makeRecord(1, 200);

      expect(resolveConflict(local, remote, 'last-write-wins').record).toBe(remote);
    });

    it('should keep local when local is newer or equally new', () => {
      const remote = makeRecord(1, 200);

      expect(resolveConflict(makeRecord(1, 300), remote, 'last-write-wins').winner).toBe('local');
      expect(resolveConflict(makeRecord(1, 200), remote, 'last-write-wins').winner).toBe('local');
    });
  });

  it('should not mutate its inputs', () => {
    const local = makeRecord(1, 1, { k: 'a' });
    const remote = makeRecord(2, 2, { k: 'b' });
    const before = JSON.stringify([local, remote]);

    resolveConflict(local, remote);
    resolveConflict(local, remote, 'last-write-wins');

    expect(JSON.stringify([local, remote])).toBe(before);
  });

  it('should be deterministic', () => {
    const local = makeRecord(4, 50);
    const remote = makeRecord(4, 60);
    const first = resolveConflict(local, remote);

    for (let i = 0; i < 5; i++) {
      expect(resolveConflict(local, remote)).toEqual(first);
    }
  });
});

describe('ConflictResolver', () => {
  it('should default to highest-version-wins', () => {
    const resolver = new ConflictResolver();
    expect(resolver.policy).toBe('highest-version-wins');
    expect(resolver.resolve(makeRecord(1, 999), makeRecord(2, 0)).winner).toBe('remote');
  });

  it('should apply its configured policy', () => {
    const resolver = new ConflictResolver('last-write-wins');
    expect(resolver.resolve(makeRecord(1, 999), makeRecord(2, 0)).winner).toBe('local');
  });
});

describe('recordsEqual', () => {
  it('should compare version, timestamp and payload by value', () => {
    expect(recordsEqual(makeRecord(1, 1, { a: 'x' }), makeRecord(1, 1, { a: 'x' }))).toBe(true);
    expect(recordsEqual(makeRecord(1, 1, { a: 'x' }), makeRecord(1, 1, { a: 'y' }))).toBe(false);
    expect(recordsEqual(makeRecord(1, 1, { a: 'x' }), makeRecord(1, 1, { b: 'x' }))).toBe(false);
    expect(recordsEqual(makeRecord(1, 1), makeRecord(2, 1))).toBe(false);
  });
});
