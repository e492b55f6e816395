import type { SyncRecord } from '@tidesync/core';

/**
 * Conflict resolution policies.
 *
 * Both resolve at record granularity: the winner is one of the two inputs,
 * never a field-level merge of them.
 */
export type ConflictPolicy = 'highest-version-wins' | 'last-write-wins';

/**
 * Conflict resolution result
 */
export interface ConflictResolution {
  /** The winning record (one of the inputs, by reference) */
  record: SyncRecord;
  /** Which side won */
  winner: 'local' | 'remote';
}

/**
 * Resolve one local/remote pair sharing the same id.
 *
 * - `highest-version-wins`: the strictly greater `version` wins.
 * - `last-write-wins`: the strictly later `updatedAt` wins.
 *
 * Exact ties keep `local`. Inputs are never mutated.
 */
export function resolveConflict(
  local: SyncRecord,
  remote: SyncRecord,
  policy: ConflictPolicy = 'highest-version-wins'
): ConflictResolution {
  const remoteWins =
    policy === 'last-write-wins'
      ? remote.updatedAt > local.updatedAt
      : remote.version > local.version;

  return remoteWins ? { record: remote, winner: 'remote' } : { record: local, winner: 'local' };
}

/**
 * Conflict resolver bound to a policy
 */
export class ConflictResolver {
  readonly policy: ConflictPolicy;

  constructor(policy: ConflictPolicy = 'highest-version-wins') {
    this.policy = policy;
  }

  /**
   * Resolve a conflict between local and remote records
   */
  resolve(local: SyncRecord, remote: SyncRecord): ConflictResolution {
    return resolveConflict(local, remote, this.policy);
  }
}

/**
 * Whether two records carry the same version, timestamp and payload
 */
export function recordsEqual(a: SyncRecord, b: SyncRecord): boolean {
  if (a.id !== b.id || a.version !== b.version || a.updatedAt !== b.updatedAt) return false;

  const aKeys = Object.keys(a.payload);
  const bKeys = Object.keys(b.payload);
  if (aKeys.length !== bKeys.length) return false;
  return aKeys.every((key) => Object.hasOwn(b.payload, key) && a.payload[key] === b.payload[key]);
}
