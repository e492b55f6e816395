/**
 * Flat string map carried by every record
 */
export type RecordPayload = Record<string, string>;

/**
 * A versioned record as held by the local store and the remote authority.
 *
 * `version` increases with every write ever observed for an id, local or
 * remote. `updatedAt` (Unix ms) is only used as a tiebreak signal and need not
 * be monotonic across devices.
 */
export interface SyncRecord {
  /** Unique record identifier */
  id: string;
  /** Monotonic per-id version */
  version: number;
  /** Last update timestamp (Unix ms) */
  updatedAt: number;
  /** Record content */
  payload: RecordPayload;
}

/**
 * Where a store write came from
 */
export type WriteOrigin = 'local' | 'remote';

/**
 * Change event emitted by a record store on every write
 */
export interface RecordChangeEvent {
  /** Record ID that changed */
  id: string;
  /** The record as stored after the write */
  record: SyncRecord;
  /** Previous stored value, if any */
  previous: SyncRecord | null;
  /** Whether the write marked the record pending */
  origin: WriteOrigin;
  /** Unix timestamp of the write */
  timestamp: number;
}

/**
 * Copy a record so that neither side can mutate the other's payload
 */
export function cloneRecord(record: SyncRecord): SyncRecord {
  return {
    id: record.id,
    version: record.version,
    updatedAt: record.updatedAt,
    payload: { ...record.payload },
  };
}
