import type { Observable } from 'rxjs';
import type { RecordChangeEvent, SyncRecord } from './record.js';

/**
 * Options for {@link RecordStore.save}
 */
export interface SaveOptions {
  /**
   * Mark the id pending (local write). Remote-origin writes pass `false`,
   * which leaves the id's pending status as it was.
   * @default true
   */
  markPending?: boolean;
  /**
   * Compare-and-set guard: the write only happens when the stored version
   * equals this value. `null` requires that no record exists yet.
   */
  expectedVersion?: number | null;
}

/**
 * Options for {@link RecordStore.markSynced}
 */
export interface MarkSyncedOptions {
  /**
   * Versions that were uploaded, by id. An id whose stored version differs
   * (it was written again during the upload) stays pending.
   */
  versions?: ReadonlyMap<string, number>;
}

/**
 * Local key-value store of versioned records plus the pending set.
 *
 * Implementations must keep the record map and the pending set consistent
 * under concurrent callers: every operation is atomic with respect to the
 * others, and no lock is ever held across a network call.
 */
export interface RecordStore {
  /**
   * Up to `limit` pending records, in store-defined order.
   */
  fetchPending(limit: number): Promise<SyncRecord[]>;

  /**
   * Point-in-time copy of every record.
   */
  fetchAll(): Promise<SyncRecord[]>;

  /**
   * Get a single record by id.
   */
  get(id: string): Promise<SyncRecord | null>;

  /**
   * Upsert by id. Returns false only when an `expectedVersion` guard failed.
   */
  save(record: SyncRecord, options?: SaveOptions): Promise<boolean>;

  /**
   * Remove ids from the pending set. Record content is untouched.
   */
  markSynced(ids: readonly string[], options?: MarkSyncedOptions): Promise<void>;

  /**
   * Snapshot of the pending ids.
   */
  pendingIds(): Promise<string[]>;

  /**
   * Observable of every write to the store.
   */
  changes(): Observable<RecordChangeEvent>;
}
