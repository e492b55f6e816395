import {
  StorageError,
  cloneRecord,
  type MarkSyncedOptions,
  type RecordChangeEvent,
  type RecordStore,
  type SaveOptions,
  type SyncRecord,
} from '@tidesync/core';
import { Subject, type Observable } from 'rxjs';

/**
 * In-memory record store.
 *
 * The record map and the pending set are only touched from synchronous
 * method bodies, so every operation completes before another can observe
 * either structure. Records are cloned on the way in and on the way out.
 *
 * Pending ids are returned in the order they were first marked.
 */
export class MemoryRecordStore implements RecordStore {
  readonly name = 'memory';

  private readonly records = new Map<string, SyncRecord>();
  private readonly pending = new Set<string>();
  private readonly changes$ = new Subject<RecordChangeEvent>();
  private destroyed = false;

  async fetchPending(limit: number): Promise<SyncRecord[]> {
    this.assertOpen('fetchPending');
    const result: SyncRecord[] = [];
    if (limit <= 0) return result;

    for (const id of this.pending) {
      const record = this.records.get(id);
      if (!record) continue;
      result.push(cloneRecord(record));
      if (result.length >= limit) break;
    }
    return result;
  }

  async fetchAll(): Promise<SyncRecord[]> {
    this.assertOpen('fetchAll');
    return Array.from(this.records.values(), cloneRecord);
  }

  async get(id: string): Promise<SyncRecord | null> {
    this.assertOpen('get');
    const record = this.records.get(id);
    return record ? cloneRecord(record) : null;
  }

  async save(record: SyncRecord, options: SaveOptions = {}): Promise<boolean> {
    this.assertOpen('save');
    const existing = this.records.get(record.id) ?? null;

    if (options.expectedVersion !== undefined) {
      const currentVersion = existing ? existing.version : null;
      if (currentVersion !== options.expectedVersion) return false;
    }

    const markPending = options.markPending ?? true;
    const stored = cloneRecord(record);
    this.records.set(record.id, stored);
    if (markPending) {
      this.pending.add(record.id);
    }

    this.changes$.next({
      id: record.id,
      record: cloneRecord(stored),
      previous: existing ? cloneRecord(existing) : null,
      origin: markPending ? 'local' : 'remote',
      timestamp: Date.now(),
    });
    return true;
  }

  async markSynced(ids: readonly string[], options: MarkSyncedOptions = {}): Promise<void> {
    this.assertOpen('markSynced');
    for (const id of ids) {
      const uploadedVersion = options.versions?.get(id);
      if (uploadedVersion !== undefined && this.records.get(id)?.version !== uploadedVersion) {
        // Written again while the upload was in flight
        continue;
      }
      this.pending.delete(id);
    }
  }

  async pendingIds(): Promise<string[]> {
    this.assertOpen('pendingIds');
    return Array.from(this.pending);
  }

  /**
   * Number of pending ids
   */
  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Number of stored records
   */
  get size(): number {
    return this.records.size;
  }

  changes(): Observable<RecordChangeEvent> {
    return this.changes$.asObservable();
  }

  /**
   * Drop every record and pending mark
   */
  async clear(): Promise<void> {
    this.assertOpen('clear');
    this.records.clear();
    this.pending.clear();
  }

  destroy(): void {
    this.destroyed = true;
    this.changes$.complete();
    this.records.clear();
    this.pending.clear();
  }

  private assertOpen(operation: string): void {
    if (this.destroyed) {
      throw new StorageError('TIDE_S300', 'Record store has been destroyed', {
        store: this.name,
        operation,
      });
    }
  }
}

/**
 * Create an in-memory record store
 */
export function createMemoryRecordStore(): MemoryRecordStore {
  return new MemoryRecordStore();
}
