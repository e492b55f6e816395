import { DownloadError, UploadError, cloneRecord, type SyncRecord } from '@tidesync/core';
import type { CloudClient, UploadResponse } from './types.js';

/**
 * Which records of an upload the in-memory authority commits
 */
export type AcceptPolicy = 'all' | 'none' | ((record: SyncRecord) => boolean);

/**
 * Options for the in-memory cloud client
 */
export interface MemoryCloudClientOptions {
  /** Commit policy for uploads. @default 'all' */
  accept?: AcceptPolicy;
  /** Clock used to stamp commits (Unix ms). @default Date.now */
  now?: () => number;
}

interface RemoteEntry {
  record: SyncRecord;
  changedAt: number;
}

/**
 * In-process remote authority.
 *
 * Keeps committed records with the time they changed remotely, so
 * `download(since)` returns exactly the records committed after `since`.
 * Failures and partial acceptance can be switched on to exercise the
 * engine's retry behavior without a network.
 *
 * @example
 * ```typescript
 * const cloud = createMemoryCloudClient();
 * cloud.put({ id: 'r1', version: 2, updatedAt: Date.now(), payload: {} });
 *
 * cloud.failUploads = true; // next uploads reject with UploadError
 * ```
 */
export class MemoryCloudClient implements CloudClient {
  /** Reject every upload with an UploadError */
  failUploads = false;
  /** Reject every download with a DownloadError */
  failDownloads = false;
  /** Commit policy for uploads */
  accept: AcceptPolicy;

  private readonly entries = new Map<string, RemoteEntry>();
  private readonly now: () => number;
  private uploads = 0;
  private downloads = 0;

  constructor(options: MemoryCloudClientOptions = {}) {
    this.accept = options.accept ?? 'all';
    this.now = options.now ?? Date.now;
  }

  async upload(batch: readonly SyncRecord[]): Promise<UploadResponse> {
    this.uploads++;
    if (this.failUploads) {
      throw new UploadError('Remote authority rejected the batch', { count: batch.length });
    }

    const acceptedIds: string[] = [];
    for (const record of batch) {
      if (!this.accepts(record)) continue;
      this.commit(record);
      acceptedIds.push(record.id);
    }
    return { acceptedIds };
  }

  async download(since: number | null): Promise<SyncRecord[]> {
    this.downloads++;
    if (this.failDownloads) {
      throw new DownloadError('Remote authority unavailable', { since });
    }

    const result: SyncRecord[] = [];
    for (const entry of this.entries.values()) {
      if (since === null || entry.changedAt > since) {
        result.push(cloneRecord(entry.record));
      }
    }
    return result;
  }

  /**
   * Write a record as if another device had committed it
   */
  put(record: SyncRecord): void {
    this.commit(record);
  }

  /**
   * Get the committed remote value of a record
   */
  get(id: string): SyncRecord | null {
    const entry = this.entries.get(id);
    return entry ? cloneRecord(entry.record) : null;
  }

  /**
   * Number of upload calls made so far
   */
  get uploadCalls(): number {
    return this.uploads;
  }

  /**
   * Number of download calls made so far
   */
  get downloadCalls(): number {
    return this.downloads;
  }

  private accepts(record: SyncRecord): boolean {
    if (this.accept === 'all') return true;
    if (this.accept === 'none') return false;
    return this.accept(record);
  }

  private commit(record: SyncRecord): void {
    this.entries.set(record.id, { record: cloneRecord(record), changedAt: this.now() });
  }
}

/**
 * Create an in-memory cloud client
 */
export function createMemoryCloudClient(options?: MemoryCloudClientOptions): MemoryCloudClient {
  return new MemoryCloudClient(options);
}
