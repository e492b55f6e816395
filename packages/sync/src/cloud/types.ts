import type { SyncRecord } from '@tidesync/core';

/**
 * Result of a successful upload.
 *
 * The remote authority reports exactly which ids it committed. Ids of the
 * batch missing from `acceptedIds` stay pending on the client.
 */
export interface UploadResponse {
  acceptedIds: string[];
}

/**
 * Upload/download contract against the remote authority.
 *
 * Implementations hold no local state and never retry; retries happen on the
 * next sync cycle.
 *
 * @see {@link createHttpCloudClient}
 * @see {@link createMemoryCloudClient}
 */
export interface CloudClient {
  /**
   * Upload a batch of records.
   * @throws UploadError when the batch is rejected or the request fails
   */
  upload(batch: readonly SyncRecord[]): Promise<UploadResponse>;

  /**
   * Fetch every remote record changed after `since` (Unix ms).
   * `null` requests a full snapshot. Calling twice with the same `since`
   * returns at least the same records, barring new remote writes.
   * @throws DownloadError when the request fails
   */
  download(since: number | null): Promise<SyncRecord[]>;
}

/**
 * Configuration for the HTTP cloud client.
 */
export interface CloudClientConfig {
  /** Base URL of the remote authority (https://...) */
  serverUrl: string;
  /** Bearer token sent with every request */
  authToken?: string;
  /** Request timeout in milliseconds. @default 30000 */
  timeout?: number;
}
