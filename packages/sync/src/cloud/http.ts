import {
  ConnectionError,
  DownloadError,
  UploadError,
  ensureTidesyncError,
  type SyncRecord,
} from '@tidesync/core';
import { resolveLogger, type Logger, type LoggerOptions } from '../logger.js';
import type { CloudClient, CloudClientConfig, UploadResponse } from './types.js';
import { decodeBody, downloadResponseSchema, toWireRecord, uploadResponseSchema } from './wire.js';

/**
 * HTTP cloud client configuration
 */
export interface HttpCloudClientConfig extends CloudClientConfig {
  /** Logger options for structured logging */
  logger?: LoggerOptions | Logger | false;
}

/**
 * HTTP client for the remote authority.
 *
 * ## API Endpoints
 *
 * - `GET /health` - Reachability probe
 * - `POST /sync/upload` - Body `{ records }`, response `{ acceptedIds }`
 * - `GET /sync/download?since=<ISO-8601>` - Response `{ records }`; no
 *   `since` parameter requests a full snapshot
 *
 * Every request is bounded by `timeout`. Failures surface as
 * {@link UploadError} or {@link DownloadError} whose `cause` is the
 * underlying {@link ConnectionError} or validation error.
 *
 * @example
 * ```typescript
 * const cloud = createHttpCloudClient({
 *   serverUrl: 'https://sync.example.com',
 *   authToken: 'test-token',
 * });
 *
 * const { acceptedIds } = await cloud.upload(records);
 * ```
 */
export class HttpCloudClient implements CloudClient {
  private readonly config: Required<CloudClientConfig>;
  private readonly logger: Logger;

  constructor(config: HttpCloudClientConfig) {
    this.config = {
      serverUrl: config.serverUrl,
      authToken: config.authToken ?? '',
      timeout: config.timeout ?? 30000,
    };
    this.logger = resolveLogger(config.logger, 'HttpCloudClient');
  }

  async upload(batch: readonly SyncRecord[]): Promise<UploadResponse> {
    try {
      const body = await this.request('/sync/upload', {
        method: 'POST',
        body: JSON.stringify({ records: batch.map(toWireRecord) }),
      });
      const response = decodeBody(uploadResponseSchema, body, 'upload');
      this.logger.debug('Upload accepted', {
        sent: batch.length,
        accepted: response.acceptedIds.length,
      });
      return response;
    } catch (error) {
      const cause = ensureTidesyncError(error, 'TIDE_C500');
      throw new UploadError(
        `Upload of ${batch.length} records failed: ${cause.message}`,
        { count: batch.length },
        cause
      );
    }
  }

  async download(since: number | null): Promise<SyncRecord[]> {
    const query = since === null ? '' : `?since=${encodeURIComponent(new Date(since).toISOString())}`;

    try {
      const body = await this.request(`/sync/download${query}`, { method: 'GET' });
      const { records } = decodeBody(downloadResponseSchema, body, 'download');
      this.logger.debug('Download received', { since, count: records.length });
      return records;
    } catch (error) {
      const cause = ensureTidesyncError(error, 'TIDE_C500');
      throw new DownloadError(`Download failed: ${cause.message}`, { since }, cause);
    }
  }

  /**
   * Health check against `GET /health`.
   * @returns whether the remote authority answered with a 2xx status
   */
  async ping(): Promise<boolean> {
    try {
      const response = await this.fetchWithTimeout(this.url('/health'), {
        method: 'GET',
        headers: this.getHeaders(),
      });
      return response.ok;
    } catch (error) {
      const failure = ensureTidesyncError(error, 'TIDE_C502');
      this.logger.debug('Health check failed', { code: failure.code, error: failure.message });
      return false;
    }
  }

  /**
   * Send a request and parse its JSON body
   */
  private async request(path: string, init: { method: string; body?: string }): Promise<unknown> {
    const url = this.url(path);
    const response = await this.fetchWithTimeout(url, {
      method: init.method,
      headers: this.getHeaders(),
      body: init.body,
    });

    if (!response.ok) {
      throw new ConnectionError('TIDE_C500', `HTTP error: ${response.status}`, {
        statusCode: response.status,
        url,
      });
    }

    return response.json();
  }

  private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeout);

    try {
      return await fetch(url, { ...init, signal: controller.signal });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new ConnectionError('TIDE_C504', 'Request timeout', {
          url,
          timeout: this.config.timeout,
        });
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private url(path: string): string {
    return new URL(path, this.config.serverUrl).toString();
  }

  private getHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
    };

    if (this.config.authToken) {
      headers.Authorization = `Bearer ${this.config.authToken}`;
    }

    return headers;
  }
}

/**
 * Create an HTTP cloud client
 */
export function createHttpCloudClient(config: HttpCloudClientConfig): HttpCloudClient {
  return new HttpCloudClient(config);
}
