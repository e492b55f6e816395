/**
 * Cloud clients for the remote authority.
 *
 * @module cloud
 */

export { HttpCloudClient, createHttpCloudClient, type HttpCloudClientConfig } from './http.js';
export {
  MemoryCloudClient,
  createMemoryCloudClient,
  type AcceptPolicy,
  type MemoryCloudClientOptions,
} from './memory.js';
export type { CloudClient, CloudClientConfig, UploadResponse } from './types.js';
export {
  downloadResponseSchema,
  toWireRecord,
  uploadResponseSchema,
  wireRecordSchema,
  type WireRecord,
} from './wire.js';
