/**
 * @packageDocumentation
 *
 * In-memory record store for Tidesync.
 *
 * Keeps records and the pending set in JavaScript memory. Suited to tests,
 * development and processes whose records are rebuilt from the remote
 * authority on start.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createMemoryRecordStore } from '@tidesync/storage-memory';
 * import { createSyncEngine } from '@tidesync/sync';
 *
 * const store = createMemoryRecordStore();
 * const engine = createSyncEngine({ store, cloud });
 * ```
 *
 * ## Limitations
 *
 * - Data is not persisted: it is lost when the process ends
 *
 * @module @tidesync/storage-memory
 *
 * @see {@link MemoryRecordStore} for the store class
 */
export * from './memory-record-store.js';
