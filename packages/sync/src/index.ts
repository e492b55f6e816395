/**
 * @tidesync/sync - Offline-first sync engine
 *
 * Reconciles a local {@link RecordStore} with a remote authority under
 * intermittent connectivity and a limited power/thermal budget.
 *
 * ## Architecture
 *
 * ```
 *  enqueue() ──► RecordStore (marks pending)
 *                    │
 *                    ▼
 * ┌──────────────────────────────────────────────────────────────┐
 * │                         SyncEngine                            │
 * │                                                               │
 * │  triggers: PeriodicScheduler │ ReachabilityMonitor │ syncNow() │
 * │                    │                                          │
 * │                    ▼                                          │
 * │        upload(pending) ║ download(since)    (concurrent)      │
 * │                    │                                          │
 * │                    ▼                                          │
 * │   ConflictResolver ──► RecordStore write-back, markSynced     │
 * │                                                               │
 * │  PowerStateSource ──► tuneForPower ──► batch size / interval  │
 * └──────────────────────────────────────────────────────────────┘
 *                    │
 *                    ▼
 *            CloudClient (HTTP or in-memory)
 * ```
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createMemoryRecordStore } from '@tidesync/storage-memory';
 * import { createHttpCloudClient, createSyncEngine } from '@tidesync/sync';
 *
 * const cloud = createHttpCloudClient({ serverUrl: 'https://sync.example.com' });
 * const engine = createSyncEngine({ store: createMemoryRecordStore(), cloud });
 *
 * engine.start();
 * ```
 *
 * @packageDocumentation
 * @module @tidesync/sync
 */

export * from './cloud/index.js';
export * from './conflict.js';
export * from './logger.js';
export * from './power-policy.js';
export * from './reachability.js';
export * from './scheduler.js';
export * from './sync-engine.js';
