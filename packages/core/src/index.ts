/**
 * @tidesync/core - Shared model for the Tidesync packages
 *
 * Defines the versioned record, the record store contract every storage
 * backend implements, record validation and the structured error system.
 *
 * @packageDocumentation
 * @module @tidesync/core
 */

export * from './errors/index.js';
export * from './types/record.js';
export * from './types/store.js';
export * from './validation/record-schema.js';
