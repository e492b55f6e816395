/**
 * Tidesync Error System
 *
 * Structured errors with stable codes (TIDE_V100, TIDE_C510, etc.),
 * suggestions, categories and error chaining.
 *
 * @example
 * ```typescript
 * import { TidesyncError } from '@tidesync/core';
 *
 * if (TidesyncError.isTidesyncError(error) && error.category === 'connection') {
 *   console.log(error.format());
 * }
 * ```
 *
 * @module errors
 */

export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

export {
  ConnectionError,
  DownloadError,
  StorageError,
  TidesyncError,
  UploadError,
  ValidationError,
  ensureTidesyncError,
  type FieldValidationError,
  type TidesyncErrorOptions,
} from './tidesync-error.js';
