/**
 * Tidesync Error Codes
 *
 * Error codes are structured as TIDE_[CATEGORY][NUMBER]:
 * - V: Validation errors (V100-V199)
 * - S: Storage errors (S300-S399)
 * - C: Connection/Sync errors (C500-C599)
 * - X: Internal errors (X900-X999)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Validation errors (V100-V199)
  TIDE_V100: {
    code: 'TIDE_V100',
    message: 'Record validation failed',
    suggestion:
      'Records need a non-empty id, a non-negative integer version, a timestamp and a flat string payload.',
  },
  TIDE_V101: {
    code: 'TIDE_V101',
    message: 'Invalid configuration value',
    suggestion: 'Batch sizes and intervals must be positive numbers.',
  },

  // Storage errors (S300-S399)
  TIDE_S300: {
    code: 'TIDE_S300',
    message: 'Record store operation failed',
    suggestion: 'Check the record store implementation and its backing storage.',
  },

  // Connection/Sync errors (C500-C599)
  TIDE_C500: {
    code: 'TIDE_C500',
    message: 'Remote request failed',
    suggestion: 'The remote authority returned an error status. Check server logs.',
  },
  TIDE_C502: {
    code: 'TIDE_C502',
    message: 'Health check failed',
    suggestion: 'Verify the server URL and that the remote authority is running.',
  },
  TIDE_C504: {
    code: 'TIDE_C504',
    message: 'Request timed out',
    suggestion: 'Increase the timeout or check network conditions.',
  },
  TIDE_C510: {
    code: 'TIDE_C510',
    message: 'Upload failed',
    suggestion: 'Records stay pending and are retried on the next sync cycle.',
  },
  TIDE_C520: {
    code: 'TIDE_C520',
    message: 'Download failed',
    suggestion: 'Remote changes are fetched again on the next sync cycle.',
  },

  // Internal errors (X900-X999)
  TIDE_X900: {
    code: 'TIDE_X900',
    message: 'Internal error',
    suggestion: 'An unexpected error occurred. Please report this issue.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory = 'validation' | 'storage' | 'connection' | 'internal';

const CODE_PATTERN = /^TIDE_([A-Z])\d+$/;

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = CODE_PATTERN.exec(code)?.[1];
  switch (letter) {
    case 'V':
      return 'validation';
    case 'S':
      return 'storage';
    case 'C':
      return 'connection';
    default:
      return 'internal';
  }
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}
