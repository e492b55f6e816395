import { TidesyncError } from '@tidesync/core';

/**
 * Log levels for structured logging
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  context?: string;
  data?: Record<string, unknown>;
  error?: Error;
}

/**
 * Logger interface that consumers can implement
 */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: Error, data?: Record<string, unknown>): void;
}

/**
 * Logger options
 */
export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Context name (e.g., 'SyncEngine', 'HttpCloudClient') */
  context?: string;
  /** Custom log handler */
  handler?: (entry: LogEntry) => void;
  /** Enable logging (default: false in production) */
  enabled?: boolean;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Format an entry as a single console line:
 * `<ISO time> <LEVEL>[context] message {"data":...}`
 */
export function formatLogEntry(entry: LogEntry): string {
  const prefix = entry.context ? `[${entry.context}]` : '';
  const timestamp = new Date(entry.timestamp).toISOString();
  const dataStr = entry.data ? ` ${JSON.stringify(entry.data)}` : '';
  return `${timestamp} ${entry.level.toUpperCase()}${prefix} ${entry.message}${dataStr}`;
}

function describeError(error: Error | undefined): string | Error {
  if (!error) return '';
  return TidesyncError.isTidesyncError(error) ? `\n${error.format()}` : error;
}

function defaultLogHandler(entry: LogEntry): void {
  const line = formatLogEntry(entry);

  switch (entry.level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line, describeError(entry.error));
      break;
  }
}

/**
 * Create a structured logger
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    level = 'info',
    context,
    handler = defaultLogHandler,
    enabled = process.env.NODE_ENV !== 'production',
  } = options;

  const minPriority = LOG_LEVEL_PRIORITY[level];

  function log(
    logLevel: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!enabled || LOG_LEVEL_PRIORITY[logLevel] < minPriority) return;

    handler({
      level: logLevel,
      message,
      timestamp: Date.now(),
      context,
      data,
      error,
    });
  }

  return {
    debug: (message, data) => log('debug', message, data),
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, error, data) => log('error', message, data, error),
  };
}

/**
 * No-op logger that doesn't output anything
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Resolve the `logger` option accepted by engine and client configs.
 *
 * `false` silences output, a {@link Logger} is used as is, and options (or
 * nothing) build a console logger tagged with `context`.
 */
export function resolveLogger(
  option: LoggerOptions | Logger | false | undefined,
  context: string
): Logger {
  if (option === false) return noopLogger;
  if (option && isLogger(option)) return option;
  return createLogger({ ...option, context: option?.context ?? context });
}

function isLogger(value: LoggerOptions | Logger): value is Logger {
  return 'debug' in value && 'info' in value && 'warn' in value && 'error' in value;
}

/**
 * Normalize an unknown thrown value into a message for log data
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
