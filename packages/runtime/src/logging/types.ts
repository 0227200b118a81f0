// Logging types

import type { LogLevel, LogMessage } from '@patchwork/protocol';

/**
 * Severity order; lower is more severe.
 */
export const LOG_LEVEL_SEVERITY: Record<LogLevel, number> = {
  fatal: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

/**
 * A log entry as delivered to a handler
 */
export type LogEntry = {
  level: LogLevel;
  scope: string;
  message: string;
  data?: Record<string, unknown>;
  timestamp: string;
};

/**
 * A log entry waiting in the deferred buffer; its message is still lazy
 */
export type PendingLogEntry = Omit<LogEntry, 'message'> & {
  message: LogMessage;
};

/**
 * Log sink. Receives entries in the order they were written.
 */
export type LoggingHandler = {
  /**
   * Most verbose level this handler wants; defaults to 'trace' (everything)
   */
  level?: LogLevel;

  log(entry: LogEntry): void;
};

/**
 * Whether a handler wants entries of a level
 */
export function supportsLevel(handler: LoggingHandler, level: LogLevel): boolean {
  return LOG_LEVEL_SEVERITY[level] <= LOG_LEVEL_SEVERITY[handler.level ?? 'trace'];
}
