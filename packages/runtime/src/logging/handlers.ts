// Built-in logging handlers

import type { LogLevel } from '@patchwork/protocol';
import type { LogEntry, LoggingHandler } from './types.js';

const CONSOLE_METHODS: Record<LogLevel, 'error' | 'warn' | 'info' | 'debug'> = {
  fatal: 'error',
  error: 'error',
  warn: 'warn',
  info: 'info',
  debug: 'debug',
  trace: 'debug',
};

/**
 * Console handler: "[LEVEL] [scope] message" plus data when present.
 */
export function createConsoleLoggingHandler(level: LogLevel = 'info'): LoggingHandler {
  return {
    level,
    log(entry: LogEntry) {
      const line = `[${entry.level.toUpperCase()}] [${entry.scope}] ${entry.message}`;
      console[CONSOLE_METHODS[entry.level]](line, entry.data ?? '');
    },
  };
}

/**
 * Default console handler
 */
export const consoleLoggingHandler: LoggingHandler = createConsoleLoggingHandler();

/**
 * Silent handler for testing
 */
export const silentLoggingHandler: LoggingHandler = {
  level: 'fatal',
  log() {},
};

/**
 * Create a capturing handler that stores entries for inspection
 */
export function createCapturingHandler(
  level: LogLevel = 'trace'
): LoggingHandler & { entries: LogEntry[]; at(level: LogLevel): LogEntry[] } {
  const entries: LogEntry[] = [];

  return {
    level,
    entries,
    log(entry: LogEntry) {
      entries.push(entry);
    },
    at(wanted: LogLevel) {
      return entries.filter((entry) => entry.level === wanted);
    },
  };
}
