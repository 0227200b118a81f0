// Scoped logger writing into a deferred log buffer

import type { LogLevel, LogMessage, PatchLogger } from '@patchwork/protocol';
import type { DeferredLogBuffer } from './deferred-buffer.js';

export class Logger implements PatchLogger {
  constructor(
    private readonly buffer: DeferredLogBuffer,
    readonly scope: string
  ) {}

  /**
   * Logger for a nested scope ("orchestrator/participants")
   */
  child(scope: string): Logger {
    return new Logger(this.buffer, `${this.scope}/${scope}`);
  }

  fatal(message: LogMessage, data?: Record<string, unknown>): void {
    this.write('fatal', message, data);
  }

  error(message: LogMessage, data?: Record<string, unknown>): void {
    this.write('error', message, data);
  }

  warn(message: LogMessage, data?: Record<string, unknown>): void {
    this.write('warn', message, data);
  }

  info(message: LogMessage, data?: Record<string, unknown>): void {
    this.write('info', message, data);
  }

  debug(message: LogMessage, data?: Record<string, unknown>): void {
    this.write('debug', message, data);
  }

  trace(message: LogMessage, data?: Record<string, unknown>): void {
    this.write('trace', message, data);
  }

  private write(level: LogLevel, message: LogMessage, data?: Record<string, unknown>): void {
    this.buffer.write({
      level,
      scope: this.scope,
      message,
      data,
      timestamp: new Date().toISOString(),
    });
  }
}

/**
 * Data for an error log entry
 */
export function errorData(error: unknown, extra: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    ...extra,
    error: error instanceof Error ? error.message : String(error),
    errorName: error instanceof Error ? error.name : undefined,
  };
}
