export {
  LOG_LEVEL_SEVERITY,
  supportsLevel,
  type LogEntry,
  type PendingLogEntry,
  type LoggingHandler,
} from './types.js';
export {
  consoleLoggingHandler,
  createConsoleLoggingHandler,
  silentLoggingHandler,
  createCapturingHandler,
} from './handlers.js';
export { DeferredLogBuffer } from './deferred-buffer.js';
export { Logger, errorData } from './logger.js';
