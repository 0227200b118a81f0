// Deferred log buffer
//
// Entries written before any handler is attached are queued, never dropped.
// Attaching a handler drains the queue in write order and from then on
// entries bypass the queue. Re-attaching swaps the handler without buffering
// again. Draining is synchronous, so no write can slip in between the start
// and the end of a drain. A handler that throws loses that entry only; the
// error goes to stderr and the caller never sees it.

import type { LogEntry, LoggingHandler, PendingLogEntry } from './types.js';
import { supportsLevel } from './types.js';

type BufferState =
  | { phase: 'buffering'; queue: PendingLogEntry[] }
  | { phase: 'draining'; handler: LoggingHandler };

export class DeferredLogBuffer {
  private state: BufferState = { phase: 'buffering', queue: [] };

  get phase(): BufferState['phase'] {
    return this.state.phase;
  }

  /**
   * Number of queued entries (always 0 once a handler is attached)
   */
  get pending(): number {
    return this.state.phase === 'buffering' ? this.state.queue.length : 0;
  }

  get handler(): LoggingHandler | null {
    return this.state.phase === 'draining' ? this.state.handler : null;
  }

  write(entry: PendingLogEntry): void {
    if (this.state.phase === 'buffering') {
      this.state.queue.push(entry);
      return;
    }

    deliver(this.state.handler, entry);
  }

  /**
   * Attach a handler. The first attachment flushes everything queued so far.
   */
  attach(handler: LoggingHandler): void {
    if (this.state.phase === 'buffering') {
      // Entries the handler itself logs while draining land on the same queue
      const queue = this.state.queue;
      for (let entry = queue.shift(); entry !== undefined; entry = queue.shift()) {
        deliver(handler, entry);
      }
    }

    this.state = { phase: 'draining', handler };
  }
}

function produce(entry: PendingLogEntry): string {
  if (typeof entry.message === 'string') {
    return entry.message;
  }

  try {
    return entry.message();
  } catch (error) {
    return `<log message producer threw: ${error instanceof Error ? error.message : String(error)}>`;
  }
}

function deliver(handler: LoggingHandler, entry: PendingLogEntry): void {
  if (!supportsLevel(handler, entry.level)) {
    return;
  }

  const delivered: LogEntry = { ...entry, message: produce(entry) };
  try {
    handler.log(delivered);
  } catch (error) {
    console.error(`Logging handler failed on [${delivered.scope}] ${delivered.message}`, error);
  }
}
