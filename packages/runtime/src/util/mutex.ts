// Async mutual exclusion.
//
// Callers queue in FIFO order on a promise chain; each one runs only after the
// previous holder released.

import { createDeferred } from './deferred.js';

export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;

  /**
   * Whether someone holds or waits for the lock
   */
  get isLocked(): boolean {
    return this.holders > 0;
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const released = createDeferred<void>();
    const previous = this.tail;
    this.tail = previous.then(() => released.promise);
    this.holders += 1;

    await previous;
    try {
      return await fn();
    } finally {
      this.holders -= 1;
      released.resolve();
    }
  }
}
