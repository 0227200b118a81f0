// Tests for the async mutex

import { describe, it, expect } from 'vitest';
import { createDeferred } from './deferred.js';
import { Mutex } from './mutex.js';

describe('Mutex', () => {
  it('should run holders one at a time in FIFO order', async () => {
    const mutex = new Mutex();
    const gate = createDeferred<void>();
    const events: string[] = [];

    const first = mutex.runExclusive(async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
      return 1;
    });
    const second = mutex.runExclusive(() => {
      events.push('second');
      return 2;
    });

    await Promise.resolve();
    expect(mutex.isLocked).toBe(true);
    gate.resolve();

    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
    expect(mutex.isLocked).toBe(false);
  });

  it('should release the lock when the holder throws', async () => {
    const mutex = new Mutex();

    await expect(
      mutex.runExclusive(() => {
        throw new Error('holder failed');
      })
    ).rejects.toThrow('holder failed');

    expect(await mutex.runExclusive(() => 'next')).toBe('next');
  });
});
