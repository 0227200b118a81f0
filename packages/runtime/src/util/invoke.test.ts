// Tests for tryInvokeAll

import { describe, it, expect } from 'vitest';
import { tryInvokeAll } from './invoke.js';

describe('tryInvokeAll', () => {
  it('should run every callback and throw one aggregate error', async () => {
    const calls: number[] = [];

    const run = tryInvokeAll(
      [
        () => {
          calls.push(1);
          throw new Error('one');
        },
        async () => {
          calls.push(2);
        },
        () => {
          calls.push(3);
          throw new Error('three');
        },
      ],
      'Callbacks failed'
    );

    const error = await run.then(
      () => null,
      (caught: unknown) => caught
    );
    expect(calls).toEqual([1, 2, 3]);
    expect(error).toBeInstanceOf(AggregateError);
    if (error instanceof AggregateError) {
      expect(error.message).toBe('Callbacks failed');
      expect(error.errors.map((inner: Error) => inner.message)).toEqual(['one', 'three']);
    }
  });

  it('should resolve when nothing throws', async () => {
    await expect(tryInvokeAll([() => {}, () => {}])).resolves.toBeUndefined();
  });
});
