// Tests for the module resolution pool

import { describe, it, expect, vi } from 'vitest';
import { DuplicateResolutionError, ModuleAlreadyResolvedError, ModuleResolutionError } from '../errors.js';
import { DeferredLogBuffer, Logger, createCapturingHandler } from '../logging/index.js';
import { createDeferred } from '../util/deferred.js';
import { ResolutionPool, type ModuleSource } from './pool.js';

// --- Test Fixtures ---

type Definition = { identity: string; text: string };
type Module = { identity: string; value: string };

function createLogger() {
  const buffer = new DeferredLogBuffer();
  const handler = createCapturingHandler();
  buffer.attach(handler);
  return { logger: new Logger(buffer, 'pool'), handler };
}

function createSource(
  texts: Record<string, string>,
  overrides: Partial<ModuleSource<Definition, Module>> = {}
): ModuleSource<Definition, Module> {
  return {
    list: async () => Object.keys(texts),
    read: async (identity) => {
      const text = texts[identity];
      if (text === undefined) {
        throw new Error(`unknown module ${identity}`);
      }
      return { identity, text };
    },
    load: async (identity, definition) => ({ identity, value: definition.text.toUpperCase() }),
    ...overrides,
  };
}

function createPool(source: ModuleSource<Definition, Module>) {
  const { logger, handler } = createLogger();
  return { pool: new ResolutionPool<Definition, Module>('host', source, logger), handler };
}

// --- Tests ---

describe('ResolutionPool.register', () => {
  it('should keep the first module when an identity is registered twice', async () => {
    const { pool } = createPool(createSource({}));
    const first = { identity: 'Core', value: 'm' };
    const second = { identity: 'Core', value: 'm2' };

    pool.register('Core', first);

    expect(() => pool.register('Core', second)).toThrow(DuplicateResolutionError);
    expect(await pool.tryWaitForResolution('Core')).toBe(first);
  });

  it('should report a duplicate through tryRegister', () => {
    const { pool } = createPool(createSource({}));

    expect(pool.tryRegister('Core', { identity: 'Core', value: 'a' })).toBe(true);
    expect(pool.tryRegister('Core', { identity: 'Core', value: 'b' })).toBe(false);
  });
});

describe('ResolutionPool.tryWaitForResolution', () => {
  it('should return null for an identity that was never requested', async () => {
    const { pool } = createPool(createSource({}));

    expect(await pool.tryWaitForResolution('Missing')).toBeNull();
  });

  it('should wake a waiter registered before the module is (no lost wakeup)', async () => {
    const started = createDeferred<void>();
    const gate = createDeferred<void>();
    const { pool } = createPool(
      createSource(
        { Core: 'core' },
        {
          load: async (identity) => {
            started.resolve();
            await gate.promise;
            return { identity, value: 'late' };
          },
        }
      )
    );
    const registered = { identity: 'Core', value: 'registered' };

    const loading = pool.loadAll();
    await started.promise;
    const waiting = pool.tryWaitForResolution('Core');
    pool.register('Core', registered);
    gate.resolve();

    expect(await waiting).toBe(registered);
    await loading;
    expect(await pool.tryWaitForResolution('Core')).toBe(registered);
  });

  it('should wake waiters with null when the identity is abandoned', async () => {
    const gate = createDeferred<void>();
    const { pool } = createPool(
      createSource(
        { Core: 'core' },
        {
          load: async () => {
            await gate.promise;
            throw new Error('evaluation failed');
          },
        }
      )
    );

    const resolving = pool.resolve('Core');
    const waiting = pool.tryWaitForResolution('Core');
    gate.resolve();

    await expect(resolving).rejects.toThrow(ModuleResolutionError);
    expect(await waiting).toBeNull();
    expect(pool.failures.get('Core')?.message).toBe('evaluation failed');
  });
});

describe('ResolutionPool.resolve', () => {
  it('should share one attempt between concurrent callers', async () => {
    const load = vi.fn(async (identity: string, definition: Definition) => ({
      identity,
      value: definition.text,
    }));
    const { pool } = createPool(createSource({ Core: 'core' }, { load }));

    const [a, b] = await Promise.all([pool.resolve('Core'), pool.resolve('Core')]);

    expect(a).toBe(b);
    expect(load).toHaveBeenCalledTimes(1);
    expect(pool.has('Core')).toBe(true);
  });

  it('should rethrow a recorded failure on later calls', async () => {
    const { pool } = createPool(createSource({}));

    await expect(pool.resolve('Ghost')).rejects.toThrow(
      'Failed to resolve module Ghost in the host pool: unknown module Ghost'
    );
    await expect(pool.resolve('Ghost')).rejects.toThrow(ModuleResolutionError);
  });
});

describe('ResolutionPool.getDefinition', () => {
  it('should return the same mutable definition and load the patched one', async () => {
    const { pool } = createPool(createSource({ Core: 'core' }));

    const definition = await pool.getDefinition('Core');
    definition.text = 'patched';

    expect(await pool.getDefinition('Core')).toBe(definition);
    expect((await pool.resolve('Core')).value).toBe('PATCHED');
  });

  it('should refuse definitions once resolution started', async () => {
    const { pool } = createPool(createSource({ Core: 'core' }));

    await pool.resolve('Core');

    await expect(pool.getDefinition('Core')).rejects.toThrow(ModuleAlreadyResolvedError);
  });
});

describe('ResolutionPool.loadAll', () => {
  it('should resolve every listed identity in sorted order', async () => {
    const { pool, handler } = createPool(createSource({ b: 'two', a: 'one', c: 'three' }));

    const result = await pool.loadAll();

    expect(result).toEqual({ resolved: ['a', 'b', 'c'], failed: [], skipped: [] });
    expect(handler.at('info').map((entry) => entry.message)).toEqual([
      'Resolved 3 of 3 module(s) in the host pool',
    ]);
  });

  it('should record failures without stopping the batch', async () => {
    const { pool, handler } = createPool(
      createSource(
        { a: 'one', b: 'two', c: 'three' },
        {
          load: async (identity, definition) => {
            if (identity === 'b') {
              throw new Error('syntax error');
            }
            return { identity, value: definition.text };
          },
        }
      )
    );

    const result = await pool.loadAll();

    expect(result.resolved).toEqual(['a', 'c']);
    expect(result.failed).toEqual([{ identity: 'b', error: 'syntax error' }]);
    expect(handler.at('error').map((entry) => entry.message)).toEqual([
      'Failed to resolve module b in the host pool',
    ]);
    expect(await pool.tryWaitForResolution('b')).toBeNull();
  });

  it('should skip identities that already have an outcome', async () => {
    const { pool } = createPool(createSource({ a: 'one', b: 'two' }));
    pool.register('a', { identity: 'a', value: 'registered' });

    const result = await pool.loadAll();

    expect(result.skipped).toEqual(['a']);
    expect(result.resolved).toEqual(['b']);
    expect(pool.identities()).toEqual(['a', 'b']);
  });
});
