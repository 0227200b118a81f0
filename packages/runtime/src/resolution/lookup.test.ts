// Tests for the cross-pool module lookup

import { describe, it, expect } from 'vitest';
import type { ModuleDefinition, ModuleExports } from '@patchwork/protocol';
import { DeferredLogBuffer, Logger, silentLoggingHandler } from '../logging/index.js';
import { createDeferred, type Deferred } from '../util/deferred.js';
import { ModuleResolver } from './lookup.js';
import { ResolutionPool, type ModuleSource } from './pool.js';

// --- Test Fixtures ---

function createLogger(): Logger {
  const buffer = new DeferredLogBuffer();
  buffer.attach(silentLoggingHandler);
  return new Logger(buffer, 'lookup');
}

function createSource(
  modules: Record<string, ModuleExports>,
  hooks: { started?: Deferred<void>; gate?: Promise<void> } = {}
): ModuleSource<ModuleDefinition, ModuleExports> {
  return {
    list: async () => Object.keys(modules),
    read: async (identity) => ({ identity, location: `${identity}.js`, source: '' }),
    load: async (identity) => {
      hooks.started?.resolve();
      await hooks.gate;
      return modules[identity] ?? {};
    },
  };
}

function createResolver(
  host: ModuleSource<ModuleDefinition, ModuleExports>,
  patch: ModuleSource<ModuleDefinition, ModuleExports> = createSource({})
) {
  const logger = createLogger();
  const hostPool = new ResolutionPool('host', host, logger);
  const patchPool = new ResolutionPool('patch', patch, logger);
  return { hostPool, patchPool, resolver: new ModuleResolver(hostPool, patchPool) };
}

// --- Tests ---

describe('ModuleResolver.resolveModule', () => {
  it('should give concurrent callers the module loadAll is resolving', async () => {
    const started = createDeferred<void>();
    const gate = createDeferred<void>();
    const core = { name: 'Core' };
    const { hostPool, resolver } = createResolver(
      createSource({ Core: core }, { started, gate: gate.promise })
    );

    const loading = hostPool.loadAll();
    await started.promise;
    const first = resolver.resolveModule('Core');
    const second = resolver.resolveModule('Core');
    gate.resolve();

    const [a, b] = await Promise.all([first, second]);
    await loading;

    expect(a).toEqual({ pool: 'host', module: core });
    expect(b?.module).toBe(a?.module);
    expect(a?.module).toBe(core);
  });

  it('should fall back to the patch pool', async () => {
    const { patchPool, resolver } = createResolver(createSource({}));
    const patchModule = { patched: true };
    patchPool.register('better-ui:patches/menu.js', patchModule);

    expect(await resolver.resolveModule('better-ui:patches/menu.js')).toEqual({
      pool: 'patch',
      module: patchModule,
    });
  });

  it('should prefer the host pool when both pools hold the identity', async () => {
    const { hostPool, patchPool, resolver } = createResolver(createSource({}));
    hostPool.register('Shared', { from: 'host' });
    patchPool.register('Shared', { from: 'patch' });

    expect((await resolver.resolveModule('Shared'))?.pool).toBe('host');
  });

  it('should return null when neither pool resolves the identity', async () => {
    const { resolver } = createResolver(createSource({}));

    expect(await resolver.resolveModule('Unknown')).toBeNull();
  });
});
