// Cross-pool module lookup
//
// A lookup asks the host pool first, then the patch pool. Both questions are
// asked inside one mutex, so two concurrent lookups never see an identity
// "missing from host" and "present in patch" in different orders. The pools'
// own write paths do not take this mutex, which is why waiting inside it
// cannot deadlock against a running loadAll().

import type {
  ModuleDefinition,
  ModuleExports,
  ModuleIdentity,
  ModuleLookupResult,
} from '@patchwork/protocol';
import { Mutex } from '../util/mutex.js';
import type { ResolutionPool } from './pool.js';

export type ModulePool = ResolutionPool<ModuleDefinition, ModuleExports>;

export class ModuleResolver {
  private readonly mutex = new Mutex();

  constructor(
    readonly hostPool: ModulePool,
    readonly patchPool: ModulePool
  ) {}

  /**
   * Find a resolved module in the host pool, then the patch pool.
   * Waits while the identity is being resolved in either pool.
   */
  resolveModule(identity: ModuleIdentity): Promise<ModuleLookupResult | null> {
    return this.mutex.runExclusive(async (): Promise<ModuleLookupResult | null> => {
      const hostModule = await this.hostPool.tryWaitForResolution(identity);
      if (hostModule) {
        return { pool: 'host', module: hostModule };
      }

      const patchModule = await this.patchPool.tryWaitForResolution(identity);
      if (patchModule) {
        return { pool: 'patch', module: patchModule };
      }

      return null;
    });
  }
}
