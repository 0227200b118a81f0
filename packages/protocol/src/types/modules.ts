// Module types shared by the resolution pools and the patches that use them

import type { ModuleIdentity } from './common.js';

/**
 * The pre-load form of a module.
 * Early patches rewrite `source` before the module is resolved.
 */
export type ModuleDefinition = {
  identity: ModuleIdentity;

  /**
   * Where the source came from (file path or archive path)
   */
  location: string;

  source: string;
};

/**
 * The resolved (evaluated) form of a module: its exports.
 */
export type ModuleExports = Record<string, unknown>;

/**
 * Which pool served a lookup
 */
export type PoolName = 'host' | 'patch';

/**
 * Successful cross-pool lookup
 */
export type ModuleLookupResult = {
  pool: PoolName;
  module: ModuleExports;
};

/**
 * Cross-pool lookup function exposed to patches.
 * Resolves to null when neither pool ever resolves the identity.
 */
export type ModuleLookup = (identity: ModuleIdentity) => Promise<ModuleLookupResult | null>;
