// Patch types - what a participant's patch modules export
//
// Early patches run before the host modules are resolved and may rewrite the
// source of the modules they target. Patches run afterwards, against the
// resolved host.

import type { ModuleIdentity, PatchLogger } from './common.js';
import type { ModuleDefinition, ModuleLookup } from './modules.js';

/**
 * Who owns a running patch
 */
export type PatchOwner = {
  id: string;
  title: string;
  isGamePack: boolean;
};

/**
 * Context passed to an early patch's prepatch function
 */
export type EarlyPatchContext = {
  owner: PatchOwner;

  /**
   * Mutable definitions of the targeted host modules, keyed by identity
   */
  definitions: ReadonlyMap<ModuleIdentity, ModuleDefinition>;

  logger: PatchLogger;
};

/**
 * Context passed to a patch's onLoaded function
 */
export type PatchContext = {
  owner: PatchOwner;

  /**
   * Look up a resolved module in the host pool, then the patch pool
   */
  resolveModule: ModuleLookup;

  logger: PatchLogger;
};

/**
 * Default export of an early patch module
 */
export type EarlyPatchDefinition = {
  name: string;

  /**
   * Host modules this patch rewrites
   */
  targets: ModuleIdentity[];

  prepatch(ctx: EarlyPatchContext): void | Promise<void>;
};

/**
 * Default export of a patch module
 */
export type PatchDefinition = {
  name: string;

  onLoaded(ctx: PatchContext): void | Promise<void>;
};
