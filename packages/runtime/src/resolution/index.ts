export {
  ResolutionPool,
  type ModuleSource,
  type PoolLoadResult,
  type ResolutionFailure,
} from './pool.js';
export { ModuleResolver, type ModulePool } from './lookup.js';
export {
  createSandboxEvaluator,
  createStaticEvaluator,
  toModuleExports,
  type ModuleEvaluator,
  type SandboxEvaluatorOptions,
  type StaticModule,
} from './evaluator.js';
export {
  createDirectoryModuleSource,
  createPatchModuleSource,
  patchModuleIdentity,
  parsePatchModuleIdentity,
  type PatchModuleOwner,
} from './sources.js';
