// @patchwork/runtime
// Participant discovery, module resolution and the patching pipeline

// Orchestrator (the pipeline: discover → early patches → host → patches)
export {
  Orchestrator,
  PIPELINE_PHASES,
  RUNNING_PHASE,
  SANDBOX_RUNTIME_MODULES,
  type OrchestratorOptions,
  type OrchestratorPhase,
  type PipelinePhase,
  type PipelineStage,
  type ShutdownResult,
} from './orchestrator/index.js';

// Error types
export {
  PatchworkError,
  DuplicateResolutionError,
  ModuleResolutionError,
  ModuleAlreadyResolvedError,
  ParticipantLoadError,
  ParticipantAlreadyLoadedError,
  PatchLoadError,
  PatchAlreadyAppliedError,
  PipelineStateError,
  ConfigValidationError,
  ConfigSectionConflictError,
  ConfigSaveError,
  toError,
} from './errors.js';

// Participants and their patches
export { Participant } from './participants/index.js';
export { EarlyPatch, Patch } from './patches/index.js';

// Module resolution (host and patch pools, cross-pool lookup)
export {
  ResolutionPool,
  ModuleResolver,
  createDirectoryModuleSource,
  createPatchModuleSource,
  createSandboxEvaluator,
  createStaticEvaluator,
  patchModuleIdentity,
  parsePatchModuleIdentity,
  toModuleExports,
  type ModuleEvaluator,
  type ModulePool,
  type ModuleSource,
  type PatchModuleOwner,
  type PoolLoadResult,
  type ResolutionFailure,
  type SandboxEvaluatorOptions,
  type StaticModule,
} from './resolution/index.js';

// Config scopes and locations
export {
  Config,
  ConfigChangeHub,
  ConfigSection,
  LocationResolver,
  ModLocation,
  defineConfigSection,
  defaultLocations,
  locationConfigSchema,
  locationsSection,
  type ConfigChangedEvent,
  type ConfigChangedHandler,
  type ConfigOptions,
  type ConfigSectionDefinition,
} from './config/index.js';

// Serialization
export {
  Serializer,
  JsonConverter,
  type JsonConverterClass,
  type JsonValue,
} from './serialization/index.js';

// Logging
export {
  DeferredLogBuffer,
  Logger,
  LOG_LEVEL_SEVERITY,
  consoleLoggingHandler,
  createCapturingHandler,
  createConsoleLoggingHandler,
  errorData,
  silentLoggingHandler,
  supportsLevel,
  type LogEntry,
  type LoggingHandler,
  type PendingLogEntry,
} from './logging/index.js';

// Utilities
export { Mutex } from './util/mutex.js';
export { createDeferred, type Deferred } from './util/deferred.js';
export { tryInvokeAll } from './util/invoke.js';
