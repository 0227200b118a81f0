// Runtime error types

import type { ModuleIdentity, PoolName } from '@patchwork/protocol';

/**
 * Base class for all runtime errors.
 * Provides structured error information for debugging and logging.
 */
export class PatchworkError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'PatchworkError';
    this.code = code;
  }
}

/**
 * Error when a module identity is registered twice in a pool.
 */
export class DuplicateResolutionError extends PatchworkError {
  readonly pool: PoolName;
  readonly identity: ModuleIdentity;

  constructor(pool: PoolName, identity: ModuleIdentity) {
    super('DUPLICATE_RESOLUTION', `Module ${identity} is already resolved in the ${pool} pool`);
    this.name = 'DuplicateResolutionError';
    this.pool = pool;
    this.identity = identity;
  }
}

/**
 * Error when a module could not be read or evaluated.
 */
export class ModuleResolutionError extends PatchworkError {
  readonly pool: PoolName;
  readonly identity: ModuleIdentity;
  readonly cause?: Error;

  constructor(pool: PoolName, identity: ModuleIdentity, cause?: Error) {
    super(
      'MODULE_RESOLUTION_ERROR',
      `Failed to resolve module ${identity} in the ${pool} pool${cause ? `: ${cause.message}` : ''}`
    );
    this.name = 'ModuleResolutionError';
    this.pool = pool;
    this.identity = identity;
    this.cause = cause;
  }
}

/**
 * Error when a module definition is requested after its resolution started.
 */
export class ModuleAlreadyResolvedError extends PatchworkError {
  readonly pool: PoolName;
  readonly identity: ModuleIdentity;

  constructor(pool: PoolName, identity: ModuleIdentity) {
    super(
      'MODULE_ALREADY_RESOLVED',
      `Module ${identity} in the ${pool} pool can no longer be patched: resolution has started`
    );
    this.name = 'ModuleAlreadyResolvedError';
    this.pool = pool;
    this.identity = identity;
  }
}

/**
 * Error when a participant archive cannot be turned into a participant.
 */
export class ParticipantLoadError extends PatchworkError {
  readonly archivePath: string;
  readonly cause?: Error;

  constructor(archivePath: string, reason: string, cause?: Error) {
    super('PARTICIPANT_LOAD_ERROR', `Failed to load participant from ${archivePath}: ${reason}`);
    this.name = 'ParticipantLoadError';
    this.archivePath = archivePath;
    this.cause = cause;
  }
}

/**
 * Error when a participant path or manifest id is already loaded.
 */
export class ParticipantAlreadyLoadedError extends PatchworkError {
  readonly archivePath: string;
  readonly existingPath: string;

  constructor(archivePath: string, existingPath: string) {
    super(
      'PARTICIPANT_ALREADY_LOADED',
      archivePath === existingPath
        ? `Participant ${archivePath} is already loaded`
        : `Participant ${archivePath} has the same id as the already loaded ${existingPath}`
    );
    this.name = 'ParticipantAlreadyLoadedError';
    this.archivePath = archivePath;
    this.existingPath = existingPath;
  }
}

/**
 * Error when a patch module's exports do not describe a patch.
 */
export class PatchLoadError extends PatchworkError {
  readonly participantTitle: string;
  readonly entryPath: string;
  readonly problems: string[];

  constructor(participantTitle: string, entryPath: string, problems: string[]) {
    super(
      'PATCH_LOAD_ERROR',
      `Module ${entryPath} of participant [${participantTitle}] is not a valid patch: ${problems.join('; ')}`
    );
    this.name = 'PatchLoadError';
    this.participantTitle = participantTitle;
    this.entryPath = entryPath;
    this.problems = problems;
  }
}

/**
 * Error when a patch is activated a second time.
 */
export class PatchAlreadyAppliedError extends PatchworkError {
  readonly patchName: string;
  readonly participantTitle: string;

  constructor(patchName: string, participantTitle: string) {
    super(
      'PATCH_ALREADY_APPLIED',
      `Patch [${patchName}] from participant [${participantTitle}] has already been applied`
    );
    this.name = 'PatchAlreadyAppliedError';
    this.patchName = patchName;
    this.participantTitle = participantTitle;
  }
}

/**
 * Error when the full pipeline is started from the wrong phase.
 */
export class PipelineStateError extends PatchworkError {
  readonly phase: string;
  readonly expected: string;

  constructor(phase: string, expected: string) {
    super('PIPELINE_STATE_ERROR', `Pipeline is in phase ${phase}, expected ${expected}`);
    this.name = 'PipelineStateError';
    this.phase = phase;
    this.expected = expected;
  }
}

/**
 * Error when a config section value fails its schema.
 */
export class ConfigValidationError extends PatchworkError {
  readonly ownerId: string;
  readonly sectionId: string;
  readonly problems: string[];

  constructor(ownerId: string, sectionId: string, problems: string[]) {
    super(
      'CONFIG_VALIDATION_ERROR',
      `Invalid value for config section ${sectionId} of ${ownerId}: ${problems.join('; ')}`
    );
    this.name = 'ConfigValidationError';
    this.ownerId = ownerId;
    this.sectionId = sectionId;
    this.problems = problems;
  }
}

/**
 * Error when a config section id is loaded twice in one scope.
 */
export class ConfigSectionConflictError extends PatchworkError {
  readonly ownerId: string;
  readonly sectionId: string;

  constructor(ownerId: string, sectionId: string) {
    super('CONFIG_SECTION_CONFLICT', `Config section ${sectionId} of ${ownerId} is already loaded`);
    this.name = 'ConfigSectionConflictError';
    this.ownerId = ownerId;
    this.sectionId = sectionId;
  }
}

/**
 * Error when a config scope fails to save.
 */
export class ConfigSaveError extends PatchworkError {
  readonly ownerId: string;
  readonly ownerTitle: string;
  readonly cause?: Error;

  constructor(ownerId: string, ownerTitle: string, cause?: Error) {
    super(
      'CONFIG_SAVE_ERROR',
      `Config of [${ownerTitle}] failed to save${cause ? `: ${cause.message}` : ''}`
    );
    this.name = 'ConfigSaveError';
    this.ownerId = ownerId;
    this.ownerTitle = ownerTitle;
    this.cause = cause;
  }
}

/**
 * Normalize anything thrown into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
