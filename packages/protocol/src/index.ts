// @patchwork/protocol
// Shared types and validation for participants, patches, modules and config

export * from './types/index.js';

export {
  participantManifestSchema,
  validateManifest,
  parseManifest,
  type ManifestValidationError,
  type ManifestValidationResult,
} from './validation/manifest.js';

export {
  readEarlyPatchExport,
  readPatchExport,
  type PatchExportResult,
} from './validation/patches.js';
