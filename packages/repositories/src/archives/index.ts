export {
  type ArchiveFileSystem,
  type ArchiveOpener,
  ArchiveOpenError,
  ArchiveEntryNotFoundError,
  ArchiveClosedError,
  normalizeEntryPath,
} from './types.js';
export { openZipArchive, openZipArchiveFromBuffer } from './zip.js';
export { createInMemoryArchive, createInMemoryArchiveOpener } from './in-memory.js';
