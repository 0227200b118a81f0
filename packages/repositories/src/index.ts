// @patchwork/repositories
// Storage contracts and implementations for the orchestrator.
//
// Interfaces define WHAT operations are available, not HOW they're implemented:
// - ConfigRepository: persisted config scopes (in-memory, JSON files, Postgres)
// - ArchiveFileSystem: read-only view of a participant archive (zip, in-memory)
// - LocationFileSystem: discovery and directory creation (node:fs, in-memory)

export * from './interfaces/index.js';
export { createInMemoryConfigRepository, type InMemoryConfigRepository } from './in-memory/index.js';
export {
  FileConfigRepository,
  createFileConfigRepository,
  configFileName,
} from './files/config-repository.js';
export * from './archives/index.js';
export * from './filesystem/index.js';
export * as postgres from './postgres/index.js';
