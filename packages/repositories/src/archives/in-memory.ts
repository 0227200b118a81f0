// In-memory participant archives for testing

import type { ArchiveFileSystem, ArchiveOpener } from './types.js';
import {
  ArchiveClosedError,
  ArchiveEntryNotFoundError,
  ArchiveOpenError,
  filterByPrefix,
  normalizeEntryPath,
} from './types.js';

/**
 * Create an archive from a record of entry path to text content.
 */
export function createInMemoryArchive(
  archivePath: string,
  files: Record<string, string>
): ArchiveFileSystem & { closed: boolean } {
  const entries = new Map(
    Object.entries(files).map(([name, content]) => [normalizeEntryPath(name), content])
  );

  const archive = {
    path: archivePath,
    closed: false,

    async exists(entryPath: string): Promise<boolean> {
      ensureOpen();
      return entries.has(normalizeEntryPath(entryPath));
    },

    async readText(entryPath: string): Promise<string> {
      ensureOpen();
      const name = normalizeEntryPath(entryPath);
      const content = entries.get(name);
      if (content === undefined) {
        throw new ArchiveEntryNotFoundError(archivePath, name);
      }
      return content;
    },

    async listFiles(prefix?: string): Promise<string[]> {
      ensureOpen();
      return filterByPrefix(Array.from(entries.keys()).sort(), prefix);
    },

    close() {
      archive.closed = true;
    },
  };

  function ensureOpen() {
    if (archive.closed) {
      throw new ArchiveClosedError(archivePath);
    }
  }

  return archive;
}

/**
 * Create an opener over a fixed set of archives.
 * Paths without an entry fail to open, like a corrupt file would.
 */
export function createInMemoryArchiveOpener(
  archives: Record<string, Record<string, string>>
): ArchiveOpener & { opened: Map<string, ArchiveFileSystem & { closed: boolean }> } {
  const opened = new Map<string, ArchiveFileSystem & { closed: boolean }>();

  const opener = async (archivePath: string) => {
    const files = archives[archivePath];
    if (!files) {
      throw new ArchiveOpenError(archivePath, 'not a readable archive');
    }

    const archive = createInMemoryArchive(archivePath, files);
    opened.set(archivePath, archive);
    return archive;
  };

  return Object.assign(opener, { opened });
}
