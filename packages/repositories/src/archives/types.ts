// Participant archive abstractions.
// Every participant is backed by a read-only filesystem rooted at its archive.

/**
 * Random-access view of one archive's files.
 * Entry paths are relative and use forward slashes.
 */
export interface ArchiveFileSystem {
  /**
   * Path of the archive file this view is rooted at
   */
  readonly path: string;

  /**
   * Check if a file entry exists.
   */
  exists(entryPath: string): Promise<boolean>;

  /**
   * Read a file entry as UTF-8 text.
   * @throws ArchiveEntryNotFoundError if the entry does not exist
   */
  readText(entryPath: string): Promise<string>;

  /**
   * List file entries, optionally only those under a directory prefix.
   */
  listFiles(prefix?: string): Promise<string[]>;

  /**
   * Release the archive. Further reads are not allowed.
   */
  close(): void;
}

/**
 * Opens the archive at a path. Throws when the file is missing or unreadable.
 */
export type ArchiveOpener = (archivePath: string) => Promise<ArchiveFileSystem>;

/**
 * Error when an archive cannot be opened
 */
export class ArchiveOpenError extends Error {
  readonly code = 'ARCHIVE_OPEN_ERROR';
  readonly archivePath: string;
  readonly cause?: Error;

  constructor(archivePath: string, reason: string, cause?: Error) {
    super(`Cannot open archive ${archivePath}: ${reason}`);
    this.name = 'ArchiveOpenError';
    this.archivePath = archivePath;
    this.cause = cause;
  }
}

/**
 * Error when a requested entry is not in the archive
 */
export class ArchiveEntryNotFoundError extends Error {
  readonly code = 'ARCHIVE_ENTRY_NOT_FOUND';
  readonly archivePath: string;
  readonly entryPath: string;

  constructor(archivePath: string, entryPath: string) {
    super(`Entry ${entryPath} not found in archive ${archivePath}`);
    this.name = 'ArchiveEntryNotFoundError';
    this.archivePath = archivePath;
    this.entryPath = entryPath;
  }
}

/**
 * Error when an archive is used after close()
 */
export class ArchiveClosedError extends Error {
  readonly code = 'ARCHIVE_CLOSED';
  readonly archivePath: string;

  constructor(archivePath: string) {
    super(`Archive ${archivePath} is closed`);
    this.name = 'ArchiveClosedError';
    this.archivePath = archivePath;
  }
}

/**
 * Normalize an entry path: forward slashes, no leading "./" or "/".
 */
export function normalizeEntryPath(entryPath: string): string {
  return entryPath.replace(/\\/g, '/').replace(/^(\.\/|\/)+/, '');
}

/**
 * Keep the entries under a directory prefix.
 */
export function filterByPrefix(entries: string[], prefix?: string): string[] {
  if (!prefix) {
    return entries;
  }

  const directory = normalizeEntryPath(prefix).replace(/\/?$/, '/');
  return entries.filter((entry) => entry.startsWith(directory));
}
