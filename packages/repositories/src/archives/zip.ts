// Zip-backed participant archives (adm-zip)

import AdmZip from 'adm-zip';
import type { ArchiveFileSystem } from './types.js';
import {
  ArchiveClosedError,
  ArchiveEntryNotFoundError,
  ArchiveOpenError,
  filterByPrefix,
  normalizeEntryPath,
} from './types.js';

class ZipArchiveFileSystem implements ArchiveFileSystem {
  private zip: AdmZip | null;
  private readonly entries: Set<string>;

  constructor(
    readonly path: string,
    zip: AdmZip
  ) {
    this.zip = zip;
    this.entries = new Set(
      zip
        .getEntries()
        .filter((entry) => !entry.isDirectory)
        .map((entry) => normalizeEntryPath(entry.entryName))
    );
  }

  async exists(entryPath: string): Promise<boolean> {
    this.open();
    return this.entries.has(normalizeEntryPath(entryPath));
  }

  async readText(entryPath: string): Promise<string> {
    const zip = this.open();
    const name = normalizeEntryPath(entryPath);
    const entry = this.entries.has(name) ? zip.getEntry(name) : null;

    if (!entry) {
      throw new ArchiveEntryNotFoundError(this.path, name);
    }

    return entry.getData().toString('utf-8');
  }

  async listFiles(prefix?: string): Promise<string[]> {
    this.open();
    return filterByPrefix(Array.from(this.entries).sort(), prefix);
  }

  close(): void {
    this.zip = null;
  }

  private open(): AdmZip {
    if (!this.zip) {
      throw new ArchiveClosedError(this.path);
    }
    return this.zip;
  }
}

function toOpenError(archivePath: string, error: unknown): ArchiveOpenError {
  const cause = error instanceof Error ? error : new Error(String(error));
  return new ArchiveOpenError(archivePath, cause.message, cause);
}

/**
 * Open a zip archive from disk.
 */
export async function openZipArchive(archivePath: string): Promise<ArchiveFileSystem> {
  try {
    return new ZipArchiveFileSystem(archivePath, new AdmZip(archivePath));
  } catch (error) {
    throw toOpenError(archivePath, error);
  }
}

/**
 * Open a zip archive held in memory. `archivePath` only names it.
 */
export function openZipArchiveFromBuffer(archivePath: string, data: Buffer): ArchiveFileSystem {
  try {
    return new ZipArchiveFileSystem(archivePath, new AdmZip(data));
  } catch (error) {
    throw toOpenError(archivePath, error);
  }
}
