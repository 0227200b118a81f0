// Filesystem config repository.
// Stores each owner's document as <directory>/<ownerId>.json.

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { ConfigDocument } from '@patchwork/protocol';
import type { ConfigRepository } from '../interfaces/index.js';

const DOCUMENT_EXTENSION = '.json';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Owner ids become file names, so anything that is not a plain name character
 * is replaced.
 */
export function configFileName(ownerId: string): string {
  return `${ownerId.replace(/[^a-zA-Z0-9._-]/g, '_')}${DOCUMENT_EXTENSION}`;
}

export class FileConfigRepository implements ConfigRepository {
  constructor(private readonly directory: string) {}

  async load(ownerId: string): Promise<ConfigDocument | null> {
    const filePath = path.join(this.directory, configFileName(ownerId));

    let content: string;
    let updatedAt: Date;
    try {
      content = await fs.readFile(filePath, 'utf-8');
      updatedAt = (await fs.stat(filePath)).mtime;
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }

    return { ownerId, content, updatedAt: updatedAt.toISOString() };
  }

  async save(document: ConfigDocument): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true });

    // Written beside the target and renamed into place
    const filePath = path.join(this.directory, configFileName(document.ownerId));
    const tempPath = `${filePath}.tmp`;
    await fs.writeFile(tempPath, document.content, 'utf-8');
    await fs.rename(tempPath, filePath);
  }

  async listOwners(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.directory);
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }

    return entries
      .filter((entry) => entry.endsWith(DOCUMENT_EXTENSION))
      .map((entry) => entry.slice(0, -DOCUMENT_EXTENSION.length));
  }
}

/**
 * Create a config repository that keeps documents in a directory.
 */
export function createFileConfigRepository(directory: string): ConfigRepository {
  return new FileConfigRepository(directory);
}
