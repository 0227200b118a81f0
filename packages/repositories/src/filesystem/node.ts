// Node.js filesystem implementation of LocationFileSystem

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { ListFilesOptions, LocationFileSystem } from './types.js';

async function walk(directory: string, recursive: boolean, files: string[]): Promise<void> {
  const entries = await fs.readdir(directory, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = path.join(directory, entry.name);
    if (entry.isFile()) {
      files.push(fullPath);
    } else if (recursive && entry.isDirectory()) {
      await walk(fullPath, recursive, files);
    }
  }
}

/**
 * Create a LocationFileSystem backed by the local filesystem.
 */
export function createNodeFileSystem(): LocationFileSystem {
  return {
    async exists(filePath: string): Promise<boolean> {
      try {
        await fs.access(filePath);
        return true;
      } catch {
        return false;
      }
    },

    async isFile(filePath: string): Promise<boolean> {
      try {
        const stat = await fs.stat(filePath);
        return stat.isFile();
      } catch {
        return false;
      }
    },

    async readText(filePath: string): Promise<string> {
      return fs.readFile(filePath, 'utf-8');
    },

    async mkdir(dirPath: string): Promise<void> {
      await fs.mkdir(dirPath, { recursive: true });
    },

    async listFiles(directory: string, options: ListFilesOptions = {}): Promise<string[]> {
      const files: string[] = [];
      await walk(directory, options.recursive ?? false, files);
      return files.sort();
    },
  };
}
