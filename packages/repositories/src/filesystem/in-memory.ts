// In-memory LocationFileSystem for testing

import * as path from 'node:path';
import type { ListFilesOptions, LocationFileSystem } from './types.js';

function parents(filePath: string): string[] {
  const result: string[] = [];
  let dir = path.posix.dirname(filePath);
  while (dir && dir !== '.' && dir !== '/') {
    result.push(dir);
    dir = path.posix.dirname(dir);
  }
  return result;
}

function notFound(syscall: string, target: string): Error {
  return Object.assign(new Error(`ENOENT: no such file or directory, ${syscall} '${target}'`), {
    code: 'ENOENT',
  });
}

/**
 * Create an in-memory filesystem.
 * Accepts file paths (empty content) or a record of path to content.
 * Paths use forward slashes; parent directories exist implicitly.
 */
export function createInMemoryFileSystem(
  initialFiles: string[] | Record<string, string> = []
): LocationFileSystem & {
  files: Map<string, string>;
  directories: Set<string>;
} {
  const files = new Map<string, string>();
  const directories = new Set<string>();

  const addDirectory = (dirPath: string) => {
    directories.add(dirPath);
    for (const dir of parents(dirPath)) {
      directories.add(dir);
    }
  };

  const entries = Array.isArray(initialFiles)
    ? initialFiles.map((filePath): [string, string] => [filePath, ''])
    : Object.entries(initialFiles);

  for (const [filePath, content] of entries) {
    files.set(filePath, content);
    for (const dir of parents(filePath)) {
      directories.add(dir);
    }
  }

  return {
    files,
    directories,

    async exists(filePath: string): Promise<boolean> {
      return files.has(filePath) || directories.has(filePath);
    },

    async isFile(filePath: string): Promise<boolean> {
      return files.has(filePath);
    },

    async readText(filePath: string): Promise<string> {
      const content = files.get(filePath);
      if (content === undefined) {
        throw notFound('open', filePath);
      }
      return content;
    },

    async mkdir(dirPath: string): Promise<void> {
      addDirectory(dirPath);
    },

    async listFiles(directory: string, options: ListFilesOptions = {}): Promise<string[]> {
      if (!directories.has(directory)) {
        throw notFound('scandir', directory);
      }

      const prefix = directory.replace(/\/?$/, '/');
      return Array.from(files.keys())
        .filter((file) => {
          if (!file.startsWith(prefix)) {
            return false;
          }
          return options.recursive || !file.slice(prefix.length).includes('/');
        })
        .sort();
    },
  };
}
