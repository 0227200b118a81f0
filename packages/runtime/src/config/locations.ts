// Locations
//
// Where participant archives are discovered and which directories the
// orchestrator creates before loading anything. Relative paths are resolved
// against the orchestrator's base directory.

import * as path from 'node:path';
import { z } from 'zod';
import {
  PARTICIPANT_ARCHIVE_EXTENSION,
  type LocationConfig,
  type ModLocationConfig,
} from '@patchwork/protocol';
import type { LocationFileSystem } from '@patchwork/repositories';
import { defineConfigSection } from './config.js';

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

const modLocationSchema = z.object({
  path: z.string().min(1),
  recursive: z.boolean().default(true),
  ignorePatterns: z
    .array(z.string().refine(isValidPattern, { message: 'Invalid regular expression' }))
    .default([]),
});

export const locationConfigSchema = z.object({
  configs: z.string().min(1),
  gamePacks: z.string().min(1),
  libs: z.string().min(1),
  mods: z.array(modLocationSchema),
});

export function defaultLocations(): LocationConfig {
  return {
    configs: './config',
    gamePacks: './gamepacks',
    libs: './libs',
    mods: [{ path: './mods', recursive: true, ignorePatterns: [] }],
  };
}

export const locationsSection = defineConfigSection<LocationConfig>({
  id: 'locations',
  description: 'Directories searched for game packs and mods',
  schema: locationConfigSchema,
  defaults: defaultLocations,
});

function isArchive(file: string): boolean {
  return file.toLowerCase().endsWith(PARTICIPANT_ARCHIVE_EXTENSION);
}

/**
 * One directory searched for mod archives
 */
export class ModLocation {
  constructor(
    readonly directory: string,
    readonly recursive: boolean,
    readonly ignorePatterns: string[],
    private readonly fileSystem: LocationFileSystem
  ) {}

  /**
   * Candidate archive paths, sorted.
   * @throws when the directory cannot be listed or an ignore pattern is not a valid regex
   */
  async search(): Promise<string[]> {
    const ignore = this.ignorePatterns.map((pattern) => new RegExp(pattern));
    const files = await this.fileSystem.listFiles(this.directory, { recursive: this.recursive });
    return files.filter((file) => isArchive(file) && !ignore.some((pattern) => pattern.test(file)));
  }

  toString(): string {
    return `${this.directory}${this.recursive ? ' (recursive)' : ''}`;
  }
}

export class LocationResolver {
  constructor(
    private readonly config: () => LocationConfig,
    private readonly fileSystem: LocationFileSystem,
    readonly baseDirectory: string
  ) {}

  get configs(): string {
    return this.resolve(this.config().configs);
  }

  get gamePacks(): string {
    return this.resolve(this.config().gamePacks);
  }

  get libs(): string {
    return this.resolve(this.config().libs);
  }

  get mods(): ModLocation[] {
    return this.config().mods.map(
      (location: ModLocationConfig) =>
        new ModLocation(this.resolve(location.path), location.recursive, location.ignorePatterns, this.fileSystem)
    );
  }

  /**
   * Every directory that should exist before loading
   */
  directories(): string[] {
    return Array.from(
      new Set([this.configs, this.gamePacks, this.libs, ...this.mods.map((location) => location.directory)])
    );
  }

  /**
   * Game pack archives at the top level of the game pack directory.
   * @throws when the directory cannot be listed
   */
  async searchGamePacks(): Promise<string[]> {
    const files = await this.fileSystem.listFiles(this.gamePacks, { recursive: false });
    return files.filter(isArchive);
  }

  private resolve(location: string): string {
    return path.resolve(this.baseDirectory, location);
  }
}
