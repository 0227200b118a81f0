// Module sources for the host and patch pools

import * as path from 'node:path';
import type {
  ModuleDefinition,
  ModuleExports,
  ModuleIdentity,
  ParticipantManifest,
} from '@patchwork/protocol';
import type { ArchiveFileSystem, LocationFileSystem } from '@patchwork/repositories';
import type { ModuleEvaluator } from './evaluator.js';
import type { ModuleSource } from './pool.js';

const HOST_MODULE_EXTENSION = '.js';

/**
 * Host modules: every .js file below a directory, named by its relative path
 * without extension.
 */
export function createDirectoryModuleSource(options: {
  directory: string;
  fileSystem: LocationFileSystem;
  evaluator: ModuleEvaluator;
}): ModuleSource<ModuleDefinition, ModuleExports> {
  const { directory, fileSystem, evaluator } = options;

  return {
    async list(): Promise<ModuleIdentity[]> {
      if (!(await fileSystem.exists(directory))) {
        return [];
      }

      const files = await fileSystem.listFiles(directory, { recursive: true });
      return files
        .filter((file) => file.endsWith(HOST_MODULE_EXTENSION))
        .map((file) =>
          path
            .relative(directory, file)
            .split(path.sep)
            .join('/')
            .slice(0, -HOST_MODULE_EXTENSION.length)
        );
    },

    async read(identity: ModuleIdentity): Promise<ModuleDefinition> {
      const location = path.join(directory, `${identity}${HOST_MODULE_EXTENSION}`);
      return { identity, location, source: await fileSystem.readText(location) };
    },

    async load(_identity: ModuleIdentity, definition: ModuleDefinition): Promise<ModuleExports> {
      return evaluator(definition);
    },
  };
}

/**
 * What the patch module source needs to know about a participant
 */
export type PatchModuleOwner = {
  manifest: ParticipantManifest;
  archive: ArchiveFileSystem;
};

/**
 * Identity of a patch module: "<manifest id>:<archive path>"
 */
export function patchModuleIdentity(manifestId: string, entryPath: string): ModuleIdentity {
  return `${manifestId}:${entryPath}`;
}

/**
 * Split a patch module identity into manifest id and archive path
 */
export function parsePatchModuleIdentity(
  identity: ModuleIdentity
): { manifestId: string; entryPath: string } | null {
  const separator = identity.indexOf(':');
  if (separator <= 0 || separator === identity.length - 1) {
    return null;
  }
  return { manifestId: identity.slice(0, separator), entryPath: identity.slice(separator + 1) };
}

/**
 * Patch modules: the early patch and patch modules listed by the manifests of
 * the participants currently known to the orchestrator.
 */
export function createPatchModuleSource(options: {
  owners: () => Iterable<PatchModuleOwner>;
  evaluator: ModuleEvaluator;
}): ModuleSource<ModuleDefinition, ModuleExports> {
  const findOwner = (manifestId: string): PatchModuleOwner | undefined => {
    for (const owner of options.owners()) {
      if (owner.manifest.id === manifestId) {
        return owner;
      }
    }
    return undefined;
  };

  return {
    async list(): Promise<ModuleIdentity[]> {
      const identities: ModuleIdentity[] = [];
      for (const { manifest } of options.owners()) {
        for (const entryPath of [...manifest.earlyPatches, ...manifest.patches]) {
          identities.push(patchModuleIdentity(manifest.id, entryPath));
        }
      }
      return identities;
    },

    async read(identity: ModuleIdentity): Promise<ModuleDefinition> {
      const parsed = parsePatchModuleIdentity(identity);
      if (!parsed) {
        throw new Error(`Not a patch module identity: ${identity}`);
      }

      const owner = findOwner(parsed.manifestId);
      if (!owner) {
        throw new Error(`No loaded participant with id ${parsed.manifestId}`);
      }

      return {
        identity,
        location: `${owner.archive.path}!/${parsed.entryPath}`,
        source: await owner.archive.readText(parsed.entryPath),
      };
    },

    async load(_identity: ModuleIdentity, definition: ModuleDefinition): Promise<ModuleExports> {
      return options.evaluator(definition);
    },
  };
}
