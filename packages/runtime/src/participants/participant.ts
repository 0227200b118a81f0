// Participants
//
// One class for game packs and mods; `isGamePack` is the only difference.
// A participant owns its archive, its config scope and the patches its
// manifest lists. Patch lists are loaded all-or-nothing: when any listed
// module fails, the list stays empty and the error is kept on the
// participant.

import {
  readEarlyPatchExport,
  readPatchExport,
  type ModuleExports,
  type ParticipantId,
  type ParticipantManifest,
  type PatchExportResult,
  type PatchOwner,
} from '@patchwork/protocol';
import type { ArchiveFileSystem } from '@patchwork/repositories';
import type { Config } from '../config/index.js';
import { PatchLoadError, toError } from '../errors.js';
import { errorData, type Logger } from '../logging/index.js';
import { EarlyPatch, Patch } from '../patches/index.js';
import { patchModuleIdentity, type ModulePool } from '../resolution/index.js';
import type { Serializer } from '../serialization/index.js';

type PatchList<T> =
  | { state: 'unloaded' }
  | { state: 'loaded'; patches: T[] }
  | { state: 'failed'; error: Error };

export class Participant {
  private early: PatchList<EarlyPatch> = { state: 'unloaded' };
  private regular: PatchList<Patch> = { state: 'unloaded' };

  constructor(
    /** Absolute path of the archive */
    readonly id: ParticipantId,
    readonly isGamePack: boolean,
    readonly manifest: ParticipantManifest,
    readonly archive: ArchiveFileSystem,
    readonly config: Config,
    readonly logger: Logger
  ) {}

  get title(): string {
    return this.manifest.title;
  }

  get owner(): PatchOwner {
    return { id: this.manifest.id, title: this.title, isGamePack: this.isGamePack };
  }

  get earlyPatches(): readonly EarlyPatch[] {
    return this.early.state === 'loaded' ? this.early.patches : [];
  }

  get patches(): readonly Patch[] {
    return this.regular.state === 'loaded' ? this.regular.patches : [];
  }

  get earlyPatchLoadError(): Error | null {
    return this.early.state === 'failed' ? this.early.error : null;
  }

  get patchLoadError(): Error | null {
    return this.regular.state === 'failed' ? this.regular.error : null;
  }

  /**
   * Resolve the early patch modules from the manifest and create the early
   * patches. Does nothing after the first call.
   * @returns whether the early patches are loaded
   */
  async loadEarlyPatches(patchPool: ModulePool): Promise<boolean> {
    if (this.early.state === 'unloaded') {
      this.early = await this.loadList(
        'early patch',
        this.manifest.earlyPatches,
        patchPool,
        readEarlyPatchExport,
        (definition) => new EarlyPatch(definition, this.owner, this.logger.child(definition.name))
      );
    }
    return this.early.state === 'loaded';
  }

  /**
   * Resolve the patch modules from the manifest and create the patches.
   * Game packs also contribute the serializer converters those modules export.
   * @returns whether the patches are loaded
   */
  async loadPatches(patchPool: ModulePool, serializer: Serializer): Promise<boolean> {
    if (this.regular.state === 'unloaded') {
      this.regular = await this.loadList(
        'patch',
        this.manifest.patches,
        patchPool,
        (exports) => {
          if (this.isGamePack) {
            const added = serializer.addConverters(exports);
            if (added.length > 0) {
              this.logger.debug(() => `Added serializer converters: ${added.join(', ')}`);
            }
          }
          return readPatchExport(exports);
        },
        (definition) => new Patch(definition, this.owner, this.logger.child(definition.name))
      );
    }
    return this.regular.state === 'loaded';
  }

  toString(): string {
    return `${this.isGamePack ? 'Game pack' : 'Mod'} [${this.title}]`;
  }

  private async loadList<TDefinition, TPatch>(
    kind: string,
    entryPaths: string[],
    patchPool: ModulePool,
    read: (exports: ModuleExports) => PatchExportResult<TDefinition>,
    create: (definition: TDefinition) => TPatch
  ): Promise<PatchList<TPatch>> {
    try {
      const patches: TPatch[] = [];
      for (const entryPath of entryPaths) {
        const exports = await patchPool.resolve(patchModuleIdentity(this.manifest.id, entryPath));
        const result = read(exports);
        if (!result.valid) {
          throw new PatchLoadError(this.title, entryPath, result.errors);
        }
        patches.push(create(result.definition));
      }

      this.logger.debug(() => `Loaded ${patches.length} ${kind}(es)`);
      return { state: 'loaded', patches };
    } catch (error) {
      const cause = toError(error);
      this.logger.error(`Failed to load ${kind}es of participant [${this.title}]`, errorData(cause));
      return { state: 'failed', error: cause };
    }
  }
}
