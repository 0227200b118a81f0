// Patches run against the resolved host

import type { ModuleLookup, PatchDefinition, PatchOwner } from '@patchwork/protocol';
import { PatchAlreadyAppliedError } from '../errors.js';
import type { Logger } from '../logging/index.js';

export class Patch {
  private applied = false;

  constructor(
    readonly definition: PatchDefinition,
    readonly owner: PatchOwner,
    private readonly logger: Logger
  ) {}

  get name(): string {
    return this.definition.name;
  }

  get isApplied(): boolean {
    return this.applied;
  }

  /**
   * @throws PatchAlreadyAppliedError on a second call
   */
  async run(resolveModule: ModuleLookup): Promise<void> {
    if (this.applied) {
      throw new PatchAlreadyAppliedError(this.name, this.owner.title);
    }
    this.applied = true;

    await this.definition.onLoaded({ owner: this.owner, resolveModule, logger: this.logger });
  }
}
