// Early patches
//
// Applied before the host modules are resolved. The patch receives the
// mutable definitions of the host modules it targets and may rewrite them.

import type {
  EarlyPatchDefinition,
  ModuleDefinition,
  ModuleIdentity,
  PatchOwner,
} from '@patchwork/protocol';
import { PatchAlreadyAppliedError } from '../errors.js';
import type { Logger } from '../logging/index.js';
import type { ModulePool } from '../resolution/index.js';

export class EarlyPatch {
  private applied = false;

  constructor(
    readonly definition: EarlyPatchDefinition,
    readonly owner: PatchOwner,
    private readonly logger: Logger
  ) {}

  get name(): string {
    return this.definition.name;
  }

  get targets(): ModuleIdentity[] {
    return this.definition.targets;
  }

  get isApplied(): boolean {
    return this.applied;
  }

  /**
   * Apply the patch to its targets in the host pool.
   * @throws PatchAlreadyAppliedError on a second call
   * @throws ModuleAlreadyResolvedError when a target has started resolving
   */
  async apply(hostPool: ModulePool): Promise<void> {
    if (this.applied) {
      throw new PatchAlreadyAppliedError(this.name, this.owner.title);
    }
    this.applied = true;

    const definitions = new Map<ModuleIdentity, ModuleDefinition>();
    for (const target of this.targets) {
      definitions.set(target, await hostPool.getDefinition(target));
    }

    this.logger.debug(() => `Applying early patch [${this.name}] to ${this.targets.join(', ') || 'no modules'}`);
    await this.definition.prepatch({ owner: this.owner, definitions, logger: this.logger });
  }
}
