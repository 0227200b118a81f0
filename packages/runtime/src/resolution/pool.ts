// Module resolution pool
//
// Maps a module identity to its resolved form. Every identity resolves at
// most once; everybody waiting on it observes the same result. An identity is
// in one of three states once the pool knows about it:
//
//   pending  → resolved   (register, or a successful resolve)
//   pending  → failed     (abandon, or a failing resolve)
//
// Lookups never start a resolution. Waiting on a pending identity awaits a
// per-identity deferred that is settled exactly once.

import type { ModuleIdentity, PoolName } from '@patchwork/protocol';
import {
  DuplicateResolutionError,
  ModuleAlreadyResolvedError,
  ModuleResolutionError,
  toError,
} from '../errors.js';
import { errorData, type Logger } from '../logging/index.js';
import { createDeferred, type Deferred } from '../util/deferred.js';

/**
 * Where a pool gets its modules from
 */
export type ModuleSource<TDefinition, TModule> = {
  /**
   * Every identity this source can resolve
   */
  list(): Promise<ModuleIdentity[]>;

  /**
   * Read the pre-load definition of a module
   */
  read(identity: ModuleIdentity): Promise<TDefinition>;

  /**
   * Turn a (possibly patched) definition into the resolved module.
   * Must not wait on lookups into the pools.
   */
  load(identity: ModuleIdentity, definition: TDefinition): Promise<TModule>;
};

type PoolEntry<TModule> =
  | { state: 'pending'; waiters: Deferred<TModule | null> }
  | { state: 'resolved'; module: TModule }
  | { state: 'failed'; error: Error };

/**
 * A per-identity resolution failure
 */
export type ResolutionFailure = {
  identity: ModuleIdentity;
  error: string;
};

/**
 * Result of resolving a pool's whole source
 */
export type PoolLoadResult = {
  /** Identities resolved by this call, in resolution order */
  resolved: ModuleIdentity[];

  /** Identities that failed to resolve */
  failed: ResolutionFailure[];

  /** Identities that were already resolved or failed before the call */
  skipped: ModuleIdentity[];
};

export class ResolutionPool<TDefinition, TModule> {
  private readonly entries = new Map<ModuleIdentity, PoolEntry<TModule>>();
  private readonly definitions = new Map<ModuleIdentity, Promise<TDefinition>>();
  private readonly attempts = new Map<ModuleIdentity, Promise<TModule>>();

  constructor(
    readonly name: PoolName,
    private readonly source: ModuleSource<TDefinition, TModule>,
    private readonly logger: Logger
  ) {}

  /**
   * Insert a resolved module.
   * @throws DuplicateResolutionError if the identity is already resolved or failed
   */
  register(identity: ModuleIdentity, module: TModule): void {
    if (!this.tryRegister(identity, module)) {
      throw new DuplicateResolutionError(this.name, identity);
    }
  }

  /**
   * Insert a resolved module unless the identity already has an outcome.
   * Completes a pending identity and wakes its waiters.
   */
  tryRegister(identity: ModuleIdentity, module: TModule): boolean {
    const entry = this.entries.get(identity);

    if (entry && entry.state !== 'pending') {
      return false;
    }

    this.entries.set(identity, { state: 'resolved', module });
    entry?.waiters.resolve(module);
    return true;
  }

  /**
   * Mark a pending identity as failed and wake its waiters with null.
   * Does nothing for identities that are not pending.
   */
  abandon(identity: ModuleIdentity, error: Error): void {
    const entry = this.entries.get(identity);

    if (entry?.state !== 'pending') {
      return;
    }

    this.entries.set(identity, { state: 'failed', error });
    entry.waiters.resolve(null);
  }

  /**
   * Wait for the outcome of an identity.
   *
   * Resolved: the module, immediately. Pending: waits for the outcome.
   * Failed or never requested: null, without waiting.
   */
  async tryWaitForResolution(identity: ModuleIdentity): Promise<TModule | null> {
    const entry = this.entries.get(identity);

    switch (entry?.state) {
      case 'resolved':
        return entry.module;
      case 'pending':
        return entry.waiters.promise;
      default:
        return null;
    }
  }

  /**
   * Resolve one identity through the source.
   * Concurrent calls share one attempt; a failure is recorded and rethrown.
   */
  resolve(identity: ModuleIdentity): Promise<TModule> {
    const entry = this.entries.get(identity);

    if (entry?.state === 'resolved') {
      return Promise.resolve(entry.module);
    }
    if (entry?.state === 'failed') {
      return Promise.reject(new ModuleResolutionError(this.name, identity, entry.error));
    }

    const running = this.attempts.get(identity);
    if (running) {
      return running;
    }

    this.reserve(identity);
    const attempt = this.attempt(identity).finally(() => {
      this.attempts.delete(identity);
    });
    this.attempts.set(identity, attempt);
    return attempt;
  }

  /**
   * The mutable definition of an identity that has not started resolving.
   * Reads it from the source once; later calls return the same object.
   */
  async getDefinition(identity: ModuleIdentity): Promise<TDefinition> {
    if (this.entries.has(identity)) {
      throw new ModuleAlreadyResolvedError(this.name, identity);
    }

    return this.readDefinition(identity);
  }

  /**
   * Resolve every identity of the source, in sorted order.
   *
   * All unresolved identities are marked pending before the first one
   * resolves, so lookups racing the batch wait instead of answering null.
   * Individual failures are recorded and do not stop the batch.
   */
  async loadAll(): Promise<PoolLoadResult> {
    const identities = Array.from(new Set(await this.source.list())).sort();
    const result: PoolLoadResult = { resolved: [], failed: [], skipped: [] };
    const queued: ModuleIdentity[] = [];

    for (const identity of identities) {
      const state = this.entries.get(identity)?.state;
      if (state === 'resolved' || state === 'failed') {
        result.skipped.push(identity);
      } else {
        this.reserve(identity);
        queued.push(identity);
      }
    }

    this.logger.debug(() => `Resolving ${queued.length} module(s) in the ${this.name} pool`);

    for (const identity of queued) {
      try {
        await this.resolve(identity);
        result.resolved.push(identity);
      } catch (error) {
        const cause = error instanceof ModuleResolutionError && error.cause ? error.cause : toError(error);
        result.failed.push({ identity, error: cause.message });
        this.logger.error(() => `Failed to resolve module ${identity} in the ${this.name} pool`, errorData(cause));
      }
    }

    this.logger.info(
      () => `Resolved ${result.resolved.length} of ${queued.length} module(s) in the ${this.name} pool`
    );

    return result;
  }

  has(identity: ModuleIdentity): boolean {
    return this.entries.get(identity)?.state === 'resolved';
  }

  /**
   * Identities with an outcome or in flight, in insertion order
   */
  identities(): ModuleIdentity[] {
    return Array.from(this.entries.keys());
  }

  /**
   * Recorded failures by identity
   */
  get failures(): ReadonlyMap<ModuleIdentity, Error> {
    const failures = new Map<ModuleIdentity, Error>();
    for (const [identity, entry] of this.entries) {
      if (entry.state === 'failed') {
        failures.set(identity, entry.error);
      }
    }
    return failures;
  }

  private reserve(identity: ModuleIdentity): void {
    if (!this.entries.has(identity)) {
      this.entries.set(identity, { state: 'pending', waiters: createDeferred<TModule | null>() });
    }
  }

  private readDefinition(identity: ModuleIdentity): Promise<TDefinition> {
    const cached = this.definitions.get(identity);
    if (cached) {
      return cached;
    }

    const reading = this.source.read(identity);
    this.definitions.set(identity, reading);
    void reading.catch(() => this.definitions.delete(identity));
    return reading;
  }

  private async attempt(identity: ModuleIdentity): Promise<TModule> {
    let module: TModule;
    try {
      const definition = await this.readDefinition(identity);
      module = await this.source.load(identity, definition);
    } catch (error) {
      const cause = toError(error);
      this.abandon(identity, cause);
      throw new ModuleResolutionError(this.name, identity, cause);
    }

    if (this.tryRegister(identity, module)) {
      return module;
    }

    // Someone registered or abandoned the identity while this attempt ran
    const entry = this.entries.get(identity);
    if (entry?.state === 'resolved') {
      return entry.module;
    }
    throw new ModuleResolutionError(this.name, identity, entry?.state === 'failed' ? entry.error : undefined);
  }
}
