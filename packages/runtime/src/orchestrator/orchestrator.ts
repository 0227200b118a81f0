// Orchestrator
//
// Discovers participant archives and drives them through the loading
// pipeline. Game packs always go before mods. Early patches rewrite host
// module definitions before the host pool resolves them; patches run once
// the host is resolved.
//
// Error handling differs per stage: discovery and load errors are logged and
// skipped, a failing early patch aborts its participant and propagates, a
// failing patch is logged and the run continues.

import * as path from 'node:path';
import {
  PARTICIPANT_MANIFEST_PATH,
  parseManifest,
  type ModuleDefinition,
  type ModuleExports,
  type ModuleIdentity,
  type ModuleLookupResult,
  type ParticipantManifest,
} from '@patchwork/protocol';
import {
  createFileConfigRepository,
  createNodeFileSystem,
  openZipArchive,
  type ArchiveFileSystem,
  type ArchiveOpener,
  type ConfigRepository,
  type LocationFileSystem,
} from '@patchwork/repositories';
import {
  Config,
  ConfigChangeHub,
  LocationResolver,
  defaultLocations,
  locationsSection,
  type ConfigChangedHandler,
} from '../config/index.js';
import {
  ConfigSaveError,
  ParticipantAlreadyLoadedError,
  ParticipantLoadError,
  PipelineStateError,
  toError,
} from '../errors.js';
import {
  DeferredLogBuffer,
  Logger,
  errorData,
  type LoggingHandler,
} from '../logging/index.js';
import { Participant } from '../participants/index.js';
import type { EarlyPatch, Patch } from '../patches/index.js';
import {
  ModuleResolver,
  ResolutionPool,
  createDirectoryModuleSource,
  createPatchModuleSource,
  createSandboxEvaluator,
  type ModuleEvaluator,
  type ModulePool,
  type ModuleSource,
  type PoolLoadResult,
} from '../resolution/index.js';
import { JsonConverter, Serializer } from '../serialization/index.js';
import {
  PIPELINE_PHASES,
  RUNNING_PHASE,
  type OrchestratorPhase,
  type PipelineStage,
} from './pipeline.js';

/**
 * Options for creating an orchestrator
 */
export type OrchestratorOptions = {
  /**
   * Directory relative locations are resolved against
   * @default process.cwd()
   */
  baseDirectory?: string;

  /**
   * Owner id of the orchestrator's own config scope
   * @default 'patchwork'
   */
  configId?: string;

  /**
   * Where config scopes are stored
   * @default JSON files: the orchestrator's own in the default configs
   * location, participants' in the configured `configs` location
   */
  configRepository?: ConfigRepository;

  fileSystem?: LocationFileSystem;

  /**
   * @default openZipArchive
   */
  openArchive?: ArchiveOpener;

  /**
   * Evaluates host and patch modules
   * @default createSandboxEvaluator() exposing `JsonConverter` as `require('@patchwork/runtime')`
   */
  evaluator?: ModuleEvaluator;

  /**
   * Source of the host modules
   * @default the .js files below `hostModuleDirectory`
   */
  hostModules?: ModuleSource<ModuleDefinition, ModuleExports>;

  /**
   * @default 'host'
   */
  hostModuleDirectory?: string;

  /**
   * Buffer log entries are written to until a handler is attached
   */
  logBuffer?: DeferredLogBuffer;

  /**
   * Attach a logging handler right away
   */
  loggingHandler?: LoggingHandler;
};

/**
 * Outcome of shutdown()
 */
export type ShutdownResult = {
  /** Owner ids of the config scopes that were saved */
  saved: string[];

  failed: ConfigSaveError[];
};

type OrchestratorParts = {
  baseDirectory: string;
  buffer: DeferredLogBuffer;
  logger: Logger;
  config: Config;
  hub: ConfigChangeHub;
  serializer: Serializer;
  configRepository: ConfigRepository | undefined;
  fileSystem: LocationFileSystem;
  openArchive: ArchiveOpener;
  evaluator: ModuleEvaluator;
  hostModules: ModuleSource<ModuleDefinition, ModuleExports>;
};

const ORCHESTRATOR_TITLE = 'Patchwork';

/**
 * What sandboxed modules get from `require('@patchwork/runtime')`
 */
export const SANDBOX_RUNTIME_MODULES = {
  '@patchwork/runtime': { JsonConverter },
};

export class Orchestrator {
  readonly baseDirectory: string;
  readonly logger: Logger;
  readonly config: Config;
  readonly serializer: Serializer;
  readonly locations: LocationResolver;
  readonly hostPool: ModulePool;
  readonly patchPool: ModulePool;

  private readonly buffer: DeferredLogBuffer;
  private readonly hub: ConfigChangeHub;
  private readonly configRepository: ConfigRepository | undefined;
  private readonly fileSystem: LocationFileSystem;
  private readonly openArchive: ArchiveOpener;
  private readonly resolver: ModuleResolver;
  private readonly loaded = new Map<string, Participant>();
  private currentPhase: OrchestratorPhase = 'Created';
  private fullLoadStarted = false;

  private constructor(parts: OrchestratorParts) {
    this.baseDirectory = parts.baseDirectory;
    this.buffer = parts.buffer;
    this.logger = parts.logger;
    this.config = parts.config;
    this.hub = parts.hub;
    this.serializer = parts.serializer;
    this.configRepository = parts.configRepository;
    this.fileSystem = parts.fileSystem;
    this.openArchive = parts.openArchive;

    const locations = this.config.loadSection(locationsSection);
    this.locations = new LocationResolver(() => locations.current, this.fileSystem, this.baseDirectory);

    this.hostPool = new ResolutionPool('host', parts.hostModules, this.logger.child('host'));
    this.patchPool = new ResolutionPool(
      'patch',
      createPatchModuleSource({ owners: () => this.loaded.values(), evaluator: parts.evaluator }),
      this.logger.child('patch')
    );
    this.resolver = new ModuleResolver(this.hostPool, this.patchPool);
  }

  /**
   * Create an orchestrator and load its own config scope.
   */
  static async create(options: OrchestratorOptions = {}): Promise<Orchestrator> {
    const baseDirectory = path.resolve(options.baseDirectory ?? process.cwd());
    const buffer = options.logBuffer ?? new DeferredLogBuffer();
    if (options.loggingHandler) {
      buffer.attach(options.loggingHandler);
    }

    const logger = new Logger(buffer, 'orchestrator');
    const serializer = new Serializer();
    const hub = new ConfigChangeHub(logger.child('config'));
    const fileSystem = options.fileSystem ?? createNodeFileSystem();
    const evaluator = options.evaluator ?? createSandboxEvaluator({ modules: SANDBOX_RUNTIME_MODULES });

    // The configs location is part of this scope, so the scope itself always lives at the default one
    const config = await Config.load(options.configId ?? 'patchwork', {
      repository:
        options.configRepository ??
        createFileConfigRepository(path.resolve(baseDirectory, defaultLocations().configs)),
      serializer,
      logger: logger.child('config'),
      hub,
    });

    return new Orchestrator({
      baseDirectory,
      buffer,
      logger,
      config,
      hub,
      serializer,
      configRepository: options.configRepository,
      fileSystem,
      openArchive: options.openArchive ?? openZipArchive,
      evaluator,
      hostModules:
        options.hostModules ??
        createDirectoryModuleSource({
          directory: path.resolve(baseDirectory, options.hostModuleDirectory ?? 'host'),
          fileSystem,
          evaluator,
        }),
    });
  }

  get phase(): OrchestratorPhase {
    return this.currentPhase;
  }

  get isRunning(): boolean {
    return this.currentPhase === RUNNING_PHASE;
  }

  /**
   * All participants, game packs first
   */
  get participants(): Participant[] {
    return [...this.gamePacks, ...this.mods];
  }

  get gamePacks(): Participant[] {
    return Array.from(this.loaded.values()).filter((participant) => participant.isGamePack);
  }

  get mods(): Participant[] {
    return Array.from(this.loaded.values()).filter((participant) => !participant.isGamePack);
  }

  get earlyPatches(): EarlyPatch[] {
    return this.participants.flatMap((participant) => participant.earlyPatches);
  }

  get patches(): Patch[] {
    return this.participants.flatMap((participant) => participant.patches);
  }

  /**
   * Attach the sink for log entries. Entries written so far are flushed to it.
   */
  attachLoggingHandler(handler: LoggingHandler): void {
    this.buffer.attach(handler);
  }

  /**
   * Subscribe to changes of any config scope, fired after the scope's own
   * handlers.
   */
  onAnyConfigChanged(handler: ConfigChangedHandler): () => void {
    return this.hub.subscribe(handler);
  }

  /**
   * Find a resolved module in the host pool, then in the patch pool.
   * Waits while the identity is being resolved.
   */
  readonly resolveModule = (identity: ModuleIdentity): Promise<ModuleLookupResult | null> =>
    this.resolver.resolveModule(identity);

  /**
   * Run the whole pipeline once.
   * @throws PipelineStateError unless called on a fresh orchestrator
   * @throws whatever an early patch throws
   */
  async fullLoad(): Promise<void> {
    if (this.fullLoadStarted || this.currentPhase !== 'Created') {
      throw new PipelineStateError(this.currentPhase, 'Created');
    }
    this.fullLoadStarted = true;

    const stages: Record<PipelineStage, () => Promise<unknown>> = {
      LocationsEnsured: () => this.ensureAllLocationsExist(),
      GamePacksDiscovered: () => this.loadAllGamePacks(),
      ModsDiscovered: () => this.loadAllMods(),
      GamePackEarlyPatchesLoaded: () => this.loadGamePackEarlyPatches(),
      GamePackEarlyPatchesRun: () => this.runGamePackEarlyPatches(),
      ModEarlyPatchesLoaded: () => this.loadModEarlyPatches(),
      ModEarlyPatchesRun: () => this.runModEarlyPatches(),
      HostModulesResolved: () => this.loadHostModules(),
      GamePackPatchesLoaded: () => this.loadGamePackPatches(),
      GamePackPatchesRun: () => this.runGamePackPatches(),
      ModPatchesLoaded: () => this.loadModPatches(),
      ModPatchesRun: () => this.runModPatches(),
    };

    for (const phase of PIPELINE_PHASES) {
      if (phase === 'Created') {
        continue;
      }

      await stages[phase]();
      this.currentPhase = phase;
      this.logger.debug(() => `Entered phase ${phase}`);
    }

    this.logger.info(
      () => `Loaded ${this.gamePacks.length} game pack(s) and ${this.mods.length} mod(s)`
    );
  }

  /**
   * Create every configured location. Failures are logged per directory.
   */
  async ensureAllLocationsExist(): Promise<void> {
    const { locations } = this;
    this.logger.info(
      () =>
        `Using locations: configs ${locations.configs}, game packs ${locations.gamePacks}, ` +
        `libs ${locations.libs}, mods ${locations.mods.map(String).join('; ')}`
    );

    for (const directory of locations.directories()) {
      try {
        await this.fileSystem.mkdir(directory);
      } catch (error) {
        this.logger.error(`Failed to create location ${directory}`, errorData(error, { path: directory }));
      }
    }
  }

  /**
   * Load the game pack archives at the top level of the game pack location.
   */
  async loadAllGamePacks(): Promise<Participant[]> {
    let candidates: string[] = [];
    try {
      candidates = await this.locations.searchGamePacks();
    } catch (error) {
      this.logger.error(
        `Failed to search for game packs in ${this.locations.gamePacks}`,
        errorData(error, { path: this.locations.gamePacks })
      );
    }

    return this.loadCandidates(candidates, true);
  }

  /**
   * Load the mod archives found in every mod location, in location order.
   */
  async loadAllMods(): Promise<Participant[]> {
    const candidates: string[] = [];
    for (const location of this.locations.mods) {
      try {
        candidates.push(...(await location.search()));
      } catch (error) {
        this.logger.error(
          `Failed to search for mods in ${location}`,
          errorData(error, { path: location.directory })
        );
      }
    }

    return this.loadCandidates(candidates, false);
  }

  /**
   * Load a participant archive.
   * @throws ParticipantLoadError when the archive or its manifest is unusable
   * @throws ParticipantAlreadyLoadedError when the path or manifest id is taken
   */
  async loadParticipant(archivePath: string, isGamePack: boolean): Promise<Participant> {
    const id = path.resolve(this.baseDirectory, archivePath);
    this.assertNotLoaded(id);

    let archive: ArchiveFileSystem;
    try {
      archive = await this.openArchive(id);
    } catch (error) {
      const cause = toError(error);
      throw new ParticipantLoadError(id, cause.message, cause);
    }

    try {
      const manifest = await this.readManifest(id, archive);
      this.assertNotLoaded(id, manifest.id);

      const logger = this.logger.child(manifest.title);
      const config = await Config.load(manifest.id, {
        repository: this.participantConfigRepository(),
        serializer: this.serializer,
        logger: logger.child('config'),
        hub: this.hub,
      });

      // Another load may have finished while this one was waiting
      this.assertNotLoaded(id, manifest.id);
      const participant = new Participant(id, isGamePack, manifest, archive, config, logger);
      this.loaded.set(id, participant);

      this.logger.info(`Loaded ${participant} ${manifest.version} from ${id}`);
      return participant;
    } catch (error) {
      archive.close();
      throw error;
    }
  }

  /**
   * Load a participant archive without throwing.
   * A missing file yields null with one debug message; a failing load yields
   * null with one error.
   */
  async tryLoadParticipant(archivePath: string, isGamePack: boolean): Promise<Participant | null> {
    const id = path.resolve(this.baseDirectory, archivePath);

    if (!(await this.fileSystem.isFile(id))) {
      this.logger.debug(() => `No participant archive at ${id}`);
      return null;
    }

    try {
      return await this.loadParticipant(id, isGamePack);
    } catch (error) {
      this.logger.error(
        `Failed to load ${isGamePack ? 'game pack' : 'mod'} from ${id}`,
        errorData(error, { path: id })
      );
      return null;
    }
  }

  /**
   * @returns whether the participant was loaded
   */
  async tryLoadMod(archivePath: string, isGamePack: boolean): Promise<boolean> {
    return (await this.tryLoadParticipant(archivePath, isGamePack)) !== null;
  }

  loadGamePackEarlyPatches(): Promise<void> {
    return this.loadEarlyPatches(this.gamePacks);
  }

  runGamePackEarlyPatches(): Promise<void> {
    return this.runEarlyPatches(this.gamePacks);
  }

  loadModEarlyPatches(): Promise<void> {
    return this.loadEarlyPatches(this.mods);
  }

  runModEarlyPatches(): Promise<void> {
    return this.runEarlyPatches(this.mods);
  }

  /**
   * Resolve every host module. A source that cannot be listed is logged and
   * resolves nothing.
   */
  async loadHostModules(): Promise<PoolLoadResult> {
    try {
      return await this.hostPool.loadAll();
    } catch (error) {
      this.logger.error('Failed to list the host modules', errorData(error));
      return { resolved: [], failed: [], skipped: [] };
    }
  }

  loadGamePackPatches(): Promise<void> {
    return this.loadPatches(this.gamePacks);
  }

  runGamePackPatches(): Promise<void> {
    return this.runPatches(this.gamePacks);
  }

  loadModPatches(): Promise<void> {
    return this.loadPatches(this.mods);
  }

  runModPatches(): Promise<void> {
    return this.runPatches(this.mods);
  }

  /**
   * Load the early patches of the given participants. Failures stay on the
   * participant.
   */
  async loadEarlyPatches(participants: Iterable<Participant>): Promise<void> {
    for (const participant of participants) {
      await participant.loadEarlyPatches(this.patchPool);
    }
  }

  /**
   * Apply the early patches of the given participants in order.
   * @throws the first early patch error; later patches do not run
   */
  async runEarlyPatches(participants: Iterable<Participant>): Promise<void> {
    for (const participant of participants) {
      for (const patch of participant.earlyPatches) {
        await patch.apply(this.hostPool);
      }
    }
  }

  /**
   * Load the patches of the given participants. Failures stay on the
   * participant.
   */
  async loadPatches(participants: Iterable<Participant>): Promise<void> {
    for (const participant of participants) {
      await participant.loadPatches(this.patchPool, this.serializer);
    }
  }

  /**
   * Run the patches of the given participants in order. A failing patch is
   * logged and the run continues.
   */
  async runPatches(participants: Iterable<Participant>): Promise<void> {
    for (const participant of participants) {
      for (const patch of participant.patches) {
        try {
          await patch.run(this.resolveModule);
        } catch (error) {
          this.logger.error(
            `Error while running patch [${patch.name}] from participant [${participant.title}]`,
            errorData(error, { participant: participant.id })
          );
        }
      }
    }
  }

  /**
   * Save the orchestrator's config, then every participant's. Never throws;
   * participant failures are logged together as one error.
   */
  async shutdown(): Promise<ShutdownResult> {
    const result: ShutdownResult = { saved: [], failed: [] };

    try {
      await this.config.save();
      result.saved.push(this.config.ownerId);
    } catch (error) {
      const failure = new ConfigSaveError(this.config.ownerId, ORCHESTRATOR_TITLE, toError(error));
      result.failed.push(failure);
      this.logger.error(failure.message, errorData(failure));
    }

    const participantFailures: ConfigSaveError[] = [];
    for (const participant of this.participants) {
      try {
        await participant.config.save();
        result.saved.push(participant.config.ownerId);
      } catch (error) {
        participantFailures.push(
          new ConfigSaveError(participant.config.ownerId, participant.title, toError(error))
        );
      }
    }

    if (participantFailures.length > 0) {
      const aggregate = new AggregateError(
        participantFailures,
        `Failed to save the config of ${participantFailures
          .map((failure) => `[${failure.ownerTitle}]`)
          .join(', ')}`
      );
      this.logger.error(aggregate.message, {
        error: aggregate.message,
        errors: participantFailures.map((failure) => failure.message),
      });
      result.failed.push(...participantFailures);
    }

    for (const participant of this.loaded.values()) {
      participant.archive.close();
    }

    this.currentPhase = 'ShutDown';
    this.logger.info(() => `Shut down, saved ${result.saved.length} config(s)`);
    return result;
  }

  private participantConfigRepository(): ConfigRepository {
    return this.configRepository ?? createFileConfigRepository(this.locations.configs);
  }

  private async loadCandidates(candidates: string[], isGamePack: boolean): Promise<Participant[]> {
    const participants: Participant[] = [];
    for (const candidate of candidates) {
      const participant = await this.tryLoadParticipant(candidate, isGamePack);
      if (participant) {
        participants.push(participant);
      }
    }
    return participants;
  }

  private async readManifest(id: string, archive: ArchiveFileSystem): Promise<ParticipantManifest> {
    if (!(await archive.exists(PARTICIPANT_MANIFEST_PATH))) {
      throw new ParticipantLoadError(id, `missing ${PARTICIPANT_MANIFEST_PATH}`);
    }

    const result = parseManifest(await archive.readText(PARTICIPANT_MANIFEST_PATH));
    if (!result.valid) {
      throw new ParticipantLoadError(
        id,
        `invalid ${PARTICIPANT_MANIFEST_PATH}: ${result.errors
          .map((error) => `${error.path}: ${error.message}`)
          .join('; ')}`
      );
    }

    return result.manifest;
  }

  private assertNotLoaded(id: string, manifestId?: string): void {
    if (this.loaded.has(id)) {
      throw new ParticipantAlreadyLoadedError(id, id);
    }

    if (manifestId !== undefined) {
      for (const participant of this.loaded.values()) {
        if (participant.manifest.id === manifestId) {
          throw new ParticipantAlreadyLoadedError(id, participant.id);
        }
      }
    }
  }
}
