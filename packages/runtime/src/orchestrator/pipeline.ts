// Pipeline phases, in the order fullLoad() walks them

export const PIPELINE_PHASES = [
  'Created',
  'LocationsEnsured',
  'GamePacksDiscovered',
  'ModsDiscovered',
  'GamePackEarlyPatchesLoaded',
  'GamePackEarlyPatchesRun',
  'ModEarlyPatchesLoaded',
  'ModEarlyPatchesRun',
  'HostModulesResolved',
  'GamePackPatchesLoaded',
  'GamePackPatchesRun',
  'ModPatchesLoaded',
  'ModPatchesRun',
] as const;

export type PipelinePhase = (typeof PIPELINE_PHASES)[number];

/**
 * The phase in which every participant's patches have run
 */
export const RUNNING_PHASE: PipelinePhase = 'ModPatchesRun';

export type OrchestratorPhase = PipelinePhase | 'ShutDown';

/**
 * Stages fullLoad() runs; each one leads into the phase it is keyed by
 */
export type PipelineStage = Exclude<PipelinePhase, 'Created'>;
