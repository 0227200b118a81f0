export {
  Orchestrator,
  SANDBOX_RUNTIME_MODULES,
  type OrchestratorOptions,
  type ShutdownResult,
} from './orchestrator.js';
export {
  PIPELINE_PHASES,
  RUNNING_PHASE,
  type OrchestratorPhase,
  type PipelinePhase,
  type PipelineStage,
} from './pipeline.js';
