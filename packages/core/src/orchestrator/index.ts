/**
 * Generation Orchestrator
 * Sequences ingest → refine → transform → generate
 */

export { GenerationOrchestrator } from './generation-orchestrator.js';
export type {
  GenerationOrchestratorDependencies,
  GenerationRunResult,
  OrchestratorEvents,
  PhaseDurations,
  RunOptions,
} from './generation-orchestrator.js';
