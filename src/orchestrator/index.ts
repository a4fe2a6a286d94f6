export {
  Orchestrator,
  overallDecision,
  runOutcome,
  taskIdFor,
  type FileRunOptions,
  type OrchestratorOptions,
} from './orchestrator.js';
export { TemplateDraftAgent, LEAKED_CONTACT, shouldBreak, type AgentOutput, type DraftAgent } from './agent.js';
export {
  ARTIFACT_EXTENSIONS,
  FileArtifactWriter,
  MemoryArtifactSink,
  artifactFileName,
  type ArtifactSink,
} from './artifacts.js';
export { assertNoArtifactsForBlockedTasks, assertRunInvariants, runInvariantViolations } from './invariants.js';
export type { FaultPlan, RunOptions, SimulationResult, TaskFaults, TaskResult } from './types.js';
