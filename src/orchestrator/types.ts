import type { Decision, FinalDecider, Layer, OverallDecision, OverallPolicy, TaskKind, AccConfig, RelativityConfig } from '../core/types.js';
import type { Verdict } from '../policy/lattice.js';
import type { ArlRow } from '../audit/schema.js';
import type { AuditSink } from '../audit/audit-log.js';
import type { HitlResolver } from '../hitl/types.js';
import type { ArtifactSink } from './artifacts.js';

/** Per-kind fault injection for the draft agent. */
export interface TaskFaults {
  /** Produce a draft that violates the kind's contract. */
  breakContract?: boolean;
  /** Break only the first N attempts, then recover. Implies breakContract. */
  breakContractAttempts?: number;
  /** Append a contact email to the raw text. */
  leakEmail?: boolean;
}

export type FaultPlan = Partial<Record<TaskKind, TaskFaults>>;

export interface TaskResult {
  taskId: string;
  kind: TaskKind;
  decision: Decision;
  sealed: boolean;
  finalDecider: FinalDecider;
  /** Layer that stopped or paused the task, if any. */
  blockedLayer: Layer | null;
  reasonCode: string;
  attempts: number;
  artifactPath: string | null;
}

export interface SimulationResult {
  runId: string;
  decision: OverallDecision;
  /** Verdict that best explains the overall decision. */
  outcome: Verdict;
  tasks: TaskResult[];
  artifactsWrittenTaskIds: string[];
  rows: ArlRow[];
  durationMs: number;
}

export interface RunOptions {
  runId?: string;
  tasks?: readonly TaskKind[];
  faults?: FaultPlan;
  /** No resolver leaves pauses pending. */
  resolver?: HitlResolver;
  references?: readonly string[];
  maxAttemptsPerTask?: number;
  overallPolicy?: OverallPolicy;
  acc?: Partial<AccConfig>;
  relativity?: Partial<RelativityConfig>;
  audit?: AuditSink;
  artifacts?: ArtifactSink;
  /** Clear the audit sink before the run starts. */
  truncateAudit?: boolean;
}
