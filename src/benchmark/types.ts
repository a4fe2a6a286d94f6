/**
 * Benchmark Types — configuration and reports for the suite runner, the
 * profile sweep and the stress runner.
 */

import { z } from 'zod';
import type { Decision, OverallDecision, OverallPolicy, TaskKind } from '../core/types.js';
import type { FaultPlan } from '../orchestrator/types.js';
import type { HitlIncident } from '../hitl/queue.js';

export interface BenchmarkConfig {
  prompt: string;
  runs: number;
  seed: number;
  /** Probability the seeded resolver answers CONTINUE. */
  pContinue: number;
  faults?: FaultPlan;
  enableRunawaySeal?: boolean;
  runawayThreshold?: number;
  maxAttemptsPerTask?: number;
  overallPolicy?: OverallPolicy;
  tasks?: TaskKind[];
  /** Prefix for generated run ids (`<prefix>#<i>`). */
  runIdPrefix?: string;
}

export interface BenchmarkReport {
  prompt: string;
  runs: number;
  seed: number;
  pContinue: number;
  enableRunawaySeal: boolean;
  runawayThreshold: number;
  maxAttemptsPerTask: number;
  faults: FaultPlan;
  /** Overall decision per run. `HITL` only under the legacy policy. */
  decisionCounts: Record<OverallDecision, number>;
  crashes: number;
  crashFreeRate: number;
  /** Runs whose rows contained `@` after redaction. */
  atSignViolations: number;
  /** AGENT_SEALED rows across all runs. */
  sealEvents: number;
  /** Runs that raised at least one HITL request. */
  hitlRequestedRuns: number;
  runsPerSec: number;
  lastError: string | null;
  /** SHA-256 over the per-run semantic signatures; equal for equal inputs. */
  reproDigest: string;
  timestamp: string;
}

export interface ScorecardRequirements {
  requireCrashFree?: boolean;
  requirePiiZero?: boolean;
  requireSealEvents?: boolean;
}

export interface Scorecard {
  pass: boolean;
  checks: {
    crashFree: boolean;
    piiZero: boolean;
    hasSealEvents: boolean;
  };
  failReasons: string[];
  summary: {
    crashes: number;
    atSignViolations: number;
    sealEvents: number;
  };
}

export interface BenchmarkProfile extends BenchmarkConfig {
  name: string;
  description: string;
}

export interface DerivedRates {
  runRate: number;
  pauseRate: number;
  stopRate: number;
  hitlRequestedRate: number;
}

export interface ProfileResult {
  profile: BenchmarkProfile;
  report: BenchmarkReport;
  derived: DerivedRates;
}

export const StressConfigSchema = z.object({
  runs: z.number().int().min(0).default(200),
  seed: z.number().int().default(42),
  prompt: z.string().default('Excelで進捗表を作成し、Wordで要約し、PPTでスライドを作成してください。'),
  /** Per task: probability the draft breaks its contract. */
  faultRate: z.number().min(0).max(1).default(0.1),
  /** Per task: probability the agent leaks a contact email. */
  leakRate: z.number().min(0).max(1).default(0.02),
  pContinue: z.number().min(0).max(1).default(0.8),
  maxAttemptsPerTask: z.number().int().min(1).default(3),
  enableRunawaySeal: z.boolean().default(true),
  runawayThreshold: z.number().int().min(1).default(5),
  /** Save incident rows to this directory. Unset keeps everything in memory. */
  arlDir: z.string().optional(),
  /** Cap on incident files in `arlDir`; -1 is unlimited. */
  maxArlFiles: z.number().int().min(-1).default(-1),
  queueMax: z.number().int().min(1).default(100),
  /** Keep every run in the report instead of the first `sampleRuns`. */
  keepRuns: z.boolean().default(false),
  sampleRuns: z.number().int().min(0).default(5),
  /** Recent run decisions attached to each incident, this run included. */
  fullContextN: z.number().int().min(0).default(5),
});

export type StressConfig = z.infer<typeof StressConfigSchema>;
export type StressConfigInput = z.input<typeof StressConfigSchema>;

export interface StressRunSummary {
  runIndex: number;
  runId: string;
  decision: Decision;
  reasonCode: string;
  sealed: boolean;
  incidentId: string | null;
  arlPath: string | null;
}

export interface StressIncident extends HitlIncident {
  /** Decisions of the runs just before this one, oldest first. */
  recentContext: Decision[];
}

export interface StressReport {
  config: Omit<StressConfig, 'arlDir'> & { arlDir: string | null };
  runs: number;
  byDecision: Record<Decision, number>;
  byReasonCode: Record<string, number>;
  topReasonCode: string | null;
  sealedRuns: number;
  incidents: number;
  arlSaved: number;
  arlSkipped: number;
  queueSize: number;
  queueDropped: number;
  atSignViolations: number;
  runsPerSec: number;
  runsKept: StressRunSummary[];
  queue: StressIncident[];
}
