import type { GateName, Layer, TaskKind } from '../core/types.js';
import type { Verdict } from '../policy/lattice.js';

/** Everything a gate may look at. Gates never mutate it. */
export interface GateInput {
  runId: string;
  taskId: string;
  kind: TaskKind;
  prompt: string;
  attempt: number;
  /** Structured agent output, checked against the task's contract. */
  draft?: unknown;
  /** Unredacted agent text. Only the ethics gate reads it. */
  rawText?: string;
  /** Identifiers of the material the request refers to. */
  references?: readonly string[];
  /** Contract failures so far in this run, across tasks. */
  failuresTotal: number;
  /** HITL requests raised so far in this run. */
  hitlRounds: number;
}

/** The least a gate's input carries, for logging. */
export interface GateSubject {
  runId: string;
  taskId?: string;
  attempt?: number;
}

export interface GateOutcome<N extends Layer = GateName> {
  gate: N;
  verdict: Verdict;
  durationMs: number;
}

export interface Gate<I extends GateSubject = GateInput, N extends Layer = GateName> {
  readonly name: N;
  readonly description: string;
  run(input: I): Promise<GateOutcome<N>>;
}
