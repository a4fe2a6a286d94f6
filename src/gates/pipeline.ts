import type { Gate, GateInput, GateOutcome } from './types.js';
import { MeaningGate } from './meaning.js';
import { ConsistencyGate } from './consistency.js';
import { RelativityGate } from './relativity.js';
import { EthicsGate } from './ethics.js';
import { AccGate } from './acc.js';
import { GATE_ORDER, type AccConfig, type GateName, type HitlChoice, type Layer, type RelativityConfig } from '../core/types.js';
import { GateOrderError, errorMessage } from '../core/errors.js';
import type { EventBus } from '../core/events.js';
import { getLogger } from '../core/logger.js';
import type { AuditTrail } from '../audit/audit-log.js';
import { buildRow, type RowContext } from '../audit/schema.js';
import { pauseVerdict, userVerdict, type Verdict } from '../policy/lattice.js';
import type { HitlRequest, HitlResolver } from '../hitl/types.js';

export interface GateSet {
  meaning: Gate;
  consistency: Gate;
  rfl: Gate;
  ethics: Gate;
  acc: Gate;
}

export interface GateSetOptions {
  relativity?: Partial<RelativityConfig>;
  acc?: Partial<AccConfig>;
}

export function createDefaultGates(options: GateSetOptions = {}): GateSet {
  return {
    meaning: new MeaningGate(),
    consistency: new ConsistencyGate(),
    rfl: new RelativityGate(options.relativity),
    ethics: new EthicsGate(),
    acc: new AccGate(options.acc),
  };
}

export type EscalationResult = HitlChoice | 'PENDING';

interface Cursor {
  attempt: number;
  /** Index into GATE_ORDER of the last gate evaluated in this attempt. */
  last: number;
}

/**
 * Runs gates in the fixed order Meaning → Consistency → RFL → Ethics → ACC
 * and writes one audit row per verdict.
 *
 * Meaning runs once per task. Each attempt starts again at Consistency. A
 * gate may be skipped forward but never revisited within an attempt.
 */
export class GatePipeline {
  private readonly cursors = new Map<string, Cursor>();
  private readonly logger = getLogger();

  constructor(
    private readonly gates: GateSet,
    private readonly audit: AuditTrail,
    private readonly events?: EventBus,
  ) {}

  async pass(gate: GateName, input: GateInput): Promise<GateOutcome> {
    this.advance(gate, input);

    const outcome = await this.gates[gate].run(input);
    const ctx = rowContext(input);
    this.audit.record(buildRow(`GATE_${gate.toUpperCase()}`, gate, outcome.verdict, ctx));
    if (outcome.verdict.sealed) {
      this.audit.record(buildRow('AGENT_SEALED', gate, outcome.verdict, ctx, { gate }));
      this.logger.warn({ runId: input.runId, taskId: input.taskId, gate, reasonCode: outcome.verdict.reasonCode }, 'Run sealed');
    }

    this.events?.emit('gate:verdict', {
      runId: input.runId,
      taskId: input.taskId,
      gate,
      attempt: input.attempt,
      verdict: outcome.verdict,
      durationMs: outcome.durationMs,
    });
    return outcome;
  }

  /**
   * HITL firepoint. Records the request; without a resolver the task stays
   * paused (`PENDING`), otherwise the human's choice is recorded as final.
   */
  async escalate(source: Layer, verdict: Verdict, input: GateInput, resolver?: HitlResolver): Promise<EscalationResult> {
    const ctx = rowContext(input);
    const request: HitlRequest = {
      runId: input.runId,
      taskId: input.taskId,
      kind: input.kind,
      layer: source,
      reasonCode: verdict.reasonCode,
      attempt: input.attempt,
    };

    this.audit.record(
      buildRow('HITL_REQUESTED', 'hitl_request', pauseVerdict(verdict.reasonCode), ctx, {
        evidence: { source_layer: source },
      }),
    );
    this.events?.emit('hitl:requested', request);

    if (!resolver) {
      return 'PENDING';
    }

    let choice: HitlChoice;
    let resolverError: string | undefined;
    try {
      choice = await resolver(request);
    } catch (err) {
      resolverError = errorMessage(err);
      this.logger.error({ runId: input.runId, taskId: input.taskId, error: resolverError }, 'HITL resolver failed, stopping task');
      choice = 'STOP';
    }

    this.audit.record(
      buildRow('HITL_DECIDED', 'hitl_finalize', userVerdict(choice), ctx, {
        choice,
        evidence: resolverError === undefined
          ? { source_layer: source, source_reason: verdict.reasonCode }
          : { source_layer: source, source_reason: verdict.reasonCode, resolver_error: resolverError },
      }),
    );
    this.events?.emit('hitl:decided', { request, choice });
    return choice;
  }

  private advance(gate: GateName, input: GateInput): void {
    const index = GATE_ORDER.indexOf(gate);
    const cursor = this.cursors.get(input.taskId);

    if (gate === 'meaning') {
      if (cursor) throw new GateOrderError(gate, GATE_ORDER[cursor.last] ?? 'meaning');
      this.cursors.set(input.taskId, { attempt: input.attempt, last: index });
      return;
    }

    if (!cursor) throw new GateOrderError(gate, 'start');

    if (input.attempt !== cursor.attempt) {
      if (input.attempt < cursor.attempt || gate !== 'consistency') {
        throw new GateOrderError(gate, `attempt ${cursor.attempt}`);
      }
      cursor.attempt = input.attempt;
      cursor.last = index;
      return;
    }

    if (index <= cursor.last) {
      throw new GateOrderError(gate, GATE_ORDER[cursor.last] ?? 'meaning');
    }
    cursor.last = index;
  }
}

function rowContext(input: GateInput): RowContext {
  return { runId: input.runId, taskId: input.taskId, kind: input.kind, attempt: input.attempt };
}
