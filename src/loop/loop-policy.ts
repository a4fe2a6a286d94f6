/**
 * HITL loop budget for long-running mediation sessions.
 *
 * Counts human pauses per conflict (session + fingerprint). At
 * `planRequestRound` a plan is requested once. At `hitlMaxRounds` ending the
 * session is recommended once, and the maestro then issues a single sealed
 * stop. After that the session is terminal: every further event is answered
 * with a sealed `ACC_STOPPED_IS_TERMINAL`.
 *
 * Malformed events never count. They are answered with a fail-closed pause
 * that uses a non-counting kind, so they cannot advance the budget.
 */

import { z } from 'zod';
import { ConfigError } from '../core/errors.js';

export type LoopDecision = 'PAUSE_FOR_HITL' | 'STOPPED' | 'END_SESSION_RECOMMENDED';

/** Event kinds. Kept disjoint from decision values so logs never confuse the two. */
export const LoopKind = {
  HITL_PAUSE: 'K_HITL_PAUSE',
  PLAN_REQUESTED: 'K_PLAN_REQUESTED',
  PLAN_REQ_DISPATCH: 'K_PLAN_REQ_DISPATCH',
  PLAN_PROPOSED: 'K_PLAN_PROPOSED',
  PLAN_RECEIVED: 'K_PLAN_RECEIVED',
  END_RECOMMENDED: 'K_END_RECOMMENDED',
  STOPPED: 'K_STOPPED',
} as const;
export type LoopKind = (typeof LoopKind)[keyof typeof LoopKind];

export const LoopReason = {
  SPEC_INVALID_INPUT: 'SPEC_INVALID_INPUT',
  SPEC_MISSING_KEYS: 'SPEC_MISSING_KEYS',
  PLAN_REQUESTED: 'REL_PLAN_REQUESTED_AFTER_3_HITL',
  LOOP_BUDGET_EXCEEDED: 'ACC_LOOP_BUDGET_EXCEEDED',
  PLAN_REQUEST_DISPATCHED: 'MAESTRO_PLAN_REQUEST_DISPATCHED',
  PLAN_PROPOSED: 'MEDIATION_PLAN_PROPOSED',
  PLAN_RECEIVED: 'MAESTRO_PLAN_RECEIVED',
  END_SESSION: 'ACC_END_SESSION_AFTER_4_HITL',
  STOPPED_IS_TERMINAL: 'ACC_STOPPED_IS_TERMINAL',
} as const;

export const RESET_REASONS = [
  'conflict_fingerprint_change',
  'explicit_new_session_start',
  'user_provides_required_info_for_blocking_fields',
] as const;
export type ResetReason = (typeof RESET_REASONS)[number];

export const LoopPolicySpecSchema = z
  .object({
    hitlMaxRounds: z.number().int().min(1).default(4),
    planRequestRound: z.number().int().min(1).default(3),
    resetOn: z.array(z.enum(RESET_REASONS)).default([...RESET_REASONS]),
    neverResetWithinSameConflict: z.boolean().default(true),
  })
  .refine(spec => spec.planRequestRound < spec.hitlMaxRounds, {
    message: 'require 1 <= planRequestRound < hitlMaxRounds',
    path: ['planRequestRound'],
  });

export type LoopPolicySpec = z.infer<typeof LoopPolicySpecSchema>;

export function createLoopPolicySpec(input: z.input<typeof LoopPolicySpecSchema> = {}): LoopPolicySpec {
  const parsed = LoopPolicySpecSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(`Invalid loop policy: ${parsed.error.issues.map(i => i.message).join('; ')}`, parsed.error);
  }
  return parsed.data;
}

export interface LoopEvent {
  eventId: string;
  timestamp: string;
  sessionId: string;
  runId: string;
  layer: string;
  decision: LoopDecision;
  kind: string;
  reasonCode: string;
  conflictFingerprint: string;
  sealed: boolean;
  overrideable: boolean;
  finalDecider: 'SYSTEM' | 'USER';
  payload?: Record<string, unknown>;
}

export class SessionState {
  isStopped = false;
  stopIssued = false;
  readonly planRequestDispatched = new Set<string>();
  readonly planProposed = new Set<string>();
  readonly planReceived = new Set<string>();

  constructor(public readonly sessionId: string) {}

  /** Pair with {@link HitlCounter.resetIfAllowed} on `explicit_new_session_start`. */
  reset(): void {
    this.isStopped = false;
    this.stopIssued = false;
    this.planRequestDispatched.clear();
    this.planProposed.clear();
    this.planReceived.clear();
  }
}

export function conflictKey(sessionId: string, fingerprint: string): string {
  return `${sessionId}|${fingerprint}`;
}

export function hasMinKeys(e: LoopEvent): boolean {
  return e.sessionId !== '' && e.conflictFingerprint !== '' && e.eventId !== '';
}

const PAUSE_KINDS: ReadonlySet<string> = new Set([
  LoopKind.HITL_PAUSE,
  LoopKind.PLAN_REQUESTED,
  LoopKind.PLAN_REQ_DISPATCH,
  LoopKind.PLAN_PROPOSED,
  LoopKind.PLAN_RECEIVED,
]);

/**
 * END_RECOMMENDED ↔ END_SESSION_RECOMMENDED, STOPPED ↔ STOPPED, every other
 * known kind pairs with PAUSE_FOR_HITL. Unknown kinds never pair.
 */
export function isValidPairing(e: Pick<LoopEvent, 'kind' | 'decision'>): boolean {
  if (e.kind === LoopKind.END_RECOMMENDED) return e.decision === 'END_SESSION_RECOMMENDED';
  if (e.kind === LoopKind.STOPPED) return e.decision === 'STOPPED';
  if (PAUSE_KINDS.has(e.kind)) return e.decision === 'PAUSE_FOR_HITL';
  return false;
}

export function failClosedEvent(base: LoopEvent | null, reasonCode: string, layer: string): LoopEvent {
  const common = {
    layer,
    decision: 'PAUSE_FOR_HITL',
    kind: LoopKind.PLAN_RECEIVED,
    reasonCode,
    sealed: false,
    overrideable: true,
    finalDecider: 'SYSTEM',
  } as const;

  if (!base) {
    return {
      ...common,
      eventId: 'fail_closed',
      timestamp: '',
      sessionId: '',
      runId: '',
      conflictFingerprint: '',
      payload: { note: 'fail-closed', original: null },
    };
  }
  return {
    ...common,
    eventId: `${base.eventId}::fail_closed`,
    timestamp: base.timestamp,
    sessionId: base.sessionId,
    runId: base.runId,
    conflictFingerprint: base.conflictFingerprint,
    payload: {
      note: 'fail-closed',
      original_kind: base.kind,
      original_decision: base.decision,
      original_reason_code: base.reasonCode,
    },
  };
}

function derive(base: LoopEvent, suffix: string, fields: Pick<LoopEvent, 'layer' | 'decision' | 'kind' | 'reasonCode'> & Partial<LoopEvent>): LoopEvent {
  return {
    eventId: `${base.eventId}::${suffix}`,
    timestamp: base.timestamp,
    sessionId: base.sessionId,
    runId: base.runId,
    conflictFingerprint: base.conflictFingerprint,
    sealed: false,
    overrideable: true,
    finalDecider: 'SYSTEM',
    ...fields,
  };
}

/** Reject malformed input before any state changes. */
function screen(e: LoopEvent, layer: string): LoopEvent | null {
  if (!hasMinKeys(e)) return failClosedEvent(e, LoopReason.SPEC_MISSING_KEYS, layer);
  if (!isValidPairing(e)) return failClosedEvent(e, LoopReason.SPEC_INVALID_INPUT, layer);
  return null;
}

export interface CounterResult {
  count: number;
  planRequested: LoopEvent | null;
  endRecommended: LoopEvent | null;
}

export class HitlCounter {
  private readonly seenBySession = new Map<string, Set<string>>();
  private readonly counts = new Map<string, number>();
  private readonly planRequestedKeys = new Set<string>();
  private readonly endRecommendedKeys = new Set<string>();

  constructor(private readonly spec: LoopPolicySpec) {}

  countFor(sessionId: string, fingerprint: string): number {
    return this.counts.get(conflictKey(sessionId, fingerprint)) ?? 0;
  }

  /**
   * Count a `K_HITL_PAUSE` once per event id and emit the one-shot plan
   * request and end recommendation when their rounds are reached. Invalid
   * events are ignored here; callers answer them fail-closed.
   */
  observe(e: LoopEvent): CounterResult {
    if (!hasMinKeys(e)) return { count: 0, planRequested: null, endRecommended: null };

    const key = conflictKey(e.sessionId, e.conflictFingerprint);
    const current = this.counts.get(key) ?? 0;
    if (e.kind !== LoopKind.HITL_PAUSE) return { count: current, planRequested: null, endRecommended: null };

    let seen = this.seenBySession.get(e.sessionId);
    if (!seen) {
      seen = new Set();
      this.seenBySession.set(e.sessionId, seen);
    }
    const dedupeId = `${e.sessionId}|${e.conflictFingerprint}|${e.eventId}`;
    if (seen.has(dedupeId)) return { count: current, planRequested: null, endRecommended: null };
    seen.add(dedupeId);

    const count = current + 1;
    this.counts.set(key, count);

    let planRequested: LoopEvent | null = null;
    let endRecommended: LoopEvent | null = null;

    if (count === this.spec.planRequestRound && !this.planRequestedKeys.has(key)) {
      this.planRequestedKeys.add(key);
      planRequested = derive(e, 'plan_requested', {
        layer: 'mediation',
        decision: 'PAUSE_FOR_HITL',
        kind: LoopKind.PLAN_REQUESTED,
        reasonCode: LoopReason.PLAN_REQUESTED,
      });
    }

    if (count === this.spec.hitlMaxRounds && !this.endRecommendedKeys.has(key)) {
      this.endRecommendedKeys.add(key);
      endRecommended = derive(e, 'end_recommended', {
        layer: 'acc',
        decision: 'END_SESSION_RECOMMENDED',
        kind: LoopKind.END_RECOMMENDED,
        reasonCode: LoopReason.LOOP_BUDGET_EXCEEDED,
      });
    }

    return { count, planRequested, endRecommended };
  }

  resetIfAllowed(sessionId: string, oldFingerprint: string, newFingerprint: string, reason: ResetReason): void {
    if (reason === 'explicit_new_session_start') {
      this.seenBySession.delete(sessionId);
      const prefix = `${sessionId}|`;
      for (const key of [...this.counts.keys()]) {
        if (key.startsWith(prefix)) this.forget(key);
      }
      return;
    }

    if (this.spec.neverResetWithinSameConflict && oldFingerprint === newFingerprint) return;
    if (!this.spec.resetOn.includes(reason)) return;
    this.forget(conflictKey(sessionId, oldFingerprint));
  }

  private forget(key: string): void {
    this.counts.delete(key);
    this.planRequestedKeys.delete(key);
    this.endRecommendedKeys.delete(key);
  }
}

/** Any event reaching a stopped session gets a sealed terminal answer. */
export function enforceTerminalGuard(state: SessionState, incoming: LoopEvent): LoopEvent | null {
  if (!state.isStopped) return null;
  return derive(incoming, 'terminal_guard', {
    layer: 'maestro',
    decision: 'STOPPED',
    kind: LoopKind.STOPPED,
    reasonCode: LoopReason.STOPPED_IS_TERMINAL,
    sealed: true,
    overrideable: false,
  });
}

/** K_PLAN_REQUESTED → one K_PLAN_REQ_DISPATCH per conflict. */
export function dispatchPlanRequest(state: SessionState, base: LoopEvent): LoopEvent | null {
  const rejected = screen(base, 'maestro');
  if (rejected) return rejected;
  if (base.kind !== LoopKind.PLAN_REQUESTED) return null;

  const key = conflictKey(base.sessionId, base.conflictFingerprint);
  if (state.planRequestDispatched.has(key)) return null;
  state.planRequestDispatched.add(key);

  return derive(base, 'plan_req_dispatch', {
    layer: 'maestro',
    decision: 'PAUSE_FOR_HITL',
    kind: LoopKind.PLAN_REQ_DISPATCH,
    reasonCode: LoopReason.PLAN_REQUEST_DISPATCHED,
  });
}

/** K_PLAN_REQ_DISPATCH → one K_PLAN_PROPOSED per conflict. Other kinds are ignored. */
export function proposePlan(state: SessionState, base: LoopEvent, planText: string): LoopEvent | null {
  if (base.kind !== LoopKind.PLAN_REQ_DISPATCH) return null;
  const rejected = screen(base, 'mediation');
  if (rejected) return rejected;

  const key = conflictKey(base.sessionId, base.conflictFingerprint);
  if (state.planProposed.has(key)) return null;
  state.planProposed.add(key);

  return derive(base, 'plan_proposed', {
    layer: 'mediation',
    decision: 'PAUSE_FOR_HITL',
    kind: LoopKind.PLAN_PROPOSED,
    reasonCode: LoopReason.PLAN_PROPOSED,
    payload: { plan: planText },
  });
}

/** K_PLAN_PROPOSED → one K_PLAN_RECEIVED per conflict. Other kinds are ignored. */
export function ackPlanReceived(state: SessionState, base: LoopEvent): LoopEvent | null {
  if (base.kind !== LoopKind.PLAN_PROPOSED) return null;
  const rejected = screen(base, 'maestro');
  if (rejected) return rejected;

  const key = conflictKey(base.sessionId, base.conflictFingerprint);
  if (state.planReceived.has(key)) return null;
  state.planReceived.add(key);

  return derive(base, 'plan_received', {
    layer: 'maestro',
    decision: 'PAUSE_FOR_HITL',
    kind: LoopKind.PLAN_RECEIVED,
    reasonCode: LoopReason.PLAN_RECEIVED,
  });
}

/** K_END_RECOMMENDED → the session's single sealed stop. */
export function maybeStop(state: SessionState, e: LoopEvent): LoopEvent | null {
  const rejected = screen(e, 'maestro');
  if (rejected) return rejected;
  if (e.kind !== LoopKind.END_RECOMMENDED || e.decision !== 'END_SESSION_RECOMMENDED') return null;
  if (state.stopIssued) return null;

  state.isStopped = true;
  state.stopIssued = true;
  return derive(e, 'stop', {
    layer: 'maestro',
    decision: 'STOPPED',
    kind: LoopKind.STOPPED,
    reasonCode: LoopReason.END_SESSION,
    sealed: true,
    overrideable: false,
  });
}

/**
 * Wires counter and maestro together for one stream of session events.
 * `observe` returns everything the policy emits in response, in order.
 */
export class LoopController {
  readonly spec: LoopPolicySpec;
  private readonly counter: HitlCounter;
  private readonly sessions = new Map<string, SessionState>();

  constructor(spec: z.input<typeof LoopPolicySpecSchema> = {}) {
    this.spec = createLoopPolicySpec(spec);
    this.counter = new HitlCounter(this.spec);
  }

  session(sessionId: string): SessionState {
    let state = this.sessions.get(sessionId);
    if (!state) {
      state = new SessionState(sessionId);
      this.sessions.set(sessionId, state);
    }
    return state;
  }

  count(sessionId: string, fingerprint: string): number {
    return this.counter.countFor(sessionId, fingerprint);
  }

  observe(e: LoopEvent): LoopEvent[] {
    const rejected = screen(e, 'maestro');
    if (rejected) return [rejected];

    const state = this.session(e.sessionId);
    const guard = enforceTerminalGuard(state, e);
    if (guard) return [guard];

    const out: LoopEvent[] = [];
    const { planRequested, endRecommended } = this.counter.observe(e);
    if (planRequested) {
      out.push(planRequested);
      const dispatched = dispatchPlanRequest(state, planRequested);
      if (dispatched) out.push(dispatched);
    }
    if (endRecommended) {
      out.push(endRecommended);
      const stop = maybeStop(state, endRecommended);
      if (stop) out.push(stop);
    }
    return out;
  }

  startNewSession(sessionId: string): void {
    this.counter.resetIfAllowed(sessionId, '', '', 'explicit_new_session_start');
    this.session(sessionId).reset();
  }
}
