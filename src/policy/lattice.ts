/**
 * Decision lattice — the one place that decides which verdicts are legal.
 *
 * Every gate, the HITL firepoint and the orchestrator build verdicts through
 * the constructors below, and every audit row is checked against
 * {@link verdictViolations} before it is persisted.
 *
 *   RUN             never sealed, never overrideable
 *   PAUSE_FOR_HITL  overrideable, decided by SYSTEM, never sealed
 *   STOPPED         may be sealed, but only by ethics or acc
 */

import { SealViolationError } from '../core/errors.js';
import type { Decision, FinalDecider, HitlChoice, Layer } from '../core/types.js';
import { ReasonCode } from './reason-codes.js';

export interface Verdict {
  decision: Decision;
  reasonCode: string;
  sealed: boolean;
  overrideable: boolean;
  finalDecider: FinalDecider;
  evidence?: Record<string, unknown>;
}

/** Layers allowed to seal. RFL never seals. */
export const SEALING_LAYERS: ReadonlySet<string> = new Set<Layer>(['ethics', 'acc']);

export function canSeal(layer: string): boolean {
  return SEALING_LAYERS.has(layer);
}

export function runVerdict(reasonCode: string, evidence?: Record<string, unknown>): Verdict {
  return { decision: 'RUN', reasonCode, sealed: false, overrideable: false, finalDecider: 'SYSTEM', evidence };
}

export function pauseVerdict(reasonCode: string, evidence?: Record<string, unknown>): Verdict {
  return { decision: 'PAUSE_FOR_HITL', reasonCode, sealed: false, overrideable: true, finalDecider: 'SYSTEM', evidence };
}

export function stopVerdict(
  reasonCode: string,
  finalDecider: FinalDecider = 'SYSTEM',
  evidence?: Record<string, unknown>,
): Verdict {
  return { decision: 'STOPPED', reasonCode, sealed: false, overrideable: false, finalDecider, evidence };
}

export function sealVerdict(layer: Layer, reasonCode: string, evidence?: Record<string, unknown>): Verdict {
  if (!canSeal(layer)) {
    throw new SealViolationError(`Layer "${layer}" is not allowed to seal (${reasonCode})`, layer);
  }
  return { decision: 'STOPPED', reasonCode, sealed: true, overrideable: false, finalDecider: 'SYSTEM', evidence };
}

/** The verdict recorded when a human answers a HITL request. */
export function userVerdict(choice: HitlChoice): Verdict {
  return choice === 'CONTINUE'
    ? { decision: 'RUN', reasonCode: ReasonCode.HITL_CONTINUE, sealed: false, overrideable: false, finalDecider: 'USER' }
    : { decision: 'STOPPED', reasonCode: ReasonCode.HITL_STOP, sealed: false, overrideable: false, finalDecider: 'USER' };
}

export function verdictViolations(layer: string, v: Pick<Verdict, 'decision' | 'sealed' | 'overrideable' | 'finalDecider'>): string[] {
  const problems: string[] = [];

  if (v.sealed) {
    if (v.decision !== 'STOPPED') problems.push(`sealed verdict must be STOPPED (got ${v.decision})`);
    if (v.overrideable) problems.push('sealed verdict cannot be overrideable');
    if (v.finalDecider !== 'SYSTEM') problems.push('sealed verdict must be decided by SYSTEM');
    if (!canSeal(layer)) problems.push(`layer "${layer}" cannot seal`);
  }

  if (v.decision === 'PAUSE_FOR_HITL') {
    if (!v.overrideable) problems.push('PAUSE_FOR_HITL must be overrideable');
    if (v.finalDecider !== 'SYSTEM') problems.push('PAUSE_FOR_HITL must be decided by SYSTEM');
  }

  if (v.decision === 'RUN' && v.overrideable) {
    problems.push('RUN cannot be overrideable');
  }

  if (v.finalDecider === 'USER' && v.decision === 'PAUSE_FOR_HITL') {
    problems.push('USER cannot leave a task paused');
  }

  return problems;
}

export function assertLegalVerdict(layer: string, v: Verdict): void {
  const problems = verdictViolations(layer, v);
  if (problems.length > 0) {
    throw new SealViolationError(`Illegal verdict at ${layer} (${v.reasonCode}): ${problems[0]}`, layer);
  }
}

/** Severity order used when folding several verdicts into one. */
export function decisionRank(decision: Decision): number {
  switch (decision) {
    case 'RUN':
      return 0;
    case 'PAUSE_FOR_HITL':
      return 1;
    case 'STOPPED':
      return 2;
  }
}
