import { BaseGate } from '../gates/base-gate.js';
import type { HitlChoice } from '../core/types.js';
import { pauseVerdict, runVerdict, stopVerdict, userVerdict, type Verdict } from '../policy/lattice.js';
import { ReasonCode } from '../policy/reason-codes.js';
import { sha256 } from '../utils/crypto.js';
import { stableStringify } from '../utils/stable-json.js';

export interface DefinitionPack {
  version: string;
  /** Features a candidate must show to be IN. */
  mustFeatures: string[];
  /** Any of these stops the candidate, whatever a human says. */
  safetyRedFlags: string[];
  /** Met features needed for IN. */
  inThreshold: number;
  /** At or below this many met features the candidate is OUT. */
  outThreshold: number;
}

export const DEFAULT_DEFINITION_PACK: DefinitionPack = {
  version: 'definition_gate_v1',
  mustFeatures: ['task_decomposition', 'routing', 'guardrails_fail_closed', 'audit_reason_codes', 'hitl_escalation'],
  safetyRedFlags: ['autonomous_external_actions', 'pii_seeking_behavior', 'manipulation_intent'],
  inThreshold: 5,
  outThreshold: 2,
};

export type DefinitionClass = 'IN' | 'OUT' | 'GRAY';

export interface DefinitionInput {
  runId: string;
  /** Feature flags observed on the candidate. */
  candidate: Readonly<Record<string, boolean>>;
}

export interface DefinitionAssessment {
  result: DefinitionClass;
  met: string[];
  missing: string[];
  confidence: number;
}

export function assessDefinition(candidate: Readonly<Record<string, boolean>>, pack: DefinitionPack = DEFAULT_DEFINITION_PACK): DefinitionAssessment {
  const met = pack.mustFeatures.filter(f => candidate[f] === true);
  const missing = pack.mustFeatures.filter(f => candidate[f] !== true);
  const result: DefinitionClass =
    met.length >= pack.inThreshold ? 'IN' : met.length <= pack.outThreshold ? 'OUT' : 'GRAY';
  const inScore = met.length / Math.max(1, pack.mustFeatures.length);
  const confidence = result === 'IN' ? inScore : result === 'OUT' ? 1 - inScore : 0.5;
  return { result, met, missing, confidence: Math.round(confidence * 1000) / 1000 };
}

/**
 * Classifies a candidate against a fixed definition pack: IN runs, OUT stops,
 * GRAY pauses for a human. Safety red flags stop before classification
 * matters and cannot be overridden.
 */
export class DefinitionGate extends BaseGate<DefinitionInput, 'definition'> {
  readonly name = 'definition' as const;
  readonly description = 'Classifies candidates against a definition pack, escalating ambiguous ones';

  constructor(private readonly pack: DefinitionPack = DEFAULT_DEFINITION_PACK) {
    super();
  }

  protected evaluate(input: DefinitionInput): Verdict {
    const assessment = assessDefinition(input.candidate, this.pack);
    const evidence = {
      candidate_hash: sha256(stableStringify(input.candidate)),
      pack_version: this.pack.version,
      definition: {
        result: assessment.result,
        met: assessment.met,
        missing: assessment.missing,
        confidence: assessment.confidence,
      },
    };

    const flags = this.pack.safetyRedFlags.filter(f => input.candidate[f] === true);
    if (flags.length > 0) {
      return stopVerdict(ReasonCode.SAFETY_RED_FLAG, 'SYSTEM', { ...evidence, safety_red_flags: flags });
    }

    switch (assessment.result) {
      case 'IN':
        return runVerdict(ReasonCode.DEF_IN, evidence);
      case 'OUT':
        return stopVerdict(ReasonCode.DEF_OUT, 'SYSTEM', evidence);
      case 'GRAY':
        return pauseVerdict(ReasonCode.DEFINITION_AMBIGUOUS, evidence);
    }
  }
}

/**
 * Final verdict after a human answers a definition pause. A red-flag stop
 * stays stopped, and a verdict that never paused is returned unchanged.
 */
export function resolveDefinition(verdict: Verdict, choice: HitlChoice): Verdict {
  if (verdict.reasonCode === ReasonCode.SAFETY_RED_FLAG) {
    return stopVerdict(ReasonCode.NON_OVERRIDABLE_SAFETY, 'SYSTEM', { user_choice_received: choice });
  }
  if (verdict.decision !== 'PAUSE_FOR_HITL') return verdict;
  return {
    ...userVerdict(choice),
    reasonCode: choice === 'CONTINUE' ? ReasonCode.DEF_APPROVED : ReasonCode.DEF_REJECTED,
    evidence: { original_reason_code: verdict.reasonCode },
  };
}
