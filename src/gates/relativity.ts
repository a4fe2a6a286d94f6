import { BaseGate } from './base-gate.js';
import type { GateInput } from './types.js';
import {
  DEFAULT_REFERENCE_TOKENS,
  DEFAULT_RFL_TRIGGERS,
  DEFAULT_STEERING_TOKENS,
  type RelativityConfig,
} from '../core/types.js';
import { pauseVerdict, runVerdict, type Verdict } from '../policy/lattice.js';
import { ReasonCode } from '../policy/reason-codes.js';

function firstMatch(lower: string, tokens: readonly string[]): string | undefined {
  return tokens.find(token => lower.includes(token.toLowerCase()));
}

/**
 * Relativity Filter (RFL). Flags prompts whose answer depends on a judgement
 * the system cannot make on its own: preference questions, steering toward a
 * fixed answer, or references to material that was not supplied.
 *
 * RFL only ever pauses. It has no sealing path.
 */
export class RelativityGate extends BaseGate {
  readonly name = 'rfl' as const;
  readonly description = 'Pauses subjective, steered or unreferenced requests for a human';

  private readonly config: RelativityConfig;

  constructor(config: Partial<RelativityConfig> = {}) {
    super();
    this.config = {
      triggers: config.triggers ?? DEFAULT_RFL_TRIGGERS,
      referenceTokens: config.referenceTokens ?? DEFAULT_REFERENCE_TOKENS,
      steeringTokens: config.steeringTokens ?? DEFAULT_STEERING_TOKENS,
    };
  }

  protected evaluate(input: GateInput): Verdict {
    const lower = input.prompt.toLowerCase();

    const reference = firstMatch(lower, this.config.referenceTokens);
    if (reference !== undefined && (input.references ?? []).length === 0) {
      return pauseVerdict(ReasonCode.REL_REF_MISSING, { token: reference });
    }

    const trigger = firstMatch(lower, this.config.triggers);
    if (trigger === undefined) {
      return runVerdict(ReasonCode.REL_OK);
    }

    const steering = firstMatch(lower, this.config.steeringTokens);
    if (steering !== undefined) {
      return pauseVerdict(ReasonCode.REL_SYMMETRY_BREAK, { trigger, token: steering });
    }
    return pauseVerdict(ReasonCode.REL_BOUNDARY_UNSTABLE, { trigger });
  }
}
