import { BaseGate } from './base-gate.js';
import type { GateInput } from './types.js';
import type { AccConfig } from '../core/types.js';
import { runVerdict, sealVerdict, type Verdict } from '../policy/lattice.js';
import { ReasonCode } from '../policy/reason-codes.js';

export const DEFAULT_ACC_CONFIG: AccConfig = {
  enableRunawaySeal: true,
  runawayThreshold: 5,
};

/**
 * Accountability gate: seals runaway runs (too many contract failures) and,
 * when budgeted, runs that keep going back to a human.
 */
export class AccGate extends BaseGate {
  readonly name = 'acc' as const;
  readonly description = 'Seals runs that exceed the failure or HITL budget';

  private readonly config: AccConfig;

  constructor(config: Partial<AccConfig> = {}) {
    super();
    this.config = { ...DEFAULT_ACC_CONFIG, ...config };
  }

  protected evaluate(input: GateInput): Verdict {
    const { enableRunawaySeal, runawayThreshold, maxHitlRounds } = this.config;

    if (enableRunawaySeal && input.failuresTotal >= runawayThreshold) {
      return sealVerdict('acc', ReasonCode.SEALED_BY_ACC, {
        failures_total: input.failuresTotal,
        threshold: runawayThreshold,
      });
    }
    if (maxHitlRounds !== undefined && input.hitlRounds > maxHitlRounds) {
      return sealVerdict('acc', ReasonCode.ACC_LOOP_BUDGET_EXCEEDED, {
        hitl_rounds: input.hitlRounds,
        max_hitl_rounds: maxHitlRounds,
      });
    }
    return runVerdict(ReasonCode.ACC_OK);
  }
}
