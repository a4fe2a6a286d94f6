import { BaseGate } from './base-gate.js';
import type { GateInput } from './types.js';
import { containsEmail } from '../audit/redact.js';
import { runVerdict, sealVerdict, type Verdict } from '../policy/lattice.js';
import { ReasonCode } from '../policy/reason-codes.js';

/** Seals when the raw agent text carries an email address. */
export class EthicsGate extends BaseGate {
  readonly name = 'ethics' as const;
  readonly description = 'Seals the run when agent output contains personal data';

  protected evaluate(input: GateInput): Verdict {
    if (input.rawText !== undefined && containsEmail(input.rawText)) {
      return sealVerdict('ethics', ReasonCode.SEALED_BY_ETHICS, { pii_type: 'email' });
    }
    return runVerdict(ReasonCode.ETHICS_OK);
  }
}
