import { BaseGate } from './base-gate.js';
import type { GateInput } from './types.js';
import { validateContract } from './contracts.js';
import { pauseVerdict, runVerdict, type Verdict } from '../policy/lattice.js';

export class ConsistencyGate extends BaseGate {
  readonly name = 'consistency' as const;
  readonly description = 'Checks the agent draft against the output contract for its kind';

  protected evaluate(input: GateInput): Verdict {
    const check = validateContract(input.kind, input.draft);
    return check.ok ? runVerdict(check.reasonCode) : pauseVerdict(check.reasonCode);
  }
}
