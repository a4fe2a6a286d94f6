import type { Gate, GateInput, GateOutcome, GateSubject } from './types.js';
import type { GateName, Layer } from '../core/types.js';
import { SealViolationError, errorMessage } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { assertLegalVerdict, stopVerdict, type Verdict } from '../policy/lattice.js';
import { ReasonCode } from '../policy/reason-codes.js';
import { Timer } from '../utils/timer.js';

export abstract class BaseGate<I extends GateSubject = GateInput, N extends Layer = GateName> implements Gate<I, N> {
  abstract readonly name: N;
  abstract readonly description: string;

  protected logger = getLogger();

  async run(input: I): Promise<GateOutcome<N>> {
    const timer = new Timer();
    this.logger.debug({ gate: this.name, runId: input.runId, taskId: input.taskId, attempt: input.attempt }, 'Evaluating gate');

    let verdict: Verdict;
    try {
      verdict = await this.evaluate(input);
    } catch (err) {
      if (err instanceof SealViolationError) throw err;
      const message = errorMessage(err);
      this.logger.error({ gate: this.name, error: message }, 'Gate crashed, failing closed');
      verdict = stopVerdict(ReasonCode.GATE_ERROR, 'SYSTEM', { error: message });
    }

    assertLegalVerdict(this.name, verdict);
    const durationMs = timer.stop();
    this.logger.debug({ gate: this.name, decision: verdict.decision, reasonCode: verdict.reasonCode, durationMs }, 'Gate verdict');

    return { gate: this.name, verdict, durationMs };
  }

  protected abstract evaluate(input: I): Verdict | Promise<Verdict>;
}
