import { BaseGate } from '../gates/base-gate.js';
import { pauseVerdict, runVerdict, stopVerdict, type Verdict } from '../policy/lattice.js';
import { ReasonCode } from '../policy/reason-codes.js';
import { EvidenceBundleSchema } from './types.js';

export interface EvidenceInput {
  runId: string;
  /** Unvalidated bundle as supplied by the caller. */
  bundle: unknown;
}

/**
 * Checks the evidence behind a mediation request.
 *
 * Missing or malformed bundles pause; a bundle with a fabricated item stops
 * the run. The gate never seals: the mediator hands fabrication to ethics
 * and a malformed bundle to ACC.
 */
export class EvidenceGate extends BaseGate<EvidenceInput, 'evidence'> {
  readonly name = 'evidence' as const;
  readonly description = 'Validates the evidence bundle and rejects fabricated items';

  protected evaluate(input: EvidenceInput): Verdict {
    if (input.bundle === undefined || input.bundle === null) {
      return pauseVerdict(ReasonCode.EVIDENCE_MISSING);
    }

    const parsed = EvidenceBundleSchema.safeParse(input.bundle);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return pauseVerdict(ReasonCode.EVIDENCE_SCHEMA_INVALID, {
        error: issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid bundle',
      });
    }

    const bundle = parsed.data;
    const fabricated = bundle.items.filter(item => item.fabricated).map(item => item.evidenceId);
    if (fabricated.length > 0) {
      return stopVerdict(ReasonCode.EVIDENCE_FABRICATION, 'SYSTEM', {
        scenario: bundle.scenario,
        location_id: bundle.locationId,
        fabricated_ids: fabricated,
      });
    }

    return runVerdict(ReasonCode.EVIDENCE_OK, {
      scenario: bundle.scenario,
      location_id: bundle.locationId,
      items: bundle.items.length,
    });
  }
}
