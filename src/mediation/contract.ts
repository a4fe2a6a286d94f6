import { ConfigError } from '../core/errors.js';
import {
  AuthRequestSchema,
  EVIDENCE_SCHEMA_VERSION,
  type AuthRequest,
  type Contract,
  type ContractDraft,
  type EvidenceBundle,
} from './types.js';

export const PRIORITY_POLICY = 'LIFE > PEDESTRIAN > VEHICLE';
export const DEFAULT_SCENARIO = 'CASE_B_PED_IN_CROSSWALK_EMERGENCY_PRESENT';
export const DEFAULT_LOCATION = 'INT-042';

export interface EvidenceBundleOptions {
  scenario?: string;
  locationId?: string;
  fabricated?: boolean;
  retrievedAt: Date;
}

/** Simulated sensor evidence for an emergency-priority request. */
export function buildEvidenceBundle(options: EvidenceBundleOptions): EvidenceBundle {
  const locationId = options.locationId ?? DEFAULT_LOCATION;
  return {
    schemaVersion: EVIDENCE_SCHEMA_VERSION,
    scenario: options.scenario ?? DEFAULT_SCENARIO,
    locationId,
    items: [
      {
        evidenceId: 'EV#001',
        sourceId: 'SIM_SOURCE',
        locator: { kind: 'SIM', location_id: locationId },
        retrievedAt: options.retrievedAt.toISOString(),
        hash: { algo: 'sha256', value: 'SIMULATED' },
        supports: [
          { claim: 'emergency_vehicle_present', value: true },
          { claim: 'ped_in_crosswalk', value: true },
        ],
        fabricated: options.fabricated ?? false,
        relevance: 'high',
      },
    ],
  };
}

export interface AuthRequestOptions {
  authRequestId: string;
  authId: string;
  scenario: string;
  locationId: string;
  now: Date;
  ttlSeconds: number;
}

export function buildAuthRequest(options: AuthRequestOptions): AuthRequest {
  const parsed = AuthRequestSchema.safeParse({
    schemaVersion: '1.0',
    authRequestId: options.authRequestId,
    authId: options.authId,
    context: {
      scenario: options.scenario,
      locationId: options.locationId,
      emergencyVehicleState: 'WAITING_AT_SIGNAL',
      pedInCrosswalk: true,
    },
    expiresAt: new Date(options.now.getTime() + options.ttlSeconds * 1000).toISOString(),
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid auth request: ${issue?.path.join('.')} ${issue?.message}`, parsed.error);
  }
  return parsed.data;
}

export function isAuthRequestExpired(request: AuthRequest, now: Date): boolean {
  return now.getTime() > Date.parse(request.expiresAt);
}

export function generateContractDraft(runId: string, request: AuthRequest, now: Date): ContractDraft {
  const draftId = `DRAFT#${runId}`;
  const content = `# Agreement Draft (Emergency Signal Priority)
**Draft ID**: ${draftId}
**Run ID**: ${runId}
**Policy**: ${PRIORITY_POLICY}
**Scenario**: ${request.context.scenario}
**Location**: ${request.context.locationId}
**Auth Request ID**: ${request.authRequestId}
**Generated At**: ${now.toISOString()}

---
## 1. Purpose
Establish an operational priority order for signal control under emergency presence.

## 2. Priority Order
1) LIFE (Emergency vehicle)
2) PEDESTRIAN (in crosswalk)
3) VEHICLE (general traffic)

## 3. Pedestrian in crosswalk with an emergency vehicle present
- While a **pedestrian is in the crosswalk**, pedestrian protection remains active.
- The pedestrian phase **must not be shortened**.
- Emergency priority applies **at the next cycle**, right after pedestrian clearance.
- A minimum safety clearance (all-red) precedes the emergency green.

## 4. Safety Notes
- This document is a **draft** and has **no operational effect** until ADMIN final approval.
- AI is used for **drafting only**; it does not grant permissions and cannot authorize actions.

## 5. Effective Condition
This draft becomes effective only after the ADMIN approval event references this Draft ID.
`;
  return { draftId, content, authRequestId: request.authRequestId };
}

export function finalizeContract(runId: string, draft: ContractDraft, approvedBy: string, now: Date): Contract {
  const contractId = `CONTRACT#${runId}`;
  const effectiveAt = now.toISOString();
  const content = `${draft.content}
---
# ADMIN Finalization
**Contract ID**: ${contractId}
**Finalized At**: ${effectiveAt}
**Finalized By**: ${approvedBy}
`;
  return { contractId, draftId: draft.draftId, content, effectiveAt };
}
