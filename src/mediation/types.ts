import { z } from 'zod';

// ===== Evidence =====

export const EVIDENCE_SCHEMA_VERSION = '1.0';

const isoTimestamp = z.string().regex(/^\d{4}-\d{2}-\d{2}T/, 'must be an ISO-8601 timestamp');

export const EvidenceItemSchema = z.object({
  evidenceId: z.string().min(1),
  sourceId: z.string().min(1),
  locator: z.record(z.unknown()),
  retrievedAt: isoTimestamp,
  hash: z.object({ algo: z.string().min(1), value: z.string().min(1) }),
  supports: z.array(z.object({ claim: z.string().min(1), value: z.unknown() })),
  fabricated: z.boolean(),
  relevance: z.enum(['high', 'medium', 'low']).optional(),
});

export const EvidenceBundleSchema = z.object({
  schemaVersion: z.literal(EVIDENCE_SCHEMA_VERSION),
  scenario: z.string().min(1),
  locationId: z.string().min(1),
  items: z.array(EvidenceItemSchema).min(1),
});

export type EvidenceItem = z.infer<typeof EvidenceItemSchema>;
export type EvidenceBundle = z.infer<typeof EvidenceBundleSchema>;

// ===== Authorization =====

export const AuthRequestSchema = z.object({
  schemaVersion: z.literal('1.0'),
  authRequestId: z.string().min(1),
  /** Placeholder authorization id, never a real credential. */
  authId: z.string().regex(/^EMG-[A-Z0-9]{6,20}$/, 'must match EMG-<6..20 uppercase letters or digits>'),
  context: z.object({
    scenario: z.string().min(1),
    locationId: z.string().min(1),
    emergencyVehicleState: z.string().min(1),
    pedInCrosswalk: z.boolean().optional(),
  }),
  expiresAt: isoTimestamp,
});

export type AuthRequest = z.infer<typeof AuthRequestSchema>;

// ===== Trust =====

export interface TrustState {
  score: number;
  approvalStreak: number;
  /** ISO timestamp; auto-authorization is off until then. */
  cooldownUntil: string | null;
}

export interface Grant {
  grantId: string;
  scenario: string;
  locationId: string;
  expiresAt: string;
  issuedBy: string;
}

export interface TrustPolicy {
  initialScore: number;
  /** Score needed for auto-authorization. */
  autoAuthScore: number;
  /** Consecutive rewarded approvals needed for auto-authorization. */
  autoAuthStreak: number;
  /** Cap on the sum of positive deltas within one run. */
  positiveCapPerRun: number;
  cooldownSeconds: number;
  deltas: {
    authApprove: number;
    finalizeApprove: number;
    authReject: number;
    lintFail: number;
    invalidEvent: number;
  };
}

export const DEFAULT_TRUST_POLICY: TrustPolicy = {
  initialScore: 0.9,
  autoAuthScore: 0.98,
  autoAuthStreak: 2,
  positiveCapPerRun: 0.03,
  cooldownSeconds: 300,
  deltas: {
    authApprove: 0.01,
    finalizeApprove: 0.02,
    authReject: -0.03,
    lintFail: -0.015,
    invalidEvent: -0.03,
  },
};

// ===== Runs =====

export type MediationState =
  | 'PAUSE_FOR_HITL_EVIDENCE'
  | 'PAUSE_FOR_HITL_AUTH'
  | 'PAUSE_FOR_HITL_FINALIZE'
  | 'CONTRACT_EFFECTIVE'
  | 'STOPPED';

export interface ContractDraft {
  draftId: string;
  content: string;
  authRequestId: string;
}

export interface Contract {
  contractId: string;
  draftId: string;
  content: string;
  effectiveAt: string;
}
