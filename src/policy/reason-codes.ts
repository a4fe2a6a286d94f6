/**
 * Reason codes written to the audit log. Grouped by the layer that emits them.
 */
export const ReasonCode = {
  PASS: 'PASS',
  OK: 'OK',

  MEANING_GENERIC_ALLOW_ALL: 'MEANING_GENERIC_ALLOW_ALL',
  MEANING_KIND_MATCH: 'MEANING_KIND_MATCH',
  MEANING_KIND_MISSING: 'MEANING_KIND_MISSING',
  MEANING_EMPTY_PROMPT: 'MEANING_EMPTY_PROMPT',

  CONTRACT_OK: 'CONTRACT_OK',
  CONTRACT_EXCEL_COLUMNS_INVALID: 'CONTRACT_EXCEL_COLUMNS_INVALID',
  CONTRACT_EXCEL_ROWS_INVALID: 'CONTRACT_EXCEL_ROWS_INVALID',
  CONTRACT_WORD_HEADINGS_INVALID: 'CONTRACT_WORD_HEADINGS_INVALID',
  CONTRACT_PPT_SLIDES_INVALID: 'CONTRACT_PPT_SLIDES_INVALID',

  REL_OK: 'REL_OK',
  REL_BOUNDARY_UNSTABLE: 'REL_BOUNDARY_UNSTABLE',
  REL_REF_MISSING: 'REL_REF_MISSING',
  REL_SYMMETRY_BREAK: 'REL_SYMMETRY_BREAK',

  ETHICS_OK: 'ETHICS_OK',
  SEALED_BY_ETHICS: 'SEALED_BY_ETHICS',

  ACC_OK: 'ACC_OK',
  SEALED_BY_ACC: 'SEALED_BY_ACC',
  ACC_LOOP_BUDGET_EXCEEDED: 'ACC_LOOP_BUDGET_EXCEEDED',

  HITL_PENDING: 'HITL_PENDING',
  HITL_CONTINUE: 'HITL_CONTINUE',
  HITL_STOP: 'HITL_STOP',

  EVIDENCE_OK: 'EVIDENCE_OK',
  EVIDENCE_MISSING: 'EVIDENCE_MISSING',
  EVIDENCE_SCHEMA_INVALID: 'EVIDENCE_SCHEMA_INVALID',
  EVIDENCE_FABRICATION: 'EVIDENCE_FABRICATION',

  AUTH_REQUIRED: 'AUTH_REQUIRED',
  AUTH_SKIPPED: 'AUTH_SKIPPED',
  AUTH_APPROVE: 'AUTH_APPROVE',
  AUTH_REJECT: 'AUTH_REJECT',
  AUTH_EXPIRED: 'AUTH_EXPIRED',

  TRUST_SCORE_LOW: 'TRUST_SCORE_LOW',
  TRUST_COOLDOWN_ACTIVE: 'TRUST_COOLDOWN_ACTIVE',
  TRUST_NO_GRANT: 'NO_VALID_GRANT',
  TRUST_AUTO_AUTH: 'AUTO_AUTH_BY_TRUST_AND_GRANT',
  TRUST_UPDATE: 'TRUST_UPDATE',

  DRAFT_GENERATED: 'DRAFT_GENERATED',
  DRAFT_LINT_OK: 'DRAFT_LINT_OK',
  DRAFT_ILLEGAL_BINDING: 'DRAFT_ILLEGAL_BINDING',
  DRAFT_DISCRIMINATION_TERM: 'SAFETY_DISCRIMINATION_TERM',
  DRAFT_OUT_OF_SCOPE: 'DRAFT_OUT_OF_SCOPE',

  FINALIZE_REQUIRED: 'ADMIN_FINALIZE_REQUIRED',
  FINALIZE_APPROVE: 'FINALIZE_APPROVE',
  FINALIZE_STOP: 'FINALIZE_STOP',
  CONTRACT_EFFECTIVE: 'CONTRACT_EFFECTIVE',

  DEF_IN: 'DEF_IN',
  DEF_OUT: 'DEF_OUT',
  DEFINITION_AMBIGUOUS: 'DEFINITION_AMBIGUOUS',
  SAFETY_RED_FLAG: 'SAFETY_RED_FLAG',
  NON_OVERRIDABLE_SAFETY: 'NON_OVERRIDABLE_SAFETY',
  DEF_APPROVED: 'HITL_APPROVED',
  DEF_REJECTED: 'HITL_REJECTED',

  RETRY_EXHAUSTED: 'RETRY_EXHAUSTED',
  REGEN_FOR_CONSISTENCY: 'REGEN_FOR_CONSISTENCY',
  GATE_ERROR: 'GATE_ERROR',
  SKIPPED_AFTER_SEAL: 'SKIPPED_AFTER_SEAL',
  ARTIFACT_WRITTEN: 'ARTIFACT_WRITTEN',
} as const;

export type ReasonCode = (typeof ReasonCode)[keyof typeof ReasonCode];

export const RFL_REASON_CODES: ReadonlySet<string> = new Set([
  ReasonCode.REL_BOUNDARY_UNSTABLE,
  ReasonCode.REL_REF_MISSING,
  ReasonCode.REL_SYMMETRY_BREAK,
]);

export function isRflReasonCode(code: string): boolean {
  return RFL_REASON_CODES.has(code);
}
