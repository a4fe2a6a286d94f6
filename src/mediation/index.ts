export {
  EvidenceItemSchema,
  EvidenceBundleSchema,
  AuthRequestSchema,
  EVIDENCE_SCHEMA_VERSION,
  DEFAULT_TRUST_POLICY,
  type EvidenceItem,
  type EvidenceBundle,
  type AuthRequest,
  type TrustState,
  type Grant,
  type TrustPolicy,
  type MediationState,
  type ContractDraft,
  type Contract,
} from './types.js';
export { EvidenceGate, type EvidenceInput } from './evidence-gate.js';
export { DraftLintGate, REQUIRED_DRAFT_PHRASES, isNegated, type DraftLintInput } from './draft-lint.js';
export {
  TrustGate,
  MemoryTrustStore,
  applyTrustChange,
  findValidGrant,
  isCooldownActive,
  type TrustChange,
  type TrustInput,
  type TrustStore,
  type TrustUpdate,
} from './trust.js';
export {
  DefinitionGate,
  DEFAULT_DEFINITION_PACK,
  assessDefinition,
  resolveDefinition,
  type DefinitionAssessment,
  type DefinitionClass,
  type DefinitionInput,
  type DefinitionPack,
} from './definition-gate.js';
export {
  DEFAULT_LOCATION,
  DEFAULT_SCENARIO,
  PRIORITY_POLICY,
  buildAuthRequest,
  buildEvidenceBundle,
  finalizeContract,
  generateContractDraft,
  isAuthRequestExpired,
  type AuthRequestOptions,
  type EvidenceBundleOptions,
} from './contract.js';
export {
  ContractMediator,
  type MediationResult,
  type MediationRunOptions,
  type MediatorOptions,
} from './mediator.js';
