export type { Gate, GateInput, GateOutcome, GateSubject } from './types.js';
export { BaseGate } from './base-gate.js';
export { MeaningGate, KIND_TOKENS, mentionedKinds, mentionsKind } from './meaning.js';
export { ConsistencyGate } from './consistency.js';
export {
  validateContract,
  ExcelDraftSchema,
  WordDraftSchema,
  PptDraftSchema,
  type ContractCheck,
  type ExcelDraft,
  type WordDraft,
  type PptDraft,
} from './contracts.js';
export { RelativityGate } from './relativity.js';
export { EthicsGate } from './ethics.js';
export { AccGate, DEFAULT_ACC_CONFIG } from './acc.js';
export {
  GatePipeline,
  createDefaultGates,
  type EscalationResult,
  type GateSet,
  type GateSetOptions,
} from './pipeline.js';
