/**
 * Gatehouse — fail-closed gates, HITL escalation and audit logs for
 * document-generation tasks.
 * Public SDK exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { Orchestrator, ConfigManager, createSeededResolver } from 'gatehouse';
 *
 * const config = new ConfigManager().load();
 * const orchestrator = new Orchestrator({ config });
 * const result = await orchestrator.runInMemory('Excelで進捗表を作成してください。', {
 *   resolver: createSeededResolver({ seed: 7, pContinue: 1 }),
 * });
 * ```
 */

// Core
export { EventBus } from './core/events.js';
export { ConfigManager } from './core/config.js';
export { configureLogger, createLogger, getLogger, setLogger, type LoggerOptions } from './core/logger.js';
export {
  GatehouseError,
  ConfigError,
  SealViolationError,
  GateOrderError,
  AuditError,
  IntegrityError,
  InvariantError,
  errorMessage,
} from './core/errors.js';
export {
  DECISIONS,
  FINAL_DECIDERS,
  TASK_KINDS,
  GATE_ORDER,
  LAYERS,
  HITL_MODES,
  DEFAULT_RFL_TRIGGERS,
  DEFAULT_REFERENCE_TOKENS,
  DEFAULT_STEERING_TOKENS,
  GatehouseConfigSchema,
  type Decision,
  type FinalDecider,
  type HitlChoice,
  type TaskKind,
  type GateName,
  type Layer,
  type OverallPolicy,
  type OverallDecision,
  type HitlMode,
  type GatehouseConfig,
  type GatehouseConfigInput,
  type AccConfig,
  type RelativityConfig,
  type GatehouseEvents,
} from './core/types.js';

// Policy
export {
  SEALING_LAYERS,
  canSeal,
  runVerdict,
  pauseVerdict,
  stopVerdict,
  sealVerdict,
  userVerdict,
  verdictViolations,
  assertLegalVerdict,
  decisionRank,
  type Verdict,
} from './policy/lattice.js';
export { ReasonCode, RFL_REASON_CODES, isRflReasonCode } from './policy/reason-codes.js';

// Gates, audit, HITL, orchestration
export * from './gates/index.js';
export * from './audit/index.js';
export * from './hitl/index.js';
export * from './orchestrator/index.js';

// Contract mediation
export * from './mediation/index.js';

// Loop policy
export {
  LoopController,
  LoopKind,
  LoopReason,
  LoopPolicySpecSchema,
  HitlCounter,
  SessionState,
  RESET_REASONS,
  createLoopPolicySpec,
  conflictKey,
  failClosedEvent,
  hasMinKeys,
  isValidPairing,
  enforceTerminalGuard,
  dispatchPlanRequest,
  proposePlan,
  ackPlanReceived,
  maybeStop,
  type LoopDecision,
  type LoopEvent,
  type LoopPolicySpec,
  type ResetReason,
  type CounterResult,
} from './loop/loop-policy.js';

// Benchmark
export * from './benchmark/index.js';

// Utilities
export { mulberry32, chance, type Rng } from './utils/random.js';
export { stableStringify } from './utils/stable-json.js';
export { CircularBuffer } from './utils/circular-buffer.js';
export { Timer, formatDuration } from './utils/timer.js';

// Version
export { VERSION, NAME } from './version.js';
