import { z } from 'zod';
import type { Verdict } from '../policy/lattice.js';
import type { ArlRow } from '../audit/schema.js';
import type { HitlRequest } from '../hitl/types.js';
import type { TaskResult } from '../orchestrator/types.js';

// ===== Vocabulary =====

export const DECISIONS = ['RUN', 'PAUSE_FOR_HITL', 'STOPPED'] as const;
export type Decision = (typeof DECISIONS)[number];

export const FINAL_DECIDERS = ['SYSTEM', 'USER'] as const;
export type FinalDecider = (typeof FINAL_DECIDERS)[number];

export type HitlChoice = 'CONTINUE' | 'STOP';

export const TASK_KINDS = ['excel', 'word', 'ppt'] as const;
export type TaskKind = (typeof TASK_KINDS)[number];

/** Fixed evaluation order. Dispatch follows the last gate. */
export const GATE_ORDER = ['meaning', 'consistency', 'rfl', 'ethics', 'acc'] as const;
export type GateName = (typeof GATE_ORDER)[number];

export const LAYERS = [
  ...GATE_ORDER,
  'orchestrator',
  'agent',
  'hitl_request',
  'hitl_finalize',
  'dispatch',
  // contract mediation
  'evidence',
  'trust',
  'trust_update',
  'hitl_auth',
  'draft_lint',
  'contract_effect',
  'definition',
] as const;
export type Layer = (typeof LAYERS)[number];

export type OverallPolicy = 'iep' | 'legacy';
/** `HITL` only appears under the legacy policy. */
export type OverallDecision = Decision | 'HITL';

export const HITL_MODES = ['seeded', 'interactive', 'continue', 'stop', 'none'] as const;
export type HitlMode = (typeof HITL_MODES)[number];

// ===== Configuration =====

export const DEFAULT_RFL_TRIGGERS = [
  'どっち', 'どちら', 'どれが', '良いか', 'いいか', 'おすすめ',
  '最適', '評価', '比較', 'どれがいい', 'best', 'recommend',
];

export const DEFAULT_REFERENCE_TOKENS = ['前回', '添付', '例の', 'as before', 'attached', 'previous'];

export const DEFAULT_STEERING_TOKENS = ['一択', '必ず', 'only option', 'must choose'];

export const GatehouseConfigSchema = z.object({
  orchestrator: z.object({
    tasks: z.array(z.enum(TASK_KINDS)).min(1).default(['excel', 'word', 'ppt']),
    maxAttemptsPerTask: z.number().int().min(1).max(20).default(3),
    overallPolicy: z.enum(['iep', 'legacy']).default('iep'),
    auditPath: z.string().default('out/audit.jsonl'),
    artifactDir: z.string().default('out/artifacts'),
    truncateAuditOnStart: z.boolean().default(true),
  }).default({}),
  gates: z.object({
    relativity: z.object({
      triggers: z.array(z.string().min(1)).default(DEFAULT_RFL_TRIGGERS),
      referenceTokens: z.array(z.string().min(1)).default(DEFAULT_REFERENCE_TOKENS),
      steeringTokens: z.array(z.string().min(1)).default(DEFAULT_STEERING_TOKENS),
    }).default({}),
    acc: z.object({
      enableRunawaySeal: z.boolean().default(true),
      runawayThreshold: z.number().int().min(1).default(5),
      /** Unset means HITL rounds are not budgeted. */
      maxHitlRounds: z.number().int().min(1).optional(),
    }).default({}),
  }).default({}),
  hitl: z.object({
    mode: z.enum(HITL_MODES).default('seeded'),
    seed: z.number().int().default(7),
    pContinue: z.number().min(0).max(1).default(1),
  }).default({}),
  integrity: z.object({
    keyMode: z.enum(['demo', 'file', 'env']).default('demo'),
    keyFile: z.string().optional(),
    keyEnv: z.string().default('GATEHOUSE_HMAC_KEY'),
  }).default({}),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    pretty: z.boolean().default(false),
  }).default({}),
});

export type GatehouseConfig = z.infer<typeof GatehouseConfigSchema>;
export type GatehouseConfigInput = z.input<typeof GatehouseConfigSchema>;
export type AccConfig = GatehouseConfig['gates']['acc'];
export type RelativityConfig = GatehouseConfig['gates']['relativity'];

// ===== Events =====

export interface GatehouseEvents {
  'run:start': { runId: string; prompt: string; tasks: TaskKind[] };
  'gate:verdict': {
    runId: string;
    taskId: string;
    gate: GateName;
    attempt: number;
    verdict: Verdict;
    durationMs: number;
  };
  'hitl:requested': HitlRequest;
  'hitl:decided': { request: HitlRequest; choice: HitlChoice };
  'task:complete': { runId: string; result: TaskResult };
  'run:complete': { runId: string; decision: OverallDecision; durationMs: number };
  'audit:row': ArlRow;
}
