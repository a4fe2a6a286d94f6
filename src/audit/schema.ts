import { z } from 'zod';
import { DECISIONS, FINAL_DECIDERS } from '../core/types.js';
import type { Layer } from '../core/types.js';
import type { Verdict } from '../policy/lattice.js';

/** Keys every audit row carries, whatever the event. */
export const ARL_MIN_KEYS = [
  'run_id',
  'layer',
  'decision',
  'sealed',
  'overrideable',
  'final_decider',
  'reason_code',
] as const;

const jsonValue: z.ZodType<unknown> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValue), z.record(jsonValue)]),
);

export const ArlRowSchema = z
  .object({
    run_id: z.string().min(1),
    layer: z.string().min(1),
    decision: z.enum(DECISIONS),
    sealed: z.boolean(),
    overrideable: z.boolean(),
    final_decider: z.enum(FINAL_DECIDERS),
    reason_code: z.string().min(1),
    event: z.string().min(1),
    ts: z.string().min(1),
    task_id: z.string().optional(),
    kind: z.string().optional(),
    attempt: z.number().int().nonnegative().optional(),
    gate: z.string().optional(),
    choice: z.enum(['CONTINUE', 'STOP']).optional(),
    preview: z.string().optional(),
    artifact_path: z.string().optional(),
    evidence: z.record(jsonValue).optional(),
    integrity_hmac_sha256: z.string().regex(/^[0-9a-f]{64}$/).optional(),
  });

export type ArlRow = z.infer<typeof ArlRowSchema>;

/** Row as handed to a sink; the sink stamps `ts`. */
export type ArlRowInput = Omit<ArlRow, 'ts'> & { ts?: string };

export interface RowContext {
  runId: string;
  taskId?: string;
  kind?: string;
  attempt?: number;
}

export interface RowFields {
  gate?: string;
  choice?: 'CONTINUE' | 'STOP';
  preview?: string;
  artifact_path?: string;
  evidence?: Record<string, unknown>;
}

/**
 * Build an audit row from a verdict. All rows share the minimal keys plus the
 * compatibility `event` field.
 */
export function buildRow(event: string, layer: Layer, verdict: Verdict, ctx: RowContext, fields: RowFields = {}): ArlRowInput {
  const row: ArlRowInput = {
    event,
    run_id: ctx.runId,
    layer,
    decision: verdict.decision,
    sealed: verdict.sealed,
    overrideable: verdict.overrideable,
    final_decider: verdict.finalDecider,
    reason_code: verdict.reasonCode,
  };
  if (ctx.taskId !== undefined) row.task_id = ctx.taskId;
  if (ctx.kind !== undefined) row.kind = ctx.kind;
  if (ctx.attempt !== undefined) row.attempt = ctx.attempt;
  if (fields.gate !== undefined) row.gate = fields.gate;
  if (fields.choice !== undefined) row.choice = fields.choice;
  if (fields.preview !== undefined) row.preview = fields.preview;
  if (fields.artifact_path !== undefined) row.artifact_path = fields.artifact_path;
  const evidence = fields.evidence ?? verdict.evidence;
  if (evidence !== undefined) row.evidence = evidence;
  return row;
}

export function missingMinKeys(row: Record<string, unknown>): string[] {
  return ARL_MIN_KEYS.filter(key => !(key in row));
}
