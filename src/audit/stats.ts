import { verdictViolations } from '../policy/lattice.js';
import { isRflReasonCode } from '../policy/reason-codes.js';
import { ArlRowSchema, missingMinKeys, type ArlRow } from './schema.js';

export interface AuditStats {
  totalRows: number;
  runs: number;
  byDecision: Record<string, number>;
  byLayer: Record<string, number>;
  byReasonCode: Record<string, number>;
  byEvent: Record<string, number>;
  sealedRows: number;
  sealEvents: number;
  hitlRequested: number;
  /** HITL requests raised by the relativity filter. */
  rflEscalations: number;
  hitlDecided: number;
  userStops: number;
  /** Share of runs with at least one sealed row. */
  sealRate: number;
}

function bump(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

export function summarizeRows(rows: readonly ArlRow[]): AuditStats {
  const stats: AuditStats = {
    totalRows: rows.length,
    runs: 0,
    byDecision: {},
    byLayer: {},
    byReasonCode: {},
    byEvent: {},
    sealedRows: 0,
    sealEvents: 0,
    hitlRequested: 0,
    rflEscalations: 0,
    hitlDecided: 0,
    userStops: 0,
    sealRate: 0,
  };
  const runs = new Set<string>();
  const sealedRuns = new Set<string>();

  for (const row of rows) {
    runs.add(row.run_id);
    bump(stats.byDecision, row.decision);
    bump(stats.byLayer, row.layer);
    bump(stats.byReasonCode, row.reason_code);
    bump(stats.byEvent, row.event);
    if (row.sealed) {
      stats.sealedRows++;
      sealedRuns.add(row.run_id);
    }
    if (row.event === 'AGENT_SEALED') stats.sealEvents++;
    if (row.event === 'HITL_REQUESTED') {
      stats.hitlRequested++;
      if (isRflReasonCode(row.reason_code)) stats.rflEscalations++;
    }
    if (row.event === 'HITL_DECIDED') {
      stats.hitlDecided++;
      if (row.decision === 'STOPPED' && row.final_decider === 'USER') stats.userStops++;
    }
  }

  stats.runs = runs.size;
  stats.sealRate = runs.size > 0 ? Math.round((sealedRuns.size / runs.size) * 10000) / 10000 : 0;
  return stats;
}

export interface RowIssue {
  index: number;
  problems: string[];
}

/**
 * Check raw parsed rows: minimal keys, schema, decision lattice and the
 * no-`@` rule. Returns one entry per row that has problems.
 */
export function checkRows(values: readonly unknown[]): RowIssue[] {
  const issues: RowIssue[] = [];

  values.forEach((value, index) => {
    const problems: string[] = [];
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      issues.push({ index, problems: ['row is not an object'] });
      return;
    }

    const missing = missingMinKeys({ ...value });
    if (missing.length > 0) problems.push(`missing keys: ${missing.join(', ')}`);

    const parsed = ArlRowSchema.safeParse(value);
    if (parsed.success) {
      const row = parsed.data;
      problems.push(
        ...verdictViolations(row.layer, {
          decision: row.decision,
          sealed: row.sealed,
          overrideable: row.overrideable,
          finalDecider: row.final_decider,
        }),
      );
    } else if (missing.length === 0) {
      for (const issue of parsed.error.issues) {
        problems.push(`${issue.path.join('.')}: ${issue.message}`);
      }
    }

    if (JSON.stringify(value).includes('@')) problems.push("contains '@'");

    if (problems.length > 0) issues.push({ index, problems });
  });

  return issues;
}
