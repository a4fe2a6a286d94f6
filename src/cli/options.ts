/**
 * Argument parsers shared by the commands.
 */

import { InvalidArgumentError } from 'commander';
import { HITL_MODES, TASK_KINDS, type HitlMode, type OverallPolicy, type TaskKind } from '../core/types.js';

export function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError(`Not an integer: ${value}`);
  return n;
}

export function parseProbability(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0 || n > 1) throw new InvalidArgumentError(`Expected a number in [0, 1]: ${value}`);
  return n;
}

export function parseHitlMode(value: string): HitlMode {
  const mode = HITL_MODES.find(m => m === value);
  if (!mode) throw new InvalidArgumentError(`Unknown HITL mode "${value}" (expected ${HITL_MODES.join(', ')})`);
  return mode;
}

export function parsePolicy(value: string): OverallPolicy {
  if (value === 'iep' || value === 'legacy') return value;
  throw new InvalidArgumentError(`Unknown policy "${value}" (expected iep, legacy)`);
}

/** Comma-separated task kinds, e.g. `excel,ppt`. */
export function parseTaskKinds(value: string): TaskKind[] {
  return value.split(',').map(part => {
    const kind = TASK_KINDS.find(k => k === part.trim());
    if (!kind) throw new InvalidArgumentError(`Unknown task kind "${part}" (expected ${TASK_KINDS.join(', ')})`);
    return kind;
  });
}
