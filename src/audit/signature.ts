import { sha256 } from '../utils/crypto.js';
import { stableStringify } from '../utils/stable-json.js';

/** Fields that differ between two runs taking the same path. */
export const VOLATILE_FIELDS: readonly string[] = ['run_id', 'ts', 'tz', 'integrity_hmac_sha256'];

export function stripVolatile(row: object): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(row)) {
    if (!VOLATILE_FIELDS.includes(key)) out[key] = value;
  }
  return out;
}

/**
 * Digest of the decision path a run took: identical for two runs whose rows
 * differ only in run id and timestamps.
 */
export function semanticSignature(rows: readonly object[]): string {
  return sha256(stableStringify(rows.map(stripVolatile)));
}

/** Digest over a list of per-run signatures, in order. */
export function combineSignatures(signatures: readonly string[]): string {
  return sha256(signatures.join('\n'));
}
