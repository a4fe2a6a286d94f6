/**
 * HMAC-SHA256 integrity tags for persisted audit rows. The tag covers the
 * canonical JSON of the row without the tag itself.
 */

import { existsSync, readFileSync } from 'fs';
import { IntegrityError } from '../core/errors.js';
import { digestEquals, hmacSha256 } from '../utils/crypto.js';
import { stableStringify } from '../utils/stable-json.js';
import type { ArlRow } from './schema.js';

export type KeyMode = 'demo' | 'file' | 'env';

export interface KeySource {
  keyMode: KeyMode;
  keyFile?: string;
  keyEnv?: string;
}

/** Placeholder key for demos and tests. Not a secret. */
export const DEMO_KEY = 'gatehouse-demo-key';

export function loadIntegrityKey(source: KeySource): Buffer {
  switch (source.keyMode) {
    case 'demo':
      return Buffer.from(DEMO_KEY, 'utf-8');
    case 'file': {
      if (!source.keyFile) throw new IntegrityError('keyMode "file" requires keyFile');
      if (!existsSync(source.keyFile)) throw new IntegrityError(`Key file not found: ${source.keyFile}`);
      const bytes = readFileSync(source.keyFile);
      if (bytes.length === 0) throw new IntegrityError(`Key file is empty: ${source.keyFile}`);
      return bytes;
    }
    case 'env': {
      const name = source.keyEnv ?? 'GATEHOUSE_HMAC_KEY';
      const value = process.env[name];
      if (!value) throw new IntegrityError(`Environment variable ${name} is not set`);
      return Buffer.from(value, 'utf-8');
    }
  }
}

function unsigned(row: ArlRow): Omit<ArlRow, 'integrity_hmac_sha256'> {
  const { integrity_hmac_sha256: _tag, ...rest } = row;
  return rest;
}

export function rowTag(key: Buffer | string, row: ArlRow): string {
  return hmacSha256(key, stableStringify(unsigned(row)));
}

export function signRow(key: Buffer | string, row: ArlRow): ArlRow {
  return { ...unsigned(row), integrity_hmac_sha256: rowTag(key, row) };
}

export function verifyRow(key: Buffer | string, row: ArlRow): boolean {
  const tag = row.integrity_hmac_sha256;
  if (!tag) return false;
  return digestEquals(tag, rowTag(key, row));
}

/** Indexes of rows whose tag is missing or wrong. */
export function verifyRows(key: Buffer | string, rows: readonly ArlRow[]): number[] {
  const bad: number[] = [];
  rows.forEach((row, index) => {
    if (!verifyRow(key, row)) bad.push(index);
  });
  return bad;
}
