import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { DEMO_KEY, loadIntegrityKey, rowTag, signRow, verifyRow, verifyRows } from '../../../src/audit/integrity.js';
import { combineSignatures, semanticSignature, stripVolatile } from '../../../src/audit/signature.js';
import type { ArlRow } from '../../../src/audit/schema.js';
import { IntegrityError } from '../../../src/core/errors.js';
import { sha256 } from '../../../src/utils/crypto.js';

function row(overrides: Partial<ArlRow> = {}): ArlRow {
  return {
    run_id: 'r1',
    layer: 'ethics',
    decision: 'STOPPED',
    sealed: true,
    overrideable: false,
    final_decider: 'SYSTEM',
    reason_code: 'SEALED_BY_ETHICS',
    event: 'GATE_ETHICS',
    ts: '2024-05-01T12:00:00.000Z',
    ...overrides,
  };
}

describe('integrity tags', () => {
  it('signs and verifies a row', () => {
    const signed = signRow('test-secret', row());
    expect(signed.integrity_hmac_sha256).toMatch(/^[0-9a-f]{64}$/);
    expect(verifyRow('test-secret', signed)).toBe(true);
  });

  it('ignores an existing tag when computing a new one', () => {
    const signed = signRow('test-secret', row());
    expect(rowTag('test-secret', signed)).toBe(signed.integrity_hmac_sha256);
    expect(signRow('test-secret', signed)).toEqual(signed);
  });

  it('fails on tampering, a wrong key or a missing tag', () => {
    const signed = signRow('test-secret', row());
    expect(verifyRow('test-secret', { ...signed, reason_code: 'ETHICS_OK' })).toBe(false);
    expect(verifyRow('other-secret', signed)).toBe(false);
    expect(verifyRow('test-secret', row())).toBe(false);
  });

  it('verifyRows lists the bad indexes', () => {
    const good = signRow('test-secret', row());
    const tampered = { ...signRow('test-secret', row({ run_id: 'r2' })), sealed: false };
    expect(verifyRows('test-secret', [good, tampered, row()])).toEqual([1, 2]);
  });
});

describe('loadIntegrityKey', () => {
  let dir: string;
  const saved = process.env.GATEHOUSE_TEST_KEY;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'gatehouse-key-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    if (saved === undefined) delete process.env.GATEHOUSE_TEST_KEY;
    else process.env.GATEHOUSE_TEST_KEY = saved;
  });

  it('returns the demo key', () => {
    expect(loadIntegrityKey({ keyMode: 'demo' }).toString('utf-8')).toBe(DEMO_KEY);
  });

  it('reads a key file', () => {
    const path = join(dir, 'key');
    writeFileSync(path, 'test-secret');
    expect(loadIntegrityKey({ keyMode: 'file', keyFile: path }).toString('utf-8')).toBe('test-secret');
  });

  it('rejects a missing or empty key file', () => {
    expect(() => loadIntegrityKey({ keyMode: 'file' })).toThrow('keyMode "file" requires keyFile');
    expect(() => loadIntegrityKey({ keyMode: 'file', keyFile: join(dir, 'none') })).toThrow(IntegrityError);
    const empty = join(dir, 'empty');
    writeFileSync(empty, '');
    expect(() => loadIntegrityKey({ keyMode: 'file', keyFile: empty })).toThrow('Key file is empty');
  });

  it('reads the key from an environment variable', () => {
    process.env.GATEHOUSE_TEST_KEY = 'test-secret';
    expect(loadIntegrityKey({ keyMode: 'env', keyEnv: 'GATEHOUSE_TEST_KEY' }).toString('utf-8')).toBe('test-secret');
    delete process.env.GATEHOUSE_TEST_KEY;
    expect(() => loadIntegrityKey({ keyMode: 'env', keyEnv: 'GATEHOUSE_TEST_KEY' })).toThrow(
      'Environment variable GATEHOUSE_TEST_KEY is not set',
    );
  });
});

describe('semantic signature', () => {
  it('drops run id, timestamp and tag', () => {
    expect(stripVolatile(signRow('test-secret', row()))).toEqual({
      layer: 'ethics',
      decision: 'STOPPED',
      sealed: true,
      overrideable: false,
      final_decider: 'SYSTEM',
      reason_code: 'SEALED_BY_ETHICS',
      event: 'GATE_ETHICS',
    });
  });

  it('matches for runs that differ only in volatile fields', () => {
    const a = [row(), row({ event: 'RUN_DONE' })];
    const b = [row({ run_id: 'r9', ts: '2030-01-01T00:00:00.000Z' }), row({ run_id: 'r9', event: 'RUN_DONE' })];
    expect(semanticSignature(a)).toBe(semanticSignature(b));
    expect(semanticSignature(a)).not.toBe(semanticSignature([row({ reason_code: 'ETHICS_OK' })]));
  });

  it('combines signatures in order', () => {
    expect(combineSignatures(['a', 'b'])).toBe(sha256('a\nb'));
    expect(combineSignatures(['b', 'a'])).not.toBe(combineSignatures(['a', 'b']));
  });
});
