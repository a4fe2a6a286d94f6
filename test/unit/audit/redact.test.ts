import { describe, it, expect } from 'vitest';
import {
  REDACTED,
  REDACTED_EMAIL,
  REDACTED_KEY,
  containsEmail,
  deepRedact,
  redactText,
  rowsHaveAtSign,
  safePreview,
} from '../../../src/audit/redact.js';

describe('redaction', () => {
  it('detects emails without consuming the global pattern state', () => {
    expect(containsEmail('mail test.user@example.com now')).toBe(true);
    expect(containsEmail('mail test.user@example.com now')).toBe(true);
    expect(containsEmail('no address here')).toBe(false);
  });

  it('masks each email in place', () => {
    expect(redactText('a@example.com and b@example.org')).toBe(`${REDACTED_EMAIL} and ${REDACTED_EMAIL}`);
  });

  it('replaces the whole string when a stray @ survives', () => {
    expect(redactText('ping @channel')).toBe(REDACTED);
    expect(redactText('user@localhost')).toBe(REDACTED);
  });

  it('leaves clean text unchanged', () => {
    expect(redactText('Excel Table')).toBe('Excel Table');
  });

  it('deepRedact scrubs values and keys at every depth', () => {
    const out = deepRedact({
      note: 'contact x@example.com',
      nested: { list: ['ok', 'y@example.com'], 'who@example.com': 1 },
      skip: undefined,
      when: new Date(Date.UTC(2024, 0, 2, 3, 4, 5)),
      bad: Number.POSITIVE_INFINITY,
    });
    expect(out).toEqual({
      note: `contact ${REDACTED_EMAIL}`,
      nested: { list: ['ok', REDACTED_EMAIL], [REDACTED_KEY]: 1 },
      when: '2024-01-02T03:04:05.000Z',
      bad: null,
    });
    expect(rowsHaveAtSign([out])).toBe(false);
  });

  it('rowsHaveAtSign finds @ anywhere in the rows', () => {
    expect(rowsHaveAtSign([{ a: 'x' }, { b: ['y@'] }])).toBe(true);
    expect(rowsHaveAtSign([{ a: 'x' }])).toBe(false);
  });

  it('safePreview redacts, flattens whitespace and truncates', () => {
    expect(safePreview('line one\n  line two\tx@example.com\n')).toBe(`line one line two ${REDACTED_EMAIL}`);
    expect(safePreview('abcdefghij', 4)).toBe('abcd');
  });
});
