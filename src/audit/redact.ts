/**
 * Redaction applied to everything that leaves memory (audit rows, artifacts,
 * previews). After redaction no string contains `@`.
 */

export const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g;

export const REDACTED_EMAIL = '<REDACTED_EMAIL>';
export const REDACTED = '[REDACTED]';
export const REDACTED_KEY = '[REDACTED_KEY]';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export function containsEmail(text: string): boolean {
  return new RegExp(EMAIL_PATTERN.source).test(text);
}

export function redactText(text: string): string {
  const masked = text.replace(EMAIL_PATTERN, REDACTED_EMAIL);
  return masked.includes('@') ? REDACTED : masked;
}

function redactKey(key: string): string {
  return key.includes('@') ? REDACTED_KEY : key;
}

/**
 * Recursively redact a value into plain JSON. Keys are scrubbed too,
 * `undefined` fields are dropped and non-JSON values are stringified first.
 */
export function deepRedact(value: unknown): JsonValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return redactText(value);
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'boolean') return value;
  if (Array.isArray(value)) return value.map(item => deepRedact(item));
  if (value instanceof Date) return redactText(value.toISOString());
  if (typeof value === 'object') {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      if (item === undefined) continue;
      out[redactKey(key)] = deepRedact(item);
    }
    return out;
  }
  return redactText(String(value));
}

/** True when any `@` survives in the serialized rows. */
export function rowsHaveAtSign(rows: readonly unknown[]): boolean {
  return JSON.stringify(rows).includes('@');
}

/** Redacted one-line preview, at most `max` characters. */
export function safePreview(text: string, max: number = 200): string {
  const flat = redactText(text).replace(/\s+/g, ' ').trim();
  return flat.length <= max ? flat : flat.slice(0, max);
}
