export {
  type AuditSink,
  AuditTrail,
  JsonlAuditLog,
  MemoryAuditLog,
  MonotonicClock,
  parseJsonl,
  readJsonl,
  readJsonlValues,
} from './audit-log.js';
export {
  EMAIL_PATTERN,
  REDACTED,
  REDACTED_EMAIL,
  REDACTED_KEY,
  containsEmail,
  deepRedact,
  redactText,
  rowsHaveAtSign,
  safePreview,
  type JsonValue,
} from './redact.js';
export { ARL_MIN_KEYS, ArlRowSchema, buildRow, type ArlRow, type ArlRowInput, type RowContext } from './schema.js';
export { semanticSignature, combineSignatures, stripVolatile } from './signature.js';
export {
  DEMO_KEY,
  loadIntegrityKey,
  rowTag,
  signRow,
  verifyRow,
  verifyRows,
  type KeyMode,
  type KeySource,
} from './integrity.js';
export { summarizeRows, checkRows, type AuditStats, type RowIssue } from './stats.js';
