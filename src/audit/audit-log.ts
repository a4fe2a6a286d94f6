import { appendFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { AuditError, SealViolationError, errorMessage } from '../core/errors.js';
import type { EventBus } from '../core/events.js';
import { verdictViolations } from '../policy/lattice.js';
import { deepRedact } from './redact.js';
import { ArlRowSchema, type ArlRow, type ArlRowInput } from './schema.js';

/**
 * Append-only destination for audit rows. There is no update or delete.
 */
export interface AuditSink {
  /** Stamp, redact and persist one row. Returns the row as persisted. */
  append(row: ArlRowInput): ArlRow;
  /** Begin a run. `truncate` clears what a previous run left behind. */
  startRun(options?: { truncate?: boolean }): void;
}

/**
 * Strictly increasing ISO timestamps, even when two rows land in the same
 * millisecond.
 */
export class MonotonicClock {
  private last = 0;

  constructor(private readonly now: () => number = Date.now) {}

  next(): string {
    let ms = this.now();
    if (ms <= this.last) ms = this.last + 1;
    this.last = ms;
    return new Date(ms).toISOString();
  }

  reset(): void {
    this.last = 0;
  }
}

function persistable(row: ArlRowInput, clock: MonotonicClock): ArlRow {
  const stamped = { ...row, ts: row.ts ?? clock.next() };
  const parsed = ArlRowSchema.safeParse(deepRedact(stamped));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new AuditError(`Rejected audit row ${row.event}: ${issue?.path.join('.')} ${issue?.message}`, parsed.error);
  }
  return parsed.data;
}

export class MemoryAuditLog implements AuditSink {
  private rows: ArlRow[] = [];
  private clock: MonotonicClock;

  constructor(now?: () => number) {
    this.clock = new MonotonicClock(now);
  }

  startRun(options: { truncate?: boolean } = {}): void {
    if (options.truncate) {
      this.rows = [];
      this.clock.reset();
    }
  }

  append(row: ArlRowInput): ArlRow {
    const persisted = persistable(row, this.clock);
    this.rows.push(persisted);
    return persisted;
  }

  readAll(): ArlRow[] {
    return [...this.rows];
  }
}

export class JsonlAuditLog implements AuditSink {
  private clock: MonotonicClock;

  constructor(
    public readonly path: string,
    now?: () => number,
  ) {
    this.clock = new MonotonicClock(now);
  }

  startRun(options: { truncate?: boolean } = {}): void {
    mkdirSync(dirname(this.path), { recursive: true });
    if (options.truncate) {
      writeFileSync(this.path, '', 'utf-8');
      this.clock.reset();
    }
  }

  append(row: ArlRowInput): ArlRow {
    const persisted = persistable(row, this.clock);
    try {
      appendFileSync(this.path, JSON.stringify(persisted) + '\n', 'utf-8');
    } catch (err) {
      throw new AuditError(`Failed to append to ${this.path}: ${errorMessage(err)}`, err);
    }
    return persisted;
  }

  readAll(): ArlRow[] {
    return readJsonl(this.path);
  }
}

/**
 * Parse a JSONL audit file. Blank lines are skipped; anything else that is not
 * a valid row raises with its line number.
 */
export function readJsonl(path: string): ArlRow[] {
  if (!existsSync(path)) {
    throw new AuditError(`Audit log not found: ${path}`);
  }
  return parseJsonl(readFileSync(path, 'utf-8'), path);
}

export function parseJsonl(content: string, source: string = '<memory>'): ArlRow[] {
  const rows: ArlRow[] = [];
  const lines = content.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i]?.trim();
    if (!line) continue;
    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch (err) {
      throw new AuditError(`${source}:${i + 1}: invalid JSON`, err);
    }
    const parsed = ArlRowSchema.safeParse(value);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new AuditError(`${source}:${i + 1}: ${issue?.path.join('.')} ${issue?.message}`, parsed.error);
    }
    rows.push(parsed.data);
  }
  return rows;
}

/** Parse each non-blank line as JSON without checking it against the row schema. */
export function readJsonlValues(path: string): unknown[] {
  if (!existsSync(path)) {
    throw new AuditError(`Audit log not found: ${path}`);
  }
  const values: unknown[] = [];
  const lines = readFileSync(path, 'utf-8').split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i]?.trim();
    if (!line) continue;
    try {
      values.push(JSON.parse(line));
    } catch (err) {
      throw new AuditError(`${path}:${i + 1}: invalid JSON`, err);
    }
  }
  return values;
}

/**
 * In-run view of the audit log: checks each row against the decision lattice,
 * forwards it to the sink, keeps the persisted copy and announces it.
 */
export class AuditTrail {
  private readonly rows: ArlRow[] = [];

  constructor(
    private readonly sink: AuditSink,
    private readonly events?: EventBus,
  ) {}

  record(row: ArlRowInput): ArlRow {
    const problems = verdictViolations(row.layer, {
      decision: row.decision,
      sealed: row.sealed,
      overrideable: row.overrideable,
      finalDecider: row.final_decider,
    });
    if (problems.length > 0) {
      throw new SealViolationError(
        `Refusing to log ${row.event} at ${row.layer} (${row.reason_code}): ${problems[0]}`,
        row.layer,
      );
    }
    const persisted = this.sink.append(row);
    this.rows.push(persisted);
    this.events?.emit('audit:row', persisted);
    return persisted;
  }

  snapshot(): ArlRow[] {
    return [...this.rows];
  }

  get length(): number {
    return this.rows.length;
  }
}
