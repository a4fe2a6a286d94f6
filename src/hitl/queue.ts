import { CircularBuffer } from '../utils/circular-buffer.js';
import type { Decision } from '../core/types.js';

export interface HitlIncident {
  incidentId: string;
  runId: string;
  ts: string;
  reasonCode: string;
  decision: Decision;
  sealed: boolean;
  /** Saved audit file for this incident, when one was written. */
  arlPath?: string;
}

export const QUEUE_CSV_HEADER = ['incident_id', 'run_id', 'ts', 'reason_code', 'decision', 'sealed', 'arl_path'] as const;

function csvField(value: string): string {
  return /[",\n\r]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Bounded FIFO of incidents awaiting human review. When full the oldest
 * incident is dropped.
 */
export class HitlQueue {
  private readonly buffer: CircularBuffer<HitlIncident>;

  constructor(public readonly maxItems: number) {
    this.buffer = new CircularBuffer<HitlIncident>(maxItems);
  }

  push(incident: HitlIncident): void {
    this.buffer.push(incident);
  }

  get size(): number {
    return this.buffer.length;
  }

  get dropped(): number {
    return this.buffer.droppedCount;
  }

  items(): HitlIncident[] {
    return this.buffer.toArray();
  }

  toJSON(): HitlIncident[] {
    return this.items();
  }

  toCsv(): string {
    const lines: string[] = [QUEUE_CSV_HEADER.join(',')];
    for (const item of this.items()) {
      lines.push(
        [
          item.incidentId,
          item.runId,
          item.ts,
          item.reasonCode,
          item.decision,
          String(item.sealed),
          item.arlPath ?? '',
        ].map(csvField).join(','),
      );
    }
    return lines.join('\n') + '\n';
  }
}
