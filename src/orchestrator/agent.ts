import type { TaskKind } from '../core/types.js';
import { redactText } from '../audit/redact.js';
import type { TaskFaults } from './types.js';

export interface AgentOutput {
  /** Structured draft, checked by the consistency gate. */
  draft: unknown;
  /** What the agent actually said. Never persisted. */
  rawText: string;
  /** Redacted text: the only form that reaches artifacts and logs. */
  safeText: string;
}

export const LEAKED_CONTACT = '\nContact: test.user+demo@example.com\n';

function cleanDraft(kind: TaskKind): { draft: unknown; rawText: string } {
  switch (kind) {
    case 'excel':
      return {
        draft: {
          columns: ['Item', 'Owner', 'Status'],
          rows: [
            { Item: 'Task A', Owner: 'Team', Status: 'In Progress' },
            { Item: 'Task B', Owner: 'Team', Status: 'Planned' },
          ],
        },
        rawText: 'Excel Table:\n- Columns: Item | Owner | Status\n- Rows: 2\n',
      };
    case 'word':
      return {
        draft: { headings: ['Title', 'Purpose', 'Summary', 'Next Steps'] },
        rawText: 'Word Outline:\n1) Title\n2) Purpose\n3) Summary\n4) Next Steps\n',
      };
    case 'ppt':
      return {
        draft: { slides: ['Purpose', 'Key Points', 'Next Steps'] },
        rawText: 'PPT Slides:\n- Slide 1: Purpose\n- Slide 2: Key Points\n- Slide 3: Next Steps\n',
      };
  }
}

function brokenDraft(kind: TaskKind): unknown {
  switch (kind) {
    case 'excel':
      return { cols: 'Item,Owner,Status' };
    case 'word':
      return { heading: 'Title' };
    case 'ppt':
      return { slides: 'Purpose,Key Points' };
  }
}

export function shouldBreak(faults: TaskFaults, attempt: number): boolean {
  if (faults.breakContractAttempts !== undefined) {
    return attempt <= faults.breakContractAttempts;
  }
  return faults.breakContract === true;
}

/**
 * Stand-in for a document-drafting agent: returns a fixed draft per kind,
 * bent by the injected faults.
 */
export interface DraftAgent {
  generate(prompt: string, kind: TaskKind, attempt: number, faults?: TaskFaults): AgentOutput;
}

export class TemplateDraftAgent implements DraftAgent {
  generate(_prompt: string, kind: TaskKind, attempt: number, faults: TaskFaults = {}): AgentOutput {
    const clean = cleanDraft(kind);
    const draft = shouldBreak(faults, attempt) ? brokenDraft(kind) : clean.draft;
    const rawText = faults.leakEmail ? clean.rawText + LEAKED_CONTACT : clean.rawText;
    return { draft, rawText, safeText: redactText(rawText) };
  }
}
