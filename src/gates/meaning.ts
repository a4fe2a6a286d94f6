import { BaseGate } from './base-gate.js';
import type { GateInput } from './types.js';
import { TASK_KINDS, type TaskKind } from '../core/types.js';
import { pauseVerdict, runVerdict, type Verdict } from '../policy/lattice.js';
import { ReasonCode } from '../policy/reason-codes.js';

/** Words that tie a prompt to a task kind. Matched case-insensitively as substrings. */
export const KIND_TOKENS: Readonly<Record<TaskKind, readonly string[]>> = {
  excel: ['excel', 'xlsx', '表', '列', 'columns', 'table'],
  word: ['word', 'docx', '見出し', '章', 'アウトライン', 'outline', 'document'],
  ppt: ['ppt', 'pptx', 'powerpoint', 'スライド', 'slides', 'slide'],
};

export function mentionsKind(prompt: string, kind: TaskKind): boolean {
  const lower = prompt.toLowerCase();
  return KIND_TOKENS[kind].some(token => lower.includes(token.toLowerCase()));
}

export function mentionedKinds(prompt: string): TaskKind[] {
  return TASK_KINDS.filter(kind => mentionsKind(prompt, kind));
}

/**
 * Does the prompt ask for this kind of document? A prompt that names no kind
 * at all allows every task.
 */
export class MeaningGate extends BaseGate {
  readonly name = 'meaning' as const;
  readonly description = 'Checks that the prompt asks for this task kind';

  protected evaluate(input: GateInput): Verdict {
    if (input.prompt.trim() === '') {
      return pauseVerdict(ReasonCode.MEANING_EMPTY_PROMPT);
    }

    const kinds = mentionedKinds(input.prompt);
    if (kinds.length === 0) {
      return runVerdict(ReasonCode.MEANING_GENERIC_ALLOW_ALL);
    }
    if (kinds.includes(input.kind)) {
      return runVerdict(ReasonCode.MEANING_KIND_MATCH);
    }
    return pauseVerdict(ReasonCode.MEANING_KIND_MISSING, { mentioned: kinds });
  }
}
