import { BaseGate } from '../gates/base-gate.js';
import { pauseVerdict, runVerdict, type Verdict } from '../policy/lattice.js';
import { ReasonCode } from '../policy/reason-codes.js';

export interface DraftLintInput {
  runId: string;
  draftId: string;
  content: string;
}

const NEGATIONS = ['not', 'no', 'cannot', "can't", 'without', 'lacks', 'lack', 'never'];
const NEGATION_WINDOW = 40;

const BINDING_PATTERNS = [
  /\blegally binding\b/gi,
  /\bthis contract is binding\b/gi,
  /\bwe guarantee\b/gi,
  /\bhas legal authority\b/gi,
  /\bgrants? legal authority\b/gi,
  /\bis a legal authority\b/gi,
];

const DISCRIMINATION_PATTERNS = [/\b(?:discriminat(?:e|ion)|racist|racial slur)\b/gi];

/** Phrases every draft must state, compared without markdown emphasis. */
export const REQUIRED_DRAFT_PHRASES = [
  'draft',
  'no operational effect',
  'AI is used for drafting only',
  'ADMIN approval',
];

/** True when a negation word appears among the words just before `index`. */
export function isNegated(text: string, index: number): boolean {
  const window = text.slice(Math.max(0, index - NEGATION_WINDOW), index).toLowerCase();
  const words = window.split(/[^a-z']+/).filter(Boolean);
  return words.some(word => NEGATIONS.includes(word));
}

/** First occurrence of any pattern that is not negated. */
function firstAssertion(text: string, patterns: readonly RegExp[]): string | undefined {
  for (const pattern of patterns) {
    for (const match of text.matchAll(pattern)) {
      if (!isNegated(text, match.index ?? 0)) return match[0];
    }
  }
  return undefined;
}

/**
 * Lints a generated agreement draft. Binding or authority claims and
 * discriminatory terms pause unless negated ("is not legally binding"), and
 * so does a draft missing a required disclaimer. The mediator decides which
 * of these seal.
 */
export class DraftLintGate extends BaseGate<DraftLintInput, 'draft_lint'> {
  readonly name = 'draft_lint' as const;
  readonly description = 'Pauses drafts that claim authority or leave out required disclaimers';

  protected evaluate(input: DraftLintInput): Verdict {
    const text = input.content;

    const claim = firstAssertion(text, BINDING_PATTERNS);
    if (claim !== undefined) {
      return pauseVerdict(ReasonCode.DRAFT_ILLEGAL_BINDING, { draft_id: input.draftId, phrase: claim });
    }

    const term = firstAssertion(text, DISCRIMINATION_PATTERNS);
    if (term !== undefined) {
      return pauseVerdict(ReasonCode.DRAFT_DISCRIMINATION_TERM, { draft_id: input.draftId, phrase: term });
    }

    const plain = text.replace(/[`*_]/g, '').toLowerCase();
    const missing = REQUIRED_DRAFT_PHRASES.filter(phrase => !plain.includes(phrase.toLowerCase()));
    if (missing.length > 0) {
      return pauseVerdict(ReasonCode.DRAFT_OUT_OF_SCOPE, { draft_id: input.draftId, missing });
    }

    return runVerdict(ReasonCode.DRAFT_LINT_OK, { draft_id: input.draftId });
  }
}
