import { z } from 'zod';
import type { TaskKind } from '../core/types.js';
import { ReasonCode } from '../policy/reason-codes.js';

const stringList = z.array(z.string());

export const ExcelDraftSchema = z.object({
  columns: stringList,
  rows: z.array(z.record(z.unknown())),
});

export const WordDraftSchema = z.object({
  headings: stringList,
});

export const PptDraftSchema = z.object({
  slides: stringList,
});

export type ExcelDraft = z.infer<typeof ExcelDraftSchema>;
export type WordDraft = z.infer<typeof WordDraftSchema>;
export type PptDraft = z.infer<typeof PptDraftSchema>;

export interface ContractCheck {
  ok: boolean;
  reasonCode: string;
}

function field(draft: unknown, key: string): unknown {
  if (typeof draft !== 'object' || draft === null) return undefined;
  return Object.entries(draft).find(([k]) => k === key)?.[1];
}

/**
 * Validate a draft against its kind's output contract. Fields are checked in
 * a fixed order so the first broken one names the failure.
 */
export function validateContract(kind: TaskKind, draft: unknown): ContractCheck {
  switch (kind) {
    case 'excel':
      if (!ExcelDraftSchema.shape.columns.safeParse(field(draft, 'columns')).success) {
        return { ok: false, reasonCode: ReasonCode.CONTRACT_EXCEL_COLUMNS_INVALID };
      }
      if (!ExcelDraftSchema.shape.rows.safeParse(field(draft, 'rows')).success) {
        return { ok: false, reasonCode: ReasonCode.CONTRACT_EXCEL_ROWS_INVALID };
      }
      return { ok: true, reasonCode: ReasonCode.CONTRACT_OK };
    case 'word':
      if (!WordDraftSchema.safeParse(draft).success) {
        return { ok: false, reasonCode: ReasonCode.CONTRACT_WORD_HEADINGS_INVALID };
      }
      return { ok: true, reasonCode: ReasonCode.CONTRACT_OK };
    case 'ppt':
      if (!PptDraftSchema.safeParse(draft).success) {
        return { ok: false, reasonCode: ReasonCode.CONTRACT_PPT_SLIDES_INVALID };
      }
      return { ok: true, reasonCode: ReasonCode.CONTRACT_OK };
  }
}
