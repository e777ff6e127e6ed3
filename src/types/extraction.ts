// Extraction Types
import type { OcrResult } from './ocr';
import type { CategoryResult } from './category';

export type SectionName =
  | 'full'
  | 'vendor_pass'
  | 'totals_pass'
  | 'numeric_pass'
  | 'softtext_pass'
  | 'other_pass';

// `full` is always present; the other sections only when their marker was seen
export type SectionedText = { full: string[] } & Partial<Record<Exclude<SectionName, 'full'>, string[]>>;

export type MoneyEncoding =
  | 'explicit_decimal'
  | 'euro_style_comma'
  | 'truncated_decimal'
  | 'implied_cents';

// labeled: the span sits next to a total/tax label, implied cents allowed
export type MoneyScanMode = 'labeled' | 'unlabeled';

export interface MoneyToken {
  value: number;                  // 2dp, always in (0, 50000]
  rawText: string;
  offset: number;                 // index of the match in the scanned text
  encoding: MoneyEncoding;
}

export interface FieldResult<T> {
  value: T | null;
  confidence: number;             // 0..100
  reasoning: string;
  provenance: string | null;
}

export interface BusinessContext {
  explanation?: string | null;
  businessType?: string | null;
  businessState?: string | null;  // two-letter US state of the business
}

export interface ParsedReceiptFields {
  vendor: FieldResult<string>;
  date: FieldResult<string>;      // ISO YYYY-MM-DD
  tax: FieldResult<number>;
  total: FieldResult<number>;
  currency: string | null;
}

export interface ExtractionRecord {
  ocr: OcrResult;
  vendor: FieldResult<string>;
  date: FieldResult<string>;
  tax: FieldResult<number>;
  total: FieldResult<number>;
  category: CategoryResult;
  currency: string | null;
  flags: string[];
  needsReview: boolean;
}

/**
 * Result of one pipeline stage. Failures carry the flag the gate should
 * surface instead of a thrown error.
 */
export type StageOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; flag: string; error: Error };

export function emptyField<T>(reasoning: string): FieldResult<T> {
  return { value: null, confidence: 0, reasoning, provenance: null };
}
