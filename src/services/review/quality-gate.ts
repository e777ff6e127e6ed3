/**
 * Quality / Review Gate
 *
 * Turns field values and confidences into review flags. A record needs
 * review exactly when at least one flag is raised.
 */

import type { OcrResult } from '@/types/ocr';
import type { FieldResult } from '@/types/extraction';
import type { CategoryResult } from '@/types/category';

export interface ReviewGateConfig {
  minTotalConfidence: number;
  minDateConfidence: number;
  minVendorConfidence: number;
  maxTaxRate: number;             // tax / total above this is implausible
  weakTotalMarkers: string[];     // lowercase fragments of total reasoning
}

export const DEFAULT_REVIEW_GATE_CONFIG: ReviewGateConfig = {
  minTotalConfidence: 80,
  minDateConfidence: 70,
  minVendorConfidence: 70,
  maxTaxRate: 0.25,
  weakTotalMarkers: ['unlabeled', 'bad context', 'weak label match'],
};

export interface ReviewGateInput {
  ocr: OcrResult;
  vendor: FieldResult<string>;
  date: FieldResult<string>;
  tax: FieldResult<number>;
  total: FieldResult<number>;
  category: CategoryResult;
  upstreamFlags?: string[];
}

export interface ReviewDecision {
  flags: string[];
  needsReview: boolean;
}

export class QualityGate {
  private readonly config: ReviewGateConfig;

  constructor(config: Partial<ReviewGateConfig> = {}) {
    this.config = { ...DEFAULT_REVIEW_GATE_CONFIG, ...config };
  }

  evaluate(input: ReviewGateInput): ReviewDecision {
    const flags: string[] = [];
    const { ocr, vendor, date, tax, total, category } = input;

    // Tax sanity against the total
    if (tax.value !== null && total.value !== null) {
      if (tax.value < 0) flags.push('TAX_NEGATIVE');
      if (tax.value > total.value) flags.push('TAX_GT_TOTAL');
      if (total.value > 0 && tax.value / total.value > this.config.maxTaxRate) {
        flags.push('TAX_IMPLAUSIBLE_RATE');
      }
    }

    if (ocr.status === 'failed') flags.push('OCR_FAILED');

    const totalReasoning = total.reasoning.toLowerCase();
    const lowTotal = total.confidence < this.config.minTotalConfidence;
    const weakContext = this.config.weakTotalMarkers.some((marker) => totalReasoning.includes(marker));

    if (lowTotal) flags.push('LOW_TOTAL_CONFIDENCE');
    if (weakContext) flags.push('TOTAL_CONTEXT_WEAK');
    if (date.confidence < this.config.minDateConfidence) flags.push('LOW_DATE_CONFIDENCE');
    if (vendor.confidence < this.config.minVendorConfidence) flags.push('LOW_VENDOR_CONFIDENCE');

    if (tax.value === null && (lowTotal || weakContext)) flags.push('TAX_MISSING_REVIEW');

    if (!vendor.value) flags.push('MISSING_VENDOR');
    if (!date.value) flags.push('MISSING_DATE');
    if (total.value === null) flags.push('MISSING_TOTAL');
    if (!category.category) flags.push('MISSING_CATEGORY');

    for (const flag of input.upstreamFlags ?? []) {
      const normalized = flag.trim().toUpperCase();
      if (normalized) flags.push(normalized);
    }

    const unique = [...new Set(flags)];
    return { flags: unique, needsReview: unique.length > 0 };
  }
}
