/**
 * Deterministic category rules
 *
 * Vendor table, keyword table, then the business-type default. Every hit is
 * reported with source 'rules'.
 */

import type { CategoryResult } from '@/types/category';
import type { ReferenceData } from '@/config/reference-data';
import { DEFAULT_SCORING_CONFIG, type CategoryScoring } from '@/config/scoring-config';
import { ReceiptKeywords } from '@/services/keywords/receipt-keywords';

export function normalizeCategoryText(text: string | null | undefined): string {
  if (!text) return '';
  return text.toLowerCase().trim().replace(/\s+/g, ' ');
}

// Short keys ('TA', 'BP', 'gas') must stand alone or "Data Works" files as Fuel
export function containsKey(text: string, key: string, shortKeyLength: number): boolean {
  if (key.length <= shortKeyLength) {
    return ReceiptKeywords.containsWord(text, key);
  }
  return text.includes(key);
}

export class CategoryRules {
  private readonly scoring: CategoryScoring;

  constructor(
    private readonly referenceData: ReferenceData,
    scoring: Partial<CategoryScoring> = {}
  ) {
    this.scoring = { ...DEFAULT_SCORING_CONFIG.category, ...scoring };
  }

  /**
   * Substring match against the vendor table, longest key wins so that
   * "Target Specialty Products" beats "Target".
   */
  matchVendor(vendor: string | null | undefined): CategoryResult | null {
    const vendorNorm = normalizeCategoryText(vendor);
    if (!vendor || !vendorNorm) return null;

    let best: { key: string; category: string } | null = null;
    for (const [key, category] of this.referenceData.vendorCategories) {
      if (!containsKey(vendorNorm, normalizeCategoryText(key), this.scoring.shortKeyLength)) continue;
      if (!best || key.length > best.key.length) {
        best = { key, category };
      }
    }

    if (!best) return null;
    return {
      category: best.category,
      confidence: this.scoring.vendorRule,
      reasoning: `Vendor mapping matched: '${best.key}' in '${vendor}'`,
      source: 'rules',
    };
  }

  // First keyword of the table found in the text
  matchKeywords(text: string | null | undefined): CategoryResult | null {
    const normalized = normalizeCategoryText(text);
    if (!normalized) return null;

    const hit = this.referenceData.keywordCategories.find(({ keyword }) =>
      containsKey(normalized, keyword, this.scoring.shortKeyLength)
    );
    if (!hit) return null;

    return {
      category: hit.category,
      confidence: this.scoring.keywordRule,
      reasoning: `Keyword mapping matched: '${hit.keyword}'`,
      source: 'rules',
    };
  }

  matchBusinessDefault(businessType: string | null | undefined): CategoryResult | null {
    const normalized = normalizeCategoryText(businessType);
    if (!normalized) return null;

    const category = this.referenceData.businessTypeDefaults.get(normalized);
    if (!category) return null;

    return {
      category,
      confidence: this.scoring.businessDefault,
      reasoning: `Business type default used: ${businessType}`,
      source: 'rules',
    };
  }

  /**
   * Vendor, explanation keywords, OCR keywords, business default, in that order.
   */
  apply(input: {
    vendor?: string | null;
    explanation?: string | null;
    ocrText?: string | null;
    businessType?: string | null;
  }): CategoryResult | null {
    const vendorHit = this.matchVendor(input.vendor);
    if (vendorHit) return vendorHit;

    const explanationHit = this.matchKeywords(input.explanation);
    if (explanationHit) {
      return { ...explanationHit, reasoning: `Explanation rule: ${explanationHit.reasoning}` };
    }

    const ocrHit = this.matchKeywords(input.ocrText);
    if (ocrHit) {
      return { ...ocrHit, reasoning: `OCR rule: ${ocrHit.reasoning}` };
    }

    return this.matchBusinessDefault(input.businessType);
  }
}
