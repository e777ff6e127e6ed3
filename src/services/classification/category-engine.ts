/**
 * Category Engine
 *
 * Keyword-bucket fallback used when no deterministic rule fires. Looks at the
 * explanation first, then the OCR text, then the vendor name.
 */

import type { CategoryResult } from '@/types/category';
import type { CategoryKeywords, ReferenceData } from '@/config/reference-data';
import { DEFAULT_SCORING_CONFIG, type CategoryScoring } from '@/config/scoring-config';
import { containsKey, normalizeCategoryText } from './category-rules';

export class CategoryEngine {
  private readonly scoring: CategoryScoring;

  constructor(
    private readonly referenceData: ReferenceData,
    scoring: Partial<CategoryScoring> = {}
  ) {
    this.scoring = { ...DEFAULT_SCORING_CONFIG.category, ...scoring };
  }

  /**
   * Category with the most keyword hits; ties keep the earlier table entry.
   */
  matchBucket(text: string, buckets: readonly CategoryKeywords[] = this.referenceData.engineKeywords): string | null {
    if (!text) return null;

    let bestCategory: string | null = null;
    let bestHits = 0;
    for (const bucket of buckets) {
      const hits = bucket.keywords.filter((keyword) => containsKey(text, keyword, this.scoring.shortKeyLength)).length;
      if (hits > bestHits) {
        bestHits = hits;
        bestCategory = bucket.category;
      }
    }
    return bestCategory;
  }

  /**
   * Business-type hint keywords found in the explanation.
   */
  matchBusinessHint(
    businessType: string | null | undefined,
    explanation: string | null | undefined
  ): CategoryResult | null {
    const type = normalizeCategoryText(businessType);
    const text = normalizeCategoryText(explanation);
    if (!type || !text) return null;

    const hints = this.referenceData.businessTypeHints.get(type);
    if (!hints) return null;

    for (const hint of hints) {
      if (hint.keywords.some((keyword) => text.includes(normalizeCategoryText(keyword)))) {
        return {
          category: hint.category,
          confidence: this.scoring.businessHint,
          reasoning: `Matched business_type='${businessType}' hint in explanation`,
          source: 'engine',
        };
      }
    }
    return null;
  }

  suggest(input: {
    vendor?: string | null;
    explanation?: string | null;
    ocrText?: string | null;
  }): CategoryResult {
    const explanationCategory = this.matchBucket(normalizeCategoryText(input.explanation));
    if (explanationCategory) {
      return {
        category: explanationCategory,
        confidence: this.scoring.engineExplanation,
        reasoning: 'Matched keywords in explanation (highest priority)',
        source: 'engine',
      };
    }

    const ocrCategory = this.matchBucket(normalizeCategoryText(input.ocrText));
    if (ocrCategory) {
      return {
        category: ocrCategory,
        confidence: this.scoring.engineOcrText,
        reasoning: 'Matched keywords in OCR text',
        source: 'engine',
      };
    }

    const vendorCategory = this.matchBucket(normalizeCategoryText(input.vendor));
    if (vendorCategory) {
      return {
        category: vendorCategory,
        confidence: this.scoring.engineVendor,
        reasoning: 'Matched keywords in vendor',
        source: 'engine',
      };
    }

    return { category: null, confidence: 0, reasoning: 'no category match found', source: 'engine' };
  }
}
