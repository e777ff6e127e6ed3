/**
 * Category Classifier
 *
 * Business-type hints pre-empt everything, then deterministic rules, then the
 * keyword engine.
 */

import type { CategoryInput, CategoryResult } from '@/types/category';
import type { StageOutcome } from '@/types/extraction';
import { getDefaultReferenceData, type ReferenceData } from '@/config/reference-data';
import type { CategoryScoring } from '@/config/scoring-config';
import { toError } from '@/utils/errors';
import { CategoryRules } from './category-rules';
import { CategoryEngine } from './category-engine';

export class CategoryClassifier {
  private readonly rules: CategoryRules;
  private readonly engine: CategoryEngine;

  constructor(
    referenceData: ReferenceData = getDefaultReferenceData(),
    scoring: Partial<CategoryScoring> = {},
    private readonly enableDebugLogging = false
  ) {
    this.rules = new CategoryRules(referenceData, scoring);
    this.engine = new CategoryEngine(referenceData, scoring);
  }

  classify(input: CategoryInput): CategoryResult {
    const hinted = this.engine.matchBusinessHint(input.businessType, input.explanation);
    if (hinted) return hinted;

    const ruled = this.rules.apply(input);
    if (ruled) {
      if (this.enableDebugLogging) {
        console.log(`🏷️ [CategoryClassifier] Rule hit:`, ruled);
      }
      return ruled;
    }

    return this.engine.suggest(input);
  }

  classifySafely(input: CategoryInput): StageOutcome<CategoryResult> {
    try {
      return { ok: true, value: this.classify(input) };
    } catch (error) {
      console.error('❌ [CategoryClassifier] Classification failed:', error);
      return { ok: false, flag: 'CATEGORY_ENGINE_ERROR', error: toError(error) };
    }
  }
}
