/**
 * Scoring Configuration
 *
 * Empirically tuned weights used by the field extractors and the review gate.
 * Every value can be overridden per section without touching the extractors:
 *
 *   mergeScoringConfig({ total: { strongSameLineBump: 0.12 } })
 */

export interface OcrQualityScoring {
  earlyExitScore: number;
  statusSuccessMin: number;
  statusLowConfidenceMin: number;
  vendorPassCap: number;
  rightMixedBump: number;
  rightMixedCap: number;
  rightDigitsBump: number;
  rightDigitsCap: number;
  numericPassBump: number;
  numericPassCap: number;
  softTextCap: number;
  pdfTextConfidence: number;
  pdfTextMinChars: number;
}

export interface MoneyScoring {
  maxValue: number;
  skuIntegerFloor: number;        // integer-valued amounts at or above this look like ids
  phoneRadius: number;
  currencyRadius: number;
}

export interface VendorScoring {
  aliasBase: number;
  vendorPassBump: number;
  softTextBump: number;
  topFullBump: number;
  canonicalBump: number;
  earlyExitScore: number;
  shortAliasLength: number;       // aliases this short must match a whole word
  headerOnlyAliasLength: number;  // and this short only outside the receipt body
  fuzzyPrefixMinLength: number;
  topLines: number;
  labeledLines: number;
  labeledConfidence: number;
  heuristicBase: number;
  heuristicWeight: number;
}

export interface DateScoring {
  labelBase: number;
  numericPassBase: number;
  topBase: number;
  fullBase: number;
  labelScanLines: number;
  labelRadius: number;
  topLines: number;
  futurePenalty: number;
  oldPenalty: number;
  recentBump: number;
  futureYears: number;
  oldYears: number;
  recentYears: number;
  twoDigitYearPivot: number;
}

export interface TaxScoring {
  strongBase: number;
  mediumBase: number;
  totalsPassBump: number;
  currencyBump: number;
  tinyPenalty: number;
  largeValue: number;
  largePenalty: number;
  aboveTotalPenalty: number;
  inferredBase: number;
  inferredTotalsPassBump: number;
  maxInferredRate: number;
}

export interface TotalScoring {
  labeledBase: number;
  unlabeledBase: number;
  badContextPenalty: number;
  taxContextPenalty: number;
  smallValue: number;
  smallPenalty: number;
  largeValue: number;
  largePenalty: number;
  taxMatchTolerance: number;
  taxMatchPenalty: number;
  precisionBump: number;
  strongSameLineBump: number;
  strongWindowBump: number;
  weakBump: number;
  loosenedPenalty: number;
  windowLines: number;
}

export interface CategoryScoring {
  vendorRule: number;
  shortKeyLength: number;         // table keys this short must match a whole word
  keywordRule: number;
  businessDefault: number;
  businessHint: number;
  engineExplanation: number;
  engineOcrText: number;
  engineVendor: number;
}

export interface ScoringConfig {
  ocr: OcrQualityScoring;
  money: MoneyScoring;
  vendor: VendorScoring;
  date: DateScoring;
  tax: TaxScoring;
  total: TotalScoring;
  category: CategoryScoring;
}

export type ScoringOverrides = { [K in keyof ScoringConfig]?: Partial<ScoringConfig[K]> };

export const DEFAULT_SCORING_CONFIG: ScoringConfig = {
  ocr: {
    earlyExitScore: 0.86,
    statusSuccessMin: 70,
    statusLowConfidenceMin: 35,
    vendorPassCap: 92,
    rightMixedBump: 4,
    rightMixedCap: 94,
    rightDigitsBump: 6,
    rightDigitsCap: 94,
    numericPassBump: 8,
    numericPassCap: 94,
    softTextCap: 90,
    pdfTextConfidence: 95,
    pdfTextMinChars: 40,
  },
  money: {
    maxValue: 50000,
    skuIntegerFloor: 10000,
    phoneRadius: 8,
    currencyRadius: 18,
  },
  vendor: {
    aliasBase: 0.84,
    vendorPassBump: 0.10,
    softTextBump: 0.06,
    topFullBump: 0.04,
    canonicalBump: 0.03,
    earlyExitScore: 0.92,
    shortAliasLength: 4,
    headerOnlyAliasLength: 2,
    fuzzyPrefixMinLength: 6,
    topLines: 14,
    labeledLines: 20,
    labeledConfidence: 0.68,
    heuristicBase: 0.30,
    heuristicWeight: 0.30,
  },
  date: {
    labelBase: 0.86,
    numericPassBase: 0.74,
    topBase: 0.70,
    fullBase: 0.62,
    labelScanLines: 40,
    labelRadius: 3,
    topLines: 35,
    futurePenalty: 0.35,
    oldPenalty: 0.15,
    recentBump: 0.04,
    futureYears: 2,
    oldYears: 15,
    recentYears: 2,
    twoDigitYearPivot: 68,
  },
  tax: {
    strongBase: 0.85,
    mediumBase: 0.70,
    totalsPassBump: 0.08,
    currencyBump: 0.03,
    tinyPenalty: 0.50,
    largeValue: 500,
    largePenalty: 0.25,
    aboveTotalPenalty: 0.60,
    inferredBase: 0.70,
    inferredTotalsPassBump: 0.05,
    maxInferredRate: 0.25,
  },
  total: {
    labeledBase: 0.90,
    unlabeledBase: 0.55,
    badContextPenalty: 0.35,
    taxContextPenalty: 0.30,
    smallValue: 1,
    smallPenalty: 0.25,
    largeValue: 20000,
    largePenalty: 0.20,
    taxMatchTolerance: 0.02,
    taxMatchPenalty: 0.35,
    precisionBump: 0.03,
    strongSameLineBump: 0.10,
    strongWindowBump: 0.05,
    weakBump: 0.03,
    loosenedPenalty: 0.05,
    windowLines: 3,
  },
  category: {
    vendorRule: 0.95,
    shortKeyLength: 4,
    keywordRule: 0.80,
    businessDefault: 0.55,
    businessHint: 0.90,
    engineExplanation: 0.85,
    engineOcrText: 0.70,
    engineVendor: 0.60,
  },
};

export function mergeScoringConfig(overrides: ScoringOverrides = {}): ScoringConfig {
  return {
    ocr: { ...DEFAULT_SCORING_CONFIG.ocr, ...overrides.ocr },
    money: { ...DEFAULT_SCORING_CONFIG.money, ...overrides.money },
    vendor: { ...DEFAULT_SCORING_CONFIG.vendor, ...overrides.vendor },
    date: { ...DEFAULT_SCORING_CONFIG.date, ...overrides.date },
    tax: { ...DEFAULT_SCORING_CONFIG.tax, ...overrides.tax },
    total: { ...DEFAULT_SCORING_CONFIG.total, ...overrides.total },
    category: { ...DEFAULT_SCORING_CONFIG.category, ...overrides.category },
  };
}

export function clamp01(x: number): number {
  if (x < 0) return 0;
  if (x > 1) return 1;
  return x;
}

// 0..1 score -> 0..100 confidence with one decimal
export function toConfidence100(score01: number): number {
  return Math.round(clamp01(score01) * 1000) / 10;
}
