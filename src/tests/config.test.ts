import { describe, it, expect } from 'vitest';
import { DEFAULT_OCR_CONFIG, loadGoogleVisionCredentialsFromEnv, loadOcrConfigFromEnv } from '@/config/ocr-config';
import { mergeScoringConfig, toConfidence100 } from '@/config/scoring-config';
import { getDefaultReferenceData } from '@/config/reference-data';
import { Currency, CurrencyExtractor } from '@/services/extraction/currency-extractor';
import { GoogleVisionOcrEngine } from '@/services/ocr/google-vision';
import { DIGIT_WHITELIST } from '@/services/ocr/multi-pass-ocr';

describe('OCR configuration', () => {
  it('reads OCR_* variables', () => {
    expect(
      loadOcrConfigFromEnv({ OCR_LANGUAGE: ' fin ', OCR_ENABLE_RECTIFY: 'no', OCR_MAX_PDF_PAGES: '3', OCR_DEBUG: 'YES' })
    ).toEqual({
      language: 'fin',
      enableRectify: false,
      enablePdfText: true,
      maxPdfPages: 3,
      pdfRenderScale: 2,
      enableDebugLogging: true,
    });
  });

  it('keeps defaults for missing or invalid values', () => {
    expect(loadOcrConfigFromEnv({})).toEqual(DEFAULT_OCR_CONFIG);
    expect(loadOcrConfigFromEnv({ OCR_MAX_PDF_PAGES: '0' }).maxPdfPages).toBe(10);
  });

  it('unescapes private key newlines', () => {
    const credentials = loadGoogleVisionCredentialsFromEnv({
      GOOGLE_CLOUD_PROJECT_ID: 'test-project',
      GOOGLE_CLOUD_PRIVATE_KEY: 'test-key-line1\\ntest-key-line2',
    });
    expect(credentials.projectId).toBe('test-project');
    expect(credentials.privateKey).toBe('test-key-line1\ntest-key-line2');
  });
});

describe('scoring configuration', () => {
  it('merges overrides per section', () => {
    const scoring = mergeScoringConfig({ total: { weakBump: 0.05 } });
    expect(scoring.total.weakBump).toBe(0.05);
    expect(scoring.total.labeledBase).toBe(0.9);
    expect(scoring.tax.mediumBase).toBe(0.7);
  });

  it('converts scores to one-decimal confidences', () => {
    expect(toConfidence100(0.456)).toBe(45.6);
    expect(toConfidence100(1.4)).toBe(100);
  });
});

describe('reference data', () => {
  it('is loaded once and frozen', () => {
    const data = getDefaultReferenceData();
    expect(getDefaultReferenceData()).toBe(data);
    expect(Object.isFrozen(data)).toBe(true);
    expect(data.vendorCategories.get('AutoZone')).toBe('Car & Truck');
    expect(data.businessTypeDefaults.get('realtor')).toBe('Advertising & Marketing');
  });

  it('carries the full bookkeeping tables', () => {
    const data = getDefaultReferenceData();
    expect(data.vendorCategories.size).toBe(408);
    expect(data.keywordCategories).toHaveLength(110);
    expect(data.businessTypeDefaults.size).toBe(42);
    expect(data.businessTypeHints.size).toBe(11);
    expect(data.vendorAliases).toHaveLength(75);

    expect(data.vendorCategories.get('Sysco')).toBe('Meals');
    expect(data.businessTypeDefaults.get('maid service')).toBe('Supplies');
    expect(data.vendorAliases.find((vendor) => vendor.canonical === 'Tractor Supply')?.aliases).toEqual([
      'tractor supply',
      'tsc',
    ]);
  });
});

describe('CurrencyExtractor', () => {
  it('prefers an ISO code and maps a bare dollar sign to the default', () => {
    expect(CurrencyExtractor.extractCurrency('Total 12.00 EUR')).toBe(Currency.EUR);
    expect(CurrencyExtractor.extractCurrency('$5.00')).toBe(Currency.USD);
    expect(CurrencyExtractor.extractCurrency('$5.00', Currency.CAD)).toBe(Currency.CAD);
    expect(CurrencyExtractor.extractCurrency('5.00')).toBeNull();
    expect(CurrencyExtractor.fromCode(' sek ')).toBe(Currency.SEK);
    expect(CurrencyExtractor.fromCode('xyz')).toBeNull();
  });
});

describe('GoogleVisionOcrEngine helpers', () => {
  it('maps page segmentation modes to Vision features', () => {
    expect(GoogleVisionOcrEngine.featureForMode(6)).toBe('document_text');
    expect(GoogleVisionOcrEngine.featureForMode(7)).toBe('text');
    expect(GoogleVisionOcrEngine.featureForMode(11)).toBe('text');
  });

  it('translates language codes to hints', () => {
    expect(GoogleVisionOcrEngine.languageHints('eng+fin')).toEqual(['en', 'fi']);
    expect(GoogleVisionOcrEngine.languageHints('por')).toEqual(['po']);
    expect(GoogleVisionOcrEngine.languageHints()).toEqual([]);
  });

  it('filters recognized text through a whitelist', () => {
    expect(GoogleVisionOcrEngine.applyWhitelist('TOTAL 45.12\nx$3', DIGIT_WHITELIST)).toBe(' 45.12\n$3');
    expect(GoogleVisionOcrEngine.applyWhitelist('TOTAL', undefined)).toBe('TOTAL');
  });
});
