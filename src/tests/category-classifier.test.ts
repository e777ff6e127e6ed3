import { describe, it, expect, vi, afterEach } from 'vitest';
import { CategoryClassifier } from '@/services/classification/category-classifier';
import { CategoryRules } from '@/services/classification/category-rules';

describe('CategoryClassifier', () => {
  const classifier = new CategoryClassifier();

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('maps a known vendor', () => {
    expect(classifier.classify({ vendor: 'AutoZone' })).toEqual({
      category: 'Car & Truck',
      confidence: 0.95,
      reasoning: "Vendor mapping matched: 'AutoZone' in 'AutoZone'",
      source: 'rules',
    });
  });

  it('prefers the longest vendor key', () => {
    const result = classifier.classify({ vendor: 'Target Specialty Products' });
    expect(result.category).toBe('Supplies');
    expect(result.reasoning).toBe("Vendor mapping matched: 'Target Specialty Products' in 'Target Specialty Products'");
  });

  it('matches short vendor keys only as whole words', () => {
    expect(classifier.classify({ vendor: 'TA #212' })).toEqual({
      category: 'Fuel',
      confidence: 0.95,
      reasoning: "Vendor mapping matched: 'TA' in 'TA #212'",
      source: 'rules',
    });
    expect(classifier.classify({ vendor: 'Data Works' }).category).toBeNull();
  });

  it('uses explanation keywords before OCR keywords', () => {
    const result = classifier.classify({ explanation: 'diesel for the work truck', ocrText: 'printer paper x2' });
    expect(result).toEqual({
      category: 'Fuel',
      confidence: 0.8,
      reasoning: "Explanation rule: Keyword mapping matched: 'diesel'",
      source: 'rules',
    });
  });

  it('falls back to OCR keywords', () => {
    const result = classifier.classify({ ocrText: 'printer paper x2' });
    expect(result.category).toBe('Office Supplies');
    expect(result.reasoning).toBe("OCR rule: Keyword mapping matched: 'paper'");
  });

  it('uses the business type default', () => {
    expect(classifier.classify({ businessType: 'Realtor' })).toEqual({
      category: 'Advertising & Marketing',
      confidence: 0.55,
      reasoning: 'Business type default used: Realtor',
      source: 'rules',
    });
  });

  it('lets a business hint pre-empt the vendor table', () => {
    const result = classifier.classify({
      vendor: 'Home Depot',
      explanation: 'yard sign for open house',
      businessType: 'realtor',
    });
    expect(result).toEqual({
      category: 'Advertising & Marketing',
      confidence: 0.9,
      reasoning: "Matched business_type='realtor' hint in explanation",
      source: 'engine',
    });
  });

  it('asks the keyword engine when no rule fires', () => {
    expect(classifier.classify({ ocrText: 'CHEVRON STATION' })).toEqual({
      category: 'Fuel',
      confidence: 0.7,
      reasoning: 'Matched keywords in OCR text',
      source: 'engine',
    });
  });

  it('reports no match', () => {
    expect(classifier.classify({})).toEqual({
      category: null,
      confidence: 0,
      reasoning: 'no category match found',
      source: 'engine',
    });
  });

  it('classifySafely turns a failure into a flag', () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(CategoryRules.prototype, 'apply').mockImplementation(() => {
      throw new Error('boom');
    });

    const outcome = new CategoryClassifier().classifySafely({ vendor: 'AutoZone' });
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.flag).toBe('CATEGORY_ENGINE_ERROR');
      expect(outcome.error.message).toBe('boom');
    }
  });
});
