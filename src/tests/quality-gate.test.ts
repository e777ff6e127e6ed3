import { describe, it, expect, vi } from 'vitest';
import { QualityGate, type ReviewGateInput } from '@/services/review/quality-gate';
import { applySalesTaxStateRule, normalizeState } from '@/services/review/sales-tax-rules';
import { coerceMoneyField, isPlausibleAmount } from '@/services/review/money-coercion';
import type { FieldResult } from '@/types/extraction';

function field<T>(value: T | null, confidence: number, reasoning = 'test'): FieldResult<T> {
  return { value, confidence, reasoning, provenance: value === null ? null : 'test' };
}

function input(overrides: Partial<ReviewGateInput> = {}): ReviewGateInput {
  return {
    ocr: { text: 'x', status: 'success', sourceTag: 'test', confidence: 90 },
    vendor: field('AutoZone', 91),
    date: field('2026-03-14', 90),
    tax: field(3.12, 73),
    total: field(45.12, 100, 'Strong label match (same line)'),
    category: { category: 'Car & Truck', confidence: 0.95, reasoning: 'test', source: 'rules' },
    ...overrides,
  };
}

describe('QualityGate', () => {
  const gate = new QualityGate();

  it('passes a confident record', () => {
    expect(gate.evaluate(input())).toEqual({ flags: [], needsReview: false });
  });

  it('checks tax against the total', () => {
    expect(gate.evaluate(input({ tax: field(50, 90) })).flags).toEqual(['TAX_GT_TOTAL', 'TAX_IMPLAUSIBLE_RATE']);
    expect(gate.evaluate(input({ tax: field(-1, 90) })).flags).toEqual(['TAX_NEGATIVE']);
  });

  it('raises confidence and missing flags in order', () => {
    const decision = gate.evaluate(
      input({
        ocr: { text: '', status: 'failed', sourceTag: 'test', confidence: 0 },
        vendor: field<string>(null, 0),
        date: field<string>(null, 0),
        tax: field<number>(null, 0),
        total: field<number>(null, 0, 'no money candidates found'),
        category: { category: null, confidence: 0, reasoning: 'none', source: 'engine' },
      })
    );
    expect(decision.flags).toEqual([
      'OCR_FAILED',
      'LOW_TOTAL_CONFIDENCE',
      'LOW_DATE_CONFIDENCE',
      'LOW_VENDOR_CONFIDENCE',
      'TAX_MISSING_REVIEW',
      'MISSING_VENDOR',
      'MISSING_DATE',
      'MISSING_TOTAL',
      'MISSING_CATEGORY',
    ]);
    expect(decision.needsReview).toBe(true);
  });

  it('flags weak total context even with high confidence', () => {
    const decision = gate.evaluate(input({ total: field(21.5, 96, 'Labeled total window ; Weak label match') }));
    expect(decision.flags).toEqual(['TOTAL_CONTEXT_WEAK']);
  });

  it('appends upstream flags uppercased and unique', () => {
    const decision = gate.evaluate(input({ upstreamFlags: ['no_sales_tax_state', 'NO_SALES_TAX_STATE', ' '] }));
    expect(decision.flags).toEqual(['NO_SALES_TAX_STATE']);
  });

  it('honors configured thresholds', () => {
    const strict = new QualityGate({ minVendorConfidence: 95 });
    expect(strict.evaluate(input()).flags).toEqual(['LOW_VENDOR_CONFIDENCE']);
  });
});

describe('applySalesTaxStateRule', () => {
  it('drops tax for a no-sales-tax state', () => {
    const result = applySalesTaxStateRule(field(3.12, 73), ' or ');
    expect(result.flag).toBe('NO_SALES_TAX_STATE');
    expect(result.tax).toEqual({
      value: null,
      confidence: 0,
      reasoning: 'business state OR has no statewide sales tax',
      provenance: null,
    });
  });

  it('leaves other states alone', () => {
    const tax = field(3.12, 73);
    expect(applySalesTaxStateRule(tax, 'CA')).toEqual({ tax, flag: null });
    expect(applySalesTaxStateRule(tax, null)).toEqual({ tax, flag: null });
    expect(normalizeState('  ')).toBeNull();
  });
});

describe('coerceMoneyField', () => {
  it('keeps plausible amounts and nulls', () => {
    expect(isPlausibleAmount(45.12)).toBe(true);
    expect(isPlausibleAmount(0)).toBe(true);
    const empty = field<number>(null, 0);
    expect(coerceMoneyField(empty, 'TOTAL_REJECTED_IMPLAUSIBLE')).toEqual({ field: empty, flag: null });
  });

  it('rejects ids and out-of-range amounts', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    expect(isPlausibleAmount(12000)).toBe(false);
    expect(isPlausibleAmount(50000)).toBe(false);
    expect(isPlausibleAmount(-2)).toBe(false);

    expect(coerceMoneyField(field(12000, 90), 'TOTAL_REJECTED_IMPLAUSIBLE')).toEqual({
      field: { value: null, confidence: 0, reasoning: 'rejected implausible amount 12000', provenance: null },
      flag: 'TOTAL_REJECTED_IMPLAUSIBLE',
    });
    vi.restoreAllMocks();
  });
});
