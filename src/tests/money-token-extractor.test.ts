/**
 * Money token extraction on noisy receipt lines.
 */

import { describe, it, expect } from 'vitest';
import { MoneyTokenExtractor } from '@/services/extraction/money-token-extractor';

const money = new MoneyTokenExtractor();
const values = (text: string, mode: 'labeled' | 'unlabeled' = 'unlabeled') => money.extract(text, mode).map((t) => t.value);

describe('MoneyTokenExtractor', () => {
  it('reads an explicit decimal with currency sign and thousands separator', () => {
    expect(money.extract('TOTAL $1,234.56', 'unlabeled')).toEqual([
      { value: 1234.56, rawText: '$1,234.56', offset: 7, encoding: 'explicit_decimal' },
    ]);
  });

  it('reads euro style amounts once', () => {
    expect(money.extract('Summe 12,34', 'unlabeled')).toEqual([
      { value: 12.34, rawText: '12,34', offset: 6, encoding: 'euro_style_comma' },
    ]);
    expect(values('1.234,56')).toEqual([1234.56]);
  });

  it('pads a truncated decimal', () => {
    const [token] = money.extract('Total 47.4', 'unlabeled');
    expect(token.value).toBe(47.4);
    expect(token.encoding).toBe('truncated_decimal');
  });

  it('never splits a three-decimal number', () => {
    expect(values('797.860')).toEqual([]);
    expect(values('TOTAL 797.860', 'labeled')).toEqual([]);
  });

  it('returns tokens sorted by offset', () => {
    expect(values('SUBTOTAL 20.00 TAX 1.50')).toEqual([20, 1.5]);
  });

  it('rejects amounts outside the plausible range', () => {
    expect(values('60000.00')).toEqual([]);
    expect(values('0.00')).toEqual([]);
  });

  it('drops large integer-valued amounts from the comma and truncated passes', () => {
    expect(values('12000.0')).toEqual([]);
    expect(values('12,000.00')).toEqual([12000]);
  });

  describe('implied cents', () => {
    it('only applies in labeled mode', () => {
      expect(values('TOTAL 4512', 'labeled')).toEqual([45.12]);
      expect(values('TOTAL 4512', 'unlabeled')).toEqual([]);
    });

    it('skips year-shaped numbers', () => {
      expect(values('TOTAL 2024', 'labeled')).toEqual([]);
    });

    it('requires a dollar sign near five digit numbers', () => {
      expect(values('TOTAL 12345', 'labeled')).toEqual([]);
      expect(values('TOTAL $12345', 'labeled')).toEqual([123.45]);
    });

    it('is disabled by identifier context', () => {
      expect(values('AUTH 4512 TOTAL', 'labeled')).toEqual([]);
    });

    it('skips digit groups inside a phone number', () => {
      const found = values('TOTAL 555-123-4567', 'labeled');
      expect(found).not.toContain(1.23);
      expect(found).not.toContain(45.67);
    });
  });

  it('lastToken returns the rightmost amount', () => {
    expect(money.lastToken('Tax 1.00 3.12', 'labeled')?.value).toBe(3.12);
    expect(money.lastToken('THANK YOU', 'labeled')).toBeNull();
  });
});
