/**
 * Money Token Extractor
 *
 * Finds monetary amounts in noisy OCR text. Four passes, each with its own
 * boundaries so that one physical amount is never read twice:
 *
 *   explicit_decimal   $1,234.56  1234.56
 *   euro_style_comma   12,34  1.234,56
 *   truncated_decimal  47.4 -> 47.40
 *   implied_cents      4512 -> 45.12 (labeled lines only)
 */

import type { MoneyEncoding, MoneyScanMode, MoneyToken } from '@/types/extraction';
import { DEFAULT_SCORING_CONFIG, type MoneyScoring } from '@/config/scoring-config';
import { ReceiptKeywords } from '../keywords/receipt-keywords';

const EXPLICIT_DECIMAL = /(\$)?\s*(?<![\d.,])((?:\d{1,3}(?:,\d{3})+|\d+)\.\d{2})(?!\d)/g;
const EURO_DECIMAL = /(?<![\d.,])((?:\d{1,3}(?:\.\d{3})+|\d{1,6}),\d{2})(?!\d)(?![.,]\d)/g;
const TRUNCATED_DECIMAL = /(?<![\d.,])(\d{1,6}\.\d)(?![.,]?\d)/g;
const IMPLIED_CENTS = /(?<![\d.,])(\d{3,6})(?!\d)(?![.,]\d)/g;

const PHONE_SHAPE = /\(\d{3}\)|\d{3}[-\s]\d{3}[-\s]\d{4}/;
const YEAR_SHAPE = /^(?:19|20)\d{2}$/;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export class MoneyTokenExtractor {
  private readonly scoring: MoneyScoring;

  constructor(scoring: Partial<MoneyScoring> = {}) {
    this.scoring = { ...DEFAULT_SCORING_CONFIG.money, ...scoring };
  }

  /**
   * All money tokens in the text, sorted by offset. `labeled` mode also
   * accepts bare integers as implied cents when the text carries a money
   * label and no identifier context.
   */
  extract(text: string, mode: MoneyScanMode): MoneyToken[] {
    if (!text) return [];

    const tokens: MoneyToken[] = [];
    const seen = new Set<string>();
    const push = (value: number, rawText: string, offset: number, encoding: MoneyEncoding): void => {
      const key = `${value.toFixed(2)}@${offset}`;
      if (seen.has(key)) return;
      seen.add(key);
      tokens.push({ value, rawText, offset, encoding });
    };

    for (const match of text.matchAll(EXPLICIT_DECIMAL)) {
      const numeric = match[2];
      const value = round2(Number.parseFloat(numeric.replace(/,/g, '')));
      if (!this.inRange(value)) continue;
      const offset = (match.index ?? 0) + match[0].length - numeric.length;
      push(value, match[0].trim(), offset, 'explicit_decimal');
    }

    for (const match of text.matchAll(EURO_DECIMAL)) {
      const numeric = match[1];
      const value = round2(Number.parseFloat(numeric.replace(/\./g, '').replace(',', '.')));
      if (!this.inRange(value) || this.looksLikeSku(value)) continue;
      push(value, numeric, match.index ?? 0, 'euro_style_comma');
    }

    for (const match of text.matchAll(TRUNCATED_DECIMAL)) {
      const numeric = match[1];
      const value = round2(Number.parseFloat(numeric));
      if (!this.inRange(value) || this.looksLikeSku(value)) continue;
      push(value, numeric, match.index ?? 0, 'truncated_decimal');
    }

    if (mode === 'labeled' && this.allowsImpliedCents(text)) {
      for (const match of text.matchAll(IMPLIED_CENTS)) {
        const digits = match[1];
        const start = match.index ?? 0;
        const end = start + digits.length;

        if (digits.length === 4 && YEAR_SHAPE.test(digits)) continue;
        if (PHONE_SHAPE.test(this.window(text, start, end, this.scoring.phoneRadius))) continue;
        if (digits.length === 5 && !this.window(text, start, end, this.scoring.currencyRadius).includes('$')) continue;

        const value = round2(Number.parseInt(digits, 10) / 100);
        if (!this.inRange(value)) continue;
        push(value, digits, start, 'implied_cents');
      }
    }

    return tokens.sort((a, b) => a.offset - b.offset);
  }

  // Rightmost token, the usual position of the amount on a receipt line
  lastToken(text: string, mode: MoneyScanMode): MoneyToken | null {
    const tokens = this.extract(text, mode);
    return tokens.length > 0 ? tokens[tokens.length - 1] : null;
  }

  private inRange(value: number): boolean {
    return Number.isFinite(value) && value > 0 && value <= this.scoring.maxValue;
  }

  private looksLikeSku(value: number): boolean {
    return Number.isInteger(value) && value >= this.scoring.skuIntegerFloor;
  }

  private allowsImpliedCents(text: string): boolean {
    return ReceiptKeywords.containsAny(text, 'money_context') && !ReceiptKeywords.containsAny(text, 'identifier_context');
  }

  private window(text: string, start: number, end: number, radius: number): string {
    return text.slice(Math.max(0, start - radius), end + radius);
  }
}
