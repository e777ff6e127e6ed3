/**
 * Receipt Parser
 *
 * Runs the field extractors over one OCR text. Tax is extracted before the
 * total so the total scorer can penalize candidates equal to the tax.
 */

import type { ParsedReceiptFields, StageOutcome } from '@/types/extraction';
import { emptyField } from '@/types/extraction';
import { DEFAULT_SCORING_CONFIG, type ScoringConfig } from '@/config/scoring-config';
import { getDefaultReferenceData, type ReferenceData } from '@/config/reference-data';
import { flagSuffix, toError } from '@/utils/errors';
import { splitSections } from './text-sectioner';
import { MoneyTokenExtractor } from './money-token-extractor';
import { VendorExtractor } from './vendor-extractor';
import { DateExtractor } from './date-extractor';
import { TaxExtractor } from './tax-extractor';
import { TotalExtractor } from './total-extractor';
import { Currency, CurrencyExtractor } from './currency-extractor';

export interface ReceiptParserOptions {
  scoring?: ScoringConfig;
  referenceData?: ReferenceData;
  referenceDate?: Date;
  defaultCurrency?: Currency;
  enableDebugLogging?: boolean;
}

export function emptyParsedFields(reasoning: string): ParsedReceiptFields {
  return {
    vendor: emptyField(reasoning),
    date: emptyField(reasoning),
    tax: emptyField(reasoning),
    total: emptyField(reasoning),
    currency: null,
  };
}

export class ReceiptParser {
  private readonly vendorExtractor: VendorExtractor;
  private readonly dateExtractor: DateExtractor;
  private readonly taxExtractor: TaxExtractor;
  private readonly totalExtractor: TotalExtractor;
  private readonly defaultCurrency: Currency;

  constructor(options: ReceiptParserOptions = {}) {
    const scoring = options.scoring ?? DEFAULT_SCORING_CONFIG;
    const debug = options.enableDebugLogging ?? false;
    const money = new MoneyTokenExtractor(scoring.money);

    this.vendorExtractor = new VendorExtractor(options.referenceData ?? getDefaultReferenceData(), scoring.vendor, debug);
    this.dateExtractor = new DateExtractor(scoring.date, { referenceDate: options.referenceDate, enableDebugLogging: debug });
    this.taxExtractor = new TaxExtractor(money, scoring.tax, debug);
    this.totalExtractor = new TotalExtractor(money, scoring.total, debug);
    this.defaultCurrency = options.defaultCurrency ?? Currency.USD;
  }

  parse(text: string): StageOutcome<ParsedReceiptFields> {
    try {
      const sections = splitSections(text);
      const vendor = this.vendorExtractor.extract(sections);
      const date = this.dateExtractor.extract(sections);
      const tax = this.taxExtractor.extract(sections);
      const total = this.totalExtractor.extract(sections, tax.value);
      const currency = CurrencyExtractor.extractCurrency(sections.full.join('\n'), this.defaultCurrency);

      return { ok: true, value: { vendor, date, tax, total, currency } };
    } catch (error) {
      console.error('❌ [ReceiptParser] Field extraction failed:', error);
      return { ok: false, flag: `PARSER_EXCEPTION_${flagSuffix(error)}`, error: toError(error) };
    }
  }
}
