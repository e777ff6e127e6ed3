/**
 * Currency Detection Service
 *
 * Works on cleaned OCR text, which is ASCII only, so ISO codes are the
 * reliable signal. A bare "$" maps to the configured default currency.
 */

export enum Currency {
  USD = 'USD',
  EUR = 'EUR',
  GBP = 'GBP',
  CAD = 'CAD',
  AUD = 'AUD',
  SEK = 'SEK',
  NOK = 'NOK',
  DKK = 'DKK',
  CHF = 'CHF',
}

export class CurrencyExtractor {
  // Currency code to Currency enum mapping (case-insensitive)
  private static readonly currencyCodeMap: Map<string, Currency> = new Map(
    Object.values(Currency).map((code): [string, Currency] => [code.toLowerCase(), code])
  );

  static get currencyCodePattern(): RegExp {
    const codes = Object.values(Currency).join('|');
    return new RegExp(`\\b(${codes})\\b`, 'i');
  }

  /**
   * Convert a currency code string to Currency enum, null when unsupported
   */
  static fromCode(code: string): Currency | null {
    return this.currencyCodeMap.get(code.trim().toLowerCase()) ?? null;
  }

  /**
   * First ISO code in the text wins; otherwise a dollar sign implies the
   * default currency.
   */
  static extractCurrency(text: string, defaultCurrency: Currency = Currency.USD): Currency | null {
    if (!text) return null;

    const match = this.currencyCodePattern.exec(text);
    if (match) {
      const code = this.fromCode(match[1]);
      if (code) return code;
    }

    if (text.includes('$')) {
      return defaultCurrency;
    }

    return null;
  }
}
