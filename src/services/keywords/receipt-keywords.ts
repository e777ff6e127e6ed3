/**
 * Receipt Keywords
 *
 * Centralized management of the lowercase label/context phrases used by the
 * OCR heuristics and the field extractors. All matching is substring based
 * on lowercased text unless a caller says otherwise.
 */

export type ReceiptKeywordCategory =
  | 'totalish'
  | 'taxish'
  | 'total_label'
  | 'subtotal_label'
  | 'tax_label'
  | 'date_label'
  | 'address_marker'
  | 'money_context'
  | 'identifier_context'
  | 'tax_strong'
  | 'tax_medium'
  | 'tax_trap'
  | 'tax_subtotal'
  | 'tax_total'
  | 'inference_bad_total'
  | 'inference_good_total'
  | 'total_bad_context';

export class ReceiptKeywords {
  private static readonly keywords: Record<ReceiptKeywordCategory, readonly string[]> = {
    // OCR quality heuristics
    totalish: ['sale total', 'grand total', 'total', 'amount due', 'balance due', 'invoice total', 'subtotal'],
    taxish: ['sales tax', 'tax', 'vat', 'gst', 'hst'],

    // Vendor top-line exclusions
    total_label: ['total', 'sale total', 'grand total', 'invoice total', 'total due', 'order total'],
    subtotal_label: ['subtotal', 'sub total'],
    tax_label: ['sales tax', 'tax', 'vat', 'gst', 'hst'],
    date_label: ['date', 'dated', 'txn date', 'trans date', 'transaction date', 'purchase date', 'issued', 'invoice date'],
    address_marker: ['street', ' st ', ' st.', 'road', ' rd', ' rd.', 'ave', 'suite', 'phone', 'tel', 'www', '.com', '@'],

    // Implied-cents guards
    money_context: [
      'total', 'sale total', 'grand total', 'amount due', 'balance due',
      'subtotal', 'tax', 'vat', 'gst', 'hst', 'order total',
    ],
    identifier_context: [
      'aid', 'auth', 'approval', 'ref', 'reference', 'tran', 'trans',
      'invoice #', 'inv#', 'order', 'acct', 'account', 'card', 'mastercard', 'visa', 'amex',
    ],

    // Tax extraction
    tax_strong: [
      'sales tax', 'estimated tax', 'tax to be collected', 'tax collected', 'tax amount',
      'vat', 'gst', 'pst', 'hst', 'qst', 'iva', 'mwst', 'tva',
    ],
    tax_medium: ['tax:', ' tax ', 'tax '],
    tax_trap: [
      'before tax', 'total before tax', 'pre-tax', 'pretax', 'taxable', 'tax rate', 'tax %',
      'tax percent', '% tax', 'tax id', 'tax no', 'tax number', 'tax invoice',
    ],
    tax_subtotal: [
      'subtotal', 'sub total', 'total before tax', 'before tax total', 'pre-tax total',
      'pretax total', 'merchandise', 'items subtotal',
    ],
    tax_total: ['grand total', 'order total', 'amount due', 'balance due', 'total:', 'total $', 'total '],
    inference_bad_total: [
      'item total', 'items total', 'item(s) total',
      'subtotal', 'sub total', 'total before tax', 'pretax', 'pre tax', 'before tax',
      'tax', 'sales tax', 'vat', 'gst', 'hst',
      'discount', 'coupon', 'savings',
      'change', 'cash', 'tender', 'payment', 'paid', 'balance', 'amount due',
      'tip', 'gratuity',
      'shipping', 'handling',
      'deposit',
      'auth', 'authorization',
    ],
    inference_good_total: ['grand total', 'order total', 'total due', 'amount due', 'balance due', 'total:'],

    // Total extraction
    total_bad_context: [
      'subtotal', 'sub total',
      'item total', 'items total',
      'line total', 'extended', 'ext price', 'extension',
      'merchandise', 'merch total',
      'taxable', 'vat',
      'tip', 'gratuity',
      'tender', 'cash', 'change',
      'amount tendered',
      'payment', 'debit', 'credit',
      'card', 'visa', 'mastercard',
      'auth', 'approval',
      'discount', 'savings',
      'refund',
    ],
  };

  static getKeywords(category: ReceiptKeywordCategory): readonly string[] {
    return this.keywords[category];
  }

  /**
   * True when the lowercased text contains any keyword of the given categories
   */
  static containsAny(text: string, ...categories: ReceiptKeywordCategory[]): boolean {
    const lower = text.toLowerCase();
    return categories.some((category) => this.keywords[category].some((keyword) => lower.includes(keyword)));
  }

  /**
   * True when `phrase` occurs in `text` with no letter or digit on either side.
   * Both arguments are compared lower-cased.
   */
  static containsWord(text: string, phrase: string): boolean {
    const escaped = phrase.toLowerCase().replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    return new RegExp(`(?<![a-z0-9])${escaped}(?![a-z0-9])`).test(text.toLowerCase());
  }
}
