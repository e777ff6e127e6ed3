/**
 * Tax Extractor
 *
 * Explicit tax lines first (totals strip before full text), then inference
 * from a subtotal and a grand total when no tax line exists.
 */

import type { FieldResult, SectionedText } from '@/types/extraction';
import { emptyField } from '@/types/extraction';
import { DEFAULT_SCORING_CONFIG, clamp01, toConfidence100, type TaxScoring } from '@/config/scoring-config';
import { ReceiptKeywords } from '../keywords/receipt-keywords';
import { MoneyTokenExtractor } from './money-token-extractor';
import { sectionLines } from './text-sectioner';

type ScanSource = 'totals_pass' | 'full';

interface SeenAmount {
  value: number;
  source: ScanSource;
  line: string;
}

export class TaxExtractor {
  private readonly scoring: TaxScoring;

  constructor(
    private readonly money: MoneyTokenExtractor = new MoneyTokenExtractor(),
    scoring: Partial<TaxScoring> = {},
    private readonly enableDebugLogging = false
  ) {
    this.scoring = { ...DEFAULT_SCORING_CONFIG.tax, ...scoring };
  }

  private debugLog(phase: string, data: unknown): void {
    if (this.enableDebugLogging) {
      console.log(`🧾 [TaxExtractor] ${phase}:`, data);
    }
  }

  private lastMoney(line: string): number | null {
    return this.money.lastToken(line, 'labeled')?.value ?? null;
  }

  // Lines that mention a total but are not the grand total
  isInferenceBadTotal(text: string): boolean {
    if (ReceiptKeywords.containsAny(text, 'inference_good_total')) return false;
    return ReceiptKeywords.containsAny(text, 'inference_bad_total');
  }

  extract(sections: SectionedText): FieldResult<number> {
    const scan: Array<[ScanSource, string]> = [
      ...sectionLines(sections, 'totals_pass').map((line): [ScanSource, string] => ['totals_pass', line]),
      ...sections.full.map((line): [ScanSource, string] => ['full', line]),
    ];

    let best: { value: number; score: number; reason: string; source: ScanSource } | null = null;
    let seenSubtotal: SeenAmount | null = null;
    let seenTotal: SeenAmount | null = null;

    for (const [source, line] of scan) {
      const lower = line.toLowerCase().trim();
      if (!lower) continue;

      if (!seenSubtotal && ReceiptKeywords.containsAny(lower, 'tax_subtotal')) {
        const value = this.lastMoney(line);
        if (value !== null) seenSubtotal = { value, source, line };
      }

      if (!seenTotal && ReceiptKeywords.containsAny(lower, 'tax_total') && !this.isInferenceBadTotal(lower)) {
        const value = this.lastMoney(line);
        if (value !== null) seenTotal = { value, source, line };
      }

      if (ReceiptKeywords.containsAny(lower, 'tax_trap')) continue;

      const isStrong = ReceiptKeywords.containsAny(lower, 'tax_strong');
      const isMedium = !isStrong && ReceiptKeywords.containsAny(lower, 'tax_medium');
      if (!isStrong && !isMedium) continue;

      const value = this.lastMoney(line);
      if (value === null) continue;

      let score = isStrong ? this.scoring.strongBase : this.scoring.mediumBase;
      if (source === 'totals_pass') score += this.scoring.totalsPassBump;
      if (line.includes('$')) score += this.scoring.currencyBump;
      if (value < 0.01) score -= this.scoring.tinyPenalty;
      if (value > this.scoring.largeValue) score -= this.scoring.largePenalty;
      if (seenTotal && value > seenTotal.value) score -= this.scoring.aboveTotalPenalty;
      score = clamp01(score);

      if (!best || score > best.score) {
        const strength = isStrong ? 'strong' : 'medium';
        best = { value, score, source, reason: `Matched ${strength} tax label; Source: (${source}) '${line}'` };
      }
    }

    if (best) {
      this.debugLog('Explicit tax', best);
      return {
        value: Math.round(best.value * 100) / 100,
        confidence: toConfidence100(best.score),
        reasoning: best.reason,
        provenance: `tax_label:${best.source}`,
      };
    }

    if (seenTotal && seenSubtotal) {
      const inferred = Math.round((seenTotal.value - seenSubtotal.value) * 100) / 100;
      if (inferred >= 0 && seenTotal.value > 0 && inferred / seenTotal.value <= this.scoring.maxInferredRate) {
        let confidence = this.scoring.inferredBase;
        if (seenTotal.source === 'totals_pass' && seenSubtotal.source === 'totals_pass') {
          confidence += this.scoring.inferredTotalsPassBump;
        }

        this.debugLog('Inferred tax', { inferred, total: seenTotal, subtotal: seenSubtotal });
        return {
          value: inferred,
          confidence: toConfidence100(clamp01(confidence)),
          reasoning:
            `Inferred tax = total - subtotal (${seenTotal.value.toFixed(2)} - ${seenSubtotal.value.toFixed(2)}). ` +
            `Total from ${seenTotal.source}: '${seenTotal.line}'; subtotal from ${seenSubtotal.source}: '${seenSubtotal.line}'`,
          provenance: 'inferred_total_minus_subtotal',
        };
      }
    }

    return emptyField('no tax line detected');
  }
}
