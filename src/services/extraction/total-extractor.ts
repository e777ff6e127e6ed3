/**
 * Total Extractor
 *
 * Grand total selection in four passes, the first pass with candidates wins:
 * strong labels (grand total, amount due, ...), the weak "total" label, an
 * unlabeled scan that skips bad contexts and a loosened scan that only skips
 * item math. Every candidate keeps the list of reasons behind its score.
 */

import type { FieldResult, SectionName, SectionedText } from '@/types/extraction';
import { emptyField } from '@/types/extraction';
import { DEFAULT_SCORING_CONFIG, clamp01, type TotalScoring } from '@/config/scoring-config';
import { ReceiptKeywords } from '../keywords/receipt-keywords';
import { MoneyTokenExtractor } from './money-token-extractor';
import { sectionLines } from './text-sectioner';

const SECTION_ORDER: SectionName[] = ['full', 'vendor_pass', 'totals_pass', 'numeric_pass', 'softtext_pass', 'other_pass'];

const STRONG_LABEL_PATTERNS = [
  /grand\s*total/i,
  /total\s+due/i,
  /amount\s+due/i,
  /balance\s+due/i,
  /amount\s+payable/i,
  /pay\s+this\s+amount/i,
  /order\s*total/i,
];

const WEAK_LABEL_PATTERN = /\btotal\b/i;

// "2 x 4.99", "3 @ $1.25"
const ITEM_MATH = /\b\d+\s*(?:x|@)\s*\$?\s*\d+(\.\d{1,2})?\b/i;

interface TotalCandidate {
  value: number;
  score: number;
  reason: string;
  pass: 'strong_label' | 'weak_label' | 'unlabeled' | 'loosened';
}

function hasStrongLabel(text: string): boolean {
  return STRONG_LABEL_PATTERNS.some((pattern) => pattern.test(text));
}

function collapse(text: string): string {
  return text.trim().replace(/\s+/g, ' ');
}

export class TotalExtractor {
  private readonly scoring: TotalScoring;

  constructor(
    private readonly money: MoneyTokenExtractor = new MoneyTokenExtractor(),
    scoring: Partial<TotalScoring> = {},
    private readonly enableDebugLogging = false
  ) {
    this.scoring = { ...DEFAULT_SCORING_CONFIG.total, ...scoring };
  }

  private debugLog(phase: string, data: unknown): void {
    if (this.enableDebugLogging) {
      console.log(`💰 [TotalExtractor] ${phase}:`, data);
    }
  }

  isBadContext(text: string): boolean {
    if (hasStrongLabel(text)) return false;
    if (ReceiptKeywords.containsAny(text, 'total_bad_context')) return true;
    return ITEM_MATH.test(text);
  }

  private score(value: number, context: string, labeled: boolean, taxValue: number | null): { score: number; why: string[] } {
    const why: string[] = [];
    let score = labeled ? this.scoring.labeledBase : this.scoring.unlabeledBase;
    why.push(labeled ? 'Labeled total window' : 'Unlabeled candidate');

    const lower = context.toLowerCase();

    if (this.isBadContext(context)) {
      score -= this.scoring.badContextPenalty;
      why.push('Penalized: bad context');
    }

    if (lower.includes('tax') || lower.includes('vat')) {
      score -= this.scoring.taxContextPenalty;
      why.push('Penalized: tax context');
    }

    if (value < this.scoring.smallValue) {
      score -= this.scoring.smallPenalty;
      why.push('Penalized: too small');
    } else if (value > this.scoring.largeValue) {
      score -= this.scoring.largePenalty;
      why.push('Penalized: unusually large');
    }

    if (taxValue !== null && Math.abs(value - taxValue) <= this.scoring.taxMatchTolerance) {
      score -= this.scoring.taxMatchPenalty;
      why.push('Penalized: matches tax value');
    }

    if (Math.abs(value * 100 - Math.round(value * 100)) < 1e-6) {
      score += this.scoring.precisionBump;
      why.push('Bump: currency-like precision');
    }

    return { score: clamp01(score), why };
  }

  private candidate(
    value: number,
    context: string,
    labeled: boolean,
    taxValue: number | null,
    bump: number,
    note: string | null,
    pass: TotalCandidate['pass']
  ): TotalCandidate {
    const { score, why } = this.score(value, context, labeled, taxValue);
    if (note) why.push(note);
    return {
      value,
      score: clamp01(score + bump),
      reason: `${why.join(' ; ')}. Source: '${context}'`,
      pass,
    };
  }

  // Full lines first, then section lines, whitespace-collapsed and unique
  private unifiedLines(sections: SectionedText): string[] {
    const all: string[] = [];
    for (const name of SECTION_ORDER) {
      for (const line of sectionLines(sections, name)) {
        const collapsed = collapse(line);
        if (collapsed) all.push(collapsed);
      }
    }
    return [...new Set(all)];
  }

  private window(lines: string[], index: number): string {
    return lines.slice(index, index + this.scoring.windowLines).join(' | ');
  }

  private pickBest(candidates: TotalCandidate[]): TotalCandidate | null {
    let best: TotalCandidate | null = null;
    for (const candidate of candidates) {
      if (!best || candidate.score > best.score) best = candidate;
    }
    return best;
  }

  extract(sections: SectionedText, taxValue: number | null = null): FieldResult<number> {
    const lines = this.unifiedLines(sections);
    const best =
      this.strongLabelPass(lines, taxValue) ??
      this.weakLabelPass(lines, taxValue) ??
      this.unlabeledPass(lines, taxValue) ??
      this.loosenedPass(lines, taxValue);

    if (!best) {
      return emptyField('no money candidates found');
    }

    this.debugLog('Selected total', best);
    return {
      value: best.value,
      confidence: Math.round(best.score * 100 * 100) / 100,
      reasoning: best.reason,
      provenance: best.pass,
    };
  }

  private strongLabelPass(lines: string[], taxValue: number | null): TotalCandidate | null {
    const candidates: TotalCandidate[] = [];

    lines.forEach((line, i) => {
      if (!hasStrongLabel(line)) return;

      // Value on the same line as the label ("Order Total: $35.62")
      const sameLine = this.money.lastToken(line, 'labeled');
      if (sameLine) {
        candidates.push(
          this.candidate(sameLine.value, line, true, taxValue, this.scoring.strongSameLineBump, 'Strong label match (same line)', 'strong_label')
        );
        return;
      }

      // Totals sometimes wrap onto the next lines
      const window = this.window(lines, i);
      for (const token of this.money.extract(window, 'labeled')) {
        candidates.push(
          this.candidate(token.value, window, true, taxValue, this.scoring.strongWindowBump, 'Strong label match', 'strong_label')
        );
      }
    });

    return this.pickBest(candidates);
  }

  private weakLabelPass(lines: string[], taxValue: number | null): TotalCandidate | null {
    const candidates: TotalCandidate[] = [];

    lines.forEach((line, i) => {
      if (!WEAK_LABEL_PATTERN.test(line) || this.isBadContext(line)) return;
      const window = this.window(lines, i);
      for (const token of this.money.extract(window, 'labeled')) {
        candidates.push(
          this.candidate(token.value, window, true, taxValue, this.scoring.weakBump, 'Weak label match', 'weak_label')
        );
      }
    });

    return this.pickBest(candidates);
  }

  private unlabeledPass(lines: string[], taxValue: number | null): TotalCandidate | null {
    const candidates: TotalCandidate[] = [];
    for (const line of lines) {
      if (this.isBadContext(line)) continue;
      for (const token of this.money.extract(line, 'unlabeled')) {
        candidates.push(this.candidate(token.value, line, false, taxValue, 0, null, 'unlabeled'));
      }
    }
    return this.pickBest(candidates);
  }

  private loosenedPass(lines: string[], taxValue: number | null): TotalCandidate | null {
    const candidates: TotalCandidate[] = [];
    for (const line of lines) {
      if (ITEM_MATH.test(line)) continue;
      for (const token of this.money.extract(line, 'unlabeled')) {
        candidates.push(
          this.candidate(token.value, line, false, taxValue, -this.scoring.loosenedPenalty, 'Loosened context filter', 'loosened')
        );
      }
    }
    return this.pickBest(candidates);
  }
}
