/**
 * Vendor Extractor
 *
 * Tiered merchant detection, first tier with a hit wins:
 * 1. alias table over the vendor strip, soft-text pass, top lines and full text;
 *    short aliases only count as whole words
 * 2. explicit "Merchant: ..." style labels
 * 3. heuristic pick of the most name-like top line
 */

import type { FieldResult, SectionedText } from '@/types/extraction';
import { emptyField } from '@/types/extraction';
import type { ReferenceData, VendorAlias } from '@/config/reference-data';
import { DEFAULT_SCORING_CONFIG, clamp01, toConfidence100, type VendorScoring } from '@/config/scoring-config';
import { ReceiptKeywords } from '../keywords/receipt-keywords';
import { isSectionMarker, sectionLines } from './text-sectioner';

type AliasSpace = 'vendor_pass' | 'softtext_pass' | 'top_full' | 'full';

const LABELED_VENDOR_PATTERNS = [
  /\b(from|sold by|merchant|seller)\s*[:\-]\s*(.+)$/i,
  /\b(merchant)\b\s+(.+)$/i,
];

function normalizeAlnum(text: string): string {
  return text.toLowerCase().replace(/[^a-z0-9]+/g, '');
}

function stripNoise(text: string): string {
  return text
    .replace(/[^A-Za-z0-9 '&.\-/]/g, ' ')
    .replace(/\s{2,}/g, ' ')
    .trim();
}

export class VendorExtractor {
  private readonly scoring: VendorScoring;

  constructor(
    private readonly referenceData: ReferenceData,
    scoring: Partial<VendorScoring> = {},
    private readonly enableDebugLogging = false
  ) {
    this.scoring = { ...DEFAULT_SCORING_CONFIG.vendor, ...scoring };
  }

  private debugLog(phase: string, data: unknown): void {
    if (this.enableDebugLogging) {
      console.log(`🏪 [VendorExtractor] ${phase}:`, data);
    }
  }

  extract(sections: SectionedText): FieldResult<string> {
    const lines = sections.full;
    if (lines.length === 0) {
      return emptyField('no reliable vendor signal');
    }

    return (
      this.matchAliases(sections) ??
      this.matchLabeledLine(lines) ??
      this.pickHeuristicTopLine(lines) ??
      emptyField('no reliable vendor signal')
    );
  }

  private spaceBump(space: AliasSpace): number {
    switch (space) {
      case 'vendor_pass':
        return this.scoring.vendorPassBump;
      case 'softtext_pass':
        return this.scoring.softTextBump;
      case 'top_full':
        return this.scoring.topFullBump;
      default:
        return 0;
    }
  }

  private aliasHit(space: AliasSpace, text: string, tokens: string[], normalizedText: string, alias: string): boolean {
    const lowered = alias.toLowerCase();
    const normalized = normalizeAlnum(lowered);
    if (!normalized) return false;

    // 'bp', 'esso', 'hd' and friends sit inside ordinary words (SUBPANEL, PROCESSOR)
    if (normalized.length <= this.scoring.shortAliasLength) {
      if (space === 'full' && normalized.length <= this.scoring.headerOnlyAliasLength) return false;
      return ReceiptKeywords.containsWord(text, lowered);
    }

    if (text.includes(lowered)) return true;
    if (normalizedText.includes(normalized)) return true;
    if (normalized.length < this.scoring.fuzzyPrefixMinLength) return false;

    // OCR often mangles the tail of a name; accept a shared 4-char prefix
    const prefix = normalized.slice(0, 4);
    return tokens.some((token) => token.startsWith(prefix) && Math.abs(token.length - normalized.length) <= 4);
  }

  private matchAliases(sections: SectionedText): FieldResult<string> | null {
    const spaces: Array<[AliasSpace, string[]]> = [
      ['vendor_pass', sectionLines(sections, 'vendor_pass')],
      ['softtext_pass', sectionLines(sections, 'softtext_pass')],
      ['top_full', sections.full.slice(0, this.scoring.topLines)],
      ['full', sections.full],
    ];

    let best: { vendor: VendorAlias; alias: string; space: AliasSpace; score: number } | null = null;

    for (const [space, lines] of spaces) {
      if (lines.length === 0) continue;

      const text = lines.join('\n').toLowerCase();
      const tokens = text.match(/[a-z0-9']{3,}/g) ?? [];
      const normalizedText = normalizeAlnum(text);

      for (const vendor of this.referenceData.vendorAliases) {
        for (const alias of vendor.aliases) {
          if (!this.aliasHit(space, text, tokens, normalizedText, alias)) continue;

          let score = this.scoring.aliasBase + this.spaceBump(space);
          if (text.includes(vendor.canonical.toLowerCase())) {
            score += this.scoring.canonicalBump;
          }
          score = clamp01(score);

          if (!best || score > best.score) {
            best = { vendor, alias, space, score };
          }
        }
      }

      if (best && best.score >= this.scoring.earlyExitScore && (space === 'vendor_pass' || space === 'softtext_pass')) {
        break;
      }
    }

    if (!best) return null;

    this.debugLog('Alias match', { vendor: best.vendor.canonical, space: best.space, score: best.score });
    return {
      value: best.vendor.canonical,
      confidence: toConfidence100(best.score),
      reasoning: `Matched vendor alias '${best.alias}' in alias_match:${best.space}.`,
      provenance: `alias_match:${best.space}`,
    };
  }

  private matchLabeledLine(lines: string[]): FieldResult<string> | null {
    for (const line of lines.slice(0, this.scoring.labeledLines)) {
      for (const pattern of LABELED_VENDOR_PATTERNS) {
        const match = line.match(pattern);
        if (!match) continue;

        const name = stripNoise(match[2]);
        if (name.length < 2 || name.length > 50) continue;

        return {
          value: name,
          confidence: toConfidence100(this.scoring.labeledConfidence),
          reasoning: `Vendor taken from labeled line '${line}'.`,
          provenance: 'labeled_vendor',
        };
      }
    }
    return null;
  }

  private scoreTopLine(line: string): number {
    const letters = (line.match(/[A-Za-z]/g) ?? []).length;
    const digits = (line.match(/\d/g) ?? []).length;
    const uppers = (line.match(/[A-Z]/g) ?? []).length;
    const words = line.split(/\s+/).filter(Boolean).length;

    let score = 0;
    if (letters >= 4) score += 0.30;
    if (digits > letters) score -= 0.20;
    if (letters > 0 && uppers / letters >= 0.6) score += 0.12;
    if (words >= 1 && words <= 4) score += 0.10;
    return score;
  }

  private pickHeuristicTopLine(lines: string[]): FieldResult<string> | null {
    let best: { line: string; score: number } | null = null;

    for (const raw of lines.slice(0, this.scoring.topLines)) {
      if (isSectionMarker(raw)) continue;
      if (
        ReceiptKeywords.containsAny(raw, 'total_label', 'tax_label', 'date_label', 'subtotal_label', 'address_marker')
      ) {
        continue;
      }

      const line = stripNoise(raw);
      if (line.length < 3 || line.length > 55) continue;

      const score = this.scoreTopLine(line);
      if (score <= 0) continue;
      if (!best || score > best.score) {
        best = { line, score };
      }
    }

    if (!best) return null;

    const confidence = clamp01(this.scoring.heuristicBase + this.scoring.heuristicWeight * best.score);
    return {
      value: best.line,
      confidence: toConfidence100(confidence),
      reasoning: `Heuristic top line '${best.line}' (score ${best.score.toFixed(2)}).`,
      provenance: 'heuristic_top_line',
    };
  }
}
