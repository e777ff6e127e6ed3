/**
 * Date Extractor
 *
 * Collects date candidates near date labels and in prioritized text blocks,
 * then picks the most plausible one relative to a reference day.
 */

import type { FieldResult, SectionedText } from '@/types/extraction';
import { emptyField } from '@/types/extraction';
import { DEFAULT_SCORING_CONFIG, clamp01, toConfidence100, type DateScoring } from '@/config/scoring-config';
import { ReceiptKeywords } from '../keywords/receipt-keywords';
import { sectionLines } from './text-sectioner';

export type DatePatternTag = 'mdy_slash' | 'ymd_dash' | 'mon_d_y' | 'd_mon_y';

export interface DateExtractorOptions {
  referenceDate?: Date;           // "today" for plausibility checks, read in UTC
  enableDebugLogging?: boolean;
}

interface DateCandidate {
  iso: string;
  score: number;
  reason: string;
  source: string;                 // date_label or scan:<block>
}

const MONTH_NAMES = 'jan|january|feb|february|mar|march|apr|april|may|jun|june|jul|july|aug|august|sep|sept|september|oct|october|nov|november|dec|december';

const DATE_PATTERNS: Array<{ tag: DatePatternTag; pattern: RegExp }> = [
  // 01/27/2026 or 1/7/26
  { tag: 'mdy_slash', pattern: /\b(?<m>\d{1,2})[/-](?<d>\d{1,2})[/-](?<y>\d{2,4})\b/g },
  // 2026-01-27
  { tag: 'ymd_dash', pattern: /\b(?<y>\d{4})[/-](?<m>\d{1,2})[/-](?<d>\d{1,2})\b/g },
  // Jan 27 2026 / January 27, 2026
  { tag: 'mon_d_y', pattern: new RegExp(`\\b(?<mon>${MONTH_NAMES})\\.?\\s+(?<d>\\d{1,2}),?\\s+(?<y>\\d{2,4})\\b`, 'gi') },
  // 27 Jan 2026
  { tag: 'd_mon_y', pattern: new RegExp(`\\b(?<d>\\d{1,2})\\s+(?<mon>${MONTH_NAMES})\\.?\\s+(?<y>\\d{2,4})\\b`, 'gi') },
];

const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

function toIso(year: number, month: number, day: number): string {
  return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export class DateExtractor {
  private readonly scoring: DateScoring;
  private readonly referenceDate?: Date;
  private readonly enableDebugLogging: boolean;

  constructor(scoring: Partial<DateScoring> = {}, options: DateExtractorOptions = {}) {
    this.scoring = { ...DEFAULT_SCORING_CONFIG.date, ...scoring };
    this.referenceDate = options.referenceDate;
    this.enableDebugLogging = options.enableDebugLogging ?? false;
  }

  private debugLog(phase: string, data: unknown): void {
    if (this.enableDebugLogging) {
      console.log(`📅 [DateExtractor] ${phase}:`, data);
    }
  }

  /**
   * Valid calendar date as ISO string, or null. Two-digit years pivot at 68.
   */
  normalizeDate(year: number, month: number, day: number): string | null {
    let y = year;
    if (y < 100) {
      y = y <= this.scoring.twoDigitYearPivot ? 2000 + y : 1900 + y;
    }
    if (y < 1 || y > 9999 || month < 1 || month > 12 || day < 1) return null;

    const check = new Date(Date.UTC(2000, month - 1, day));
    check.setUTCFullYear(y);
    if (check.getUTCFullYear() !== y || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
      return null;
    }
    return toIso(y, month, day);
  }

  /**
   * Every date found in the text, de-duplicated by ISO value in order.
   */
  candidatesFromText(text: string): Array<{ iso: string; tag: DatePatternTag }> {
    const out: Array<{ iso: string; tag: DatePatternTag }> = [];
    const seen = new Set<string>();

    for (const { tag, pattern } of DATE_PATTERNS) {
      for (const match of text.matchAll(pattern)) {
        const groups = match.groups ?? {};
        const year = Number.parseInt(groups.y ?? '', 10);
        const day = Number.parseInt(groups.d ?? '', 10);
        let month: number | undefined;

        if (tag === 'mdy_slash' || tag === 'ymd_dash') {
          month = Number.parseInt(groups.m ?? '', 10);
        } else {
          month = MONTHS[(groups.mon ?? '').toLowerCase().slice(0, 3)];
        }
        if (month === undefined || Number.isNaN(year) || Number.isNaN(month) || Number.isNaN(day)) continue;

        const iso = this.normalizeDate(year, month, day);
        if (iso && !seen.has(iso)) {
          seen.add(iso);
          out.push({ iso, tag });
        }
      }
    }

    return out;
  }

  private today(): { year: number; month: number; day: number } {
    const now = this.referenceDate ?? new Date();
    return { year: now.getUTCFullYear(), month: now.getUTCMonth() + 1, day: now.getUTCDate() };
  }

  // Same day N years away; Feb 29 falls back to Feb 28 in common years
  private shiftYears(today: { year: number; month: number; day: number }, years: number): string {
    const year = today.year + years;
    const day = today.month === 2 && today.day === 29 && !isLeapYear(year) ? 28 : today.day;
    return toIso(year, today.month, day);
  }

  extract(sections: SectionedText): FieldResult<string> {
    const lines = sections.full;
    const candidates: DateCandidate[] = [];

    // Label proximity scan
    lines.slice(0, this.scoring.labelScanLines).forEach((line, i) => {
      if (!ReceiptKeywords.containsAny(line, 'date_label')) return;
      const radius = this.scoring.labelRadius;
      const window = lines.slice(Math.max(0, i - radius), i + radius + 1).join(' | ');
      for (const { iso, tag } of this.candidatesFromText(window)) {
        candidates.push({
          iso,
          score: this.scoring.labelBase,
          reason: `Matched date pattern '${tag}'. Found near date label in: '${line}'.`,
          source: 'date_label',
        });
      }
    });

    // Generic scan in prioritized blocks
    const blocks: Array<[string, string, number]> = [];
    const numeric = sectionLines(sections, 'numeric_pass');
    if (numeric.length > 0) {
      blocks.push(['numeric_pass', numeric.join('\n'), this.scoring.numericPassBase]);
    }
    blocks.push(['top_full', lines.slice(0, this.scoring.topLines).join('\n'), this.scoring.topBase]);
    blocks.push(['full', lines.join('\n'), this.scoring.fullBase]);

    for (const [name, block, base] of blocks) {
      for (const { iso, tag } of this.candidatesFromText(block)) {
        candidates.push({
          iso,
          score: base,
          reason: `Matched date pattern '${tag}'. Found by scan in ${name}.`,
          source: `scan:${name}`,
        });
      }
    }

    if (candidates.length === 0) {
      return emptyField('no date pattern detected');
    }

    const today = this.today();
    const todayIso = toIso(today.year, today.month, today.day);
    const futureLimit = this.shiftYears(today, this.scoring.futureYears);
    const oldLimit = this.shiftYears(today, -this.scoring.oldYears);
    const recentStart = this.shiftYears(today, -this.scoring.recentYears);

    let best: DateCandidate | null = null;
    for (const candidate of candidates) {
      let { score, reason } = candidate;
      const { iso, source } = candidate;

      if (iso > futureLimit) {
        score -= this.scoring.futurePenalty;
        reason += ' Penalized: implausible far-future date.';
      }
      if (iso < oldLimit) {
        score -= this.scoring.oldPenalty;
        reason += ' Penalized: very old date.';
      }
      if (iso >= recentStart && iso <= todayIso) {
        score += this.scoring.recentBump;
      }

      score = clamp01(score);
      if (!best || score > best.score) {
        best = { iso, score, reason, source };
      }
    }

    if (!best) {
      return emptyField('Date candidates existed but none were valid.');
    }

    this.debugLog('Selected date', best);
    return {
      value: best.iso,
      confidence: toConfidence100(best.score),
      reasoning: best.reason,
      provenance: best.source,
    };
  }
}
