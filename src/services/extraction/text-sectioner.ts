/**
 * Text Sectioner
 *
 * Splits merged OCR text back into the passes that produced it, using the
 * marker lines the multi-pass orchestrator writes between sections.
 */

import type { SectionName, SectionedText } from '@/types/extraction';
import { cleanupText } from '../ocr/text-quality';

export const SECTION_MARKERS = {
  vendor: '----- VENDOR PASS (TOP STRIP) -----',
  totalsMixed: '----- TOTALS PASS (RIGHT STRIP MIXED) -----',
  totalsDigits: '----- TOTALS PASS (RIGHT STRIP DIGITS) -----',
  numeric: '----- NUMERIC PASS (FULL) -----',
  softText: '----- SOFT TEXT PASS (FULL) -----',
} as const;

export const PAGE_BREAK = '\n\n----- PAGE BREAK -----\n\n';

export function isSectionMarker(line: string): boolean {
  const upper = line.toUpperCase();
  return upper.includes('-----') && upper.includes('PASS');
}

function sectionForMarker(line: string): Exclude<SectionName, 'full'> {
  const upper = line.toUpperCase();
  if (upper.includes('VENDOR')) return 'vendor_pass';
  if (upper.includes('TOTAL')) return 'totals_pass';
  if (upper.includes('NUMERIC')) return 'numeric_pass';
  if (upper.includes('SOFT TEXT') || upper.includes('SOFTTEXT')) return 'softtext_pass';
  return 'other_pass';
}

/**
 * `full` keeps every line, markers included; other sections only receive
 * content lines that follow their marker.
 */
export function splitSections(text: string): SectionedText {
  const lines = cleanupText(text).split('\n').filter((line) => line.length > 0);
  const sections: SectionedText = { full: [] };
  let current: Exclude<SectionName, 'full'> | null = null;

  for (const line of lines) {
    sections.full.push(line);

    if (isSectionMarker(line)) {
      current = sectionForMarker(line);
      sections[current] = sections[current] ?? [];
      continue;
    }

    if (current) {
      const bucket = sections[current] ?? [];
      bucket.push(line);
      sections[current] = bucket;
    }
  }

  return sections;
}

// Lines of the named section, empty when the section never appeared
export function sectionLines(sections: SectionedText, name: SectionName): string[] {
  return sections[name] ?? [];
}
