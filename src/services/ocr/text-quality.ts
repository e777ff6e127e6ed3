/**
 * OCR text heuristics
 *
 * Cheap signals computed on engine output without a second engine call:
 * a 0..1 quality score, money/keyword presence and the triggers for the
 * conditional passes.
 */

import type { OcrStatus } from '@/types/ocr';
import type { OcrQualityScoring } from '@/config/scoring-config';
import { ReceiptKeywords } from '../keywords/receipt-keywords';

const DECIMAL_MONEY = /\b\d+\.\d{2}\b/;
const BARE_AMOUNT = /\b\d{3,6}\b/;

export function cleanupText(text: string): string {
  if (!text) return '';
  return text
    .replace(/\r\n?/g, '\n')
    .replace(/[^\x09\x0A\x0D\x20-\x7E]/g, '')
    .split('\n')
    .map((line) => line.replace(/\s+/g, ' ').trim())
    .filter((line) => line.length > 0)
    .join('\n')
    .trim();
}

export function hasTotalishKeywords(text: string): boolean {
  if (!text) return false;
  return ReceiptKeywords.containsAny(text, 'totalish', 'taxish');
}

export function hasMoneyTokens(text: string): boolean {
  if (!text) return false;
  return DECIMAL_MONEY.test(text) || BARE_AMOUNT.test(text);
}

function countMatches(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0;
}

/**
 * Quality score 0..1 from length, alphanumeric density, token count and the
 * presence of receipt keywords and money shapes.
 */
export function textQualityScore(text: string): number {
  const trimmed = text.trim();
  if (!trimmed) return 0;

  const length = trimmed.length;
  const alnum = countMatches(trimmed, /[\p{L}\p{Nd}]/gu);
  const density = alnum / Math.max(1, length);
  const tokens = trimmed.split(/\s+/).filter(Boolean).length;

  let score = 0;
  score += Math.min(0.45, (length / 600) * 0.45);
  score += Math.min(0.20, density * 0.20);
  score += Math.min(0.10, (tokens / 80) * 0.10);
  score += hasTotalishKeywords(trimmed) ? 0.15 : 0;
  score += hasMoneyTokens(trimmed) ? 0.10 : 0;

  return Math.max(0, Math.min(1, score));
}

export function scoreToConfidence(score01: number, bump = 0, cap = 100): number {
  const confidence = score01 * 100 + bump;
  return Math.max(0, Math.min(cap, confidence));
}

export function statusFromConfidence(confidence: number, scoring: OcrQualityScoring): OcrStatus {
  if (confidence >= scoring.statusSuccessMin) return 'success';
  if (confidence >= scoring.statusLowConfidenceMin) return 'low_confidence';
  return 'failed';
}

// Base text mentions totals/tax but the digits were lost
export function looksLikeTotalsMissing(text: string): boolean {
  if (!text) return true;
  if (!hasTotalishKeywords(text)) return false;
  return !hasMoneyTokens(text);
}

// Top of the receipt reads as digit soup or almost no letters
export function looksLikeVendorLettersMissing(text: string): boolean {
  if (!text) return true;
  const top = text
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean)
    .slice(0, 6)
    .join(' ')
    .trim();
  if (top.length < 10) return true;

  const alpha = countMatches(top, /\p{L}/gu);
  const digit = countMatches(top, /\p{Nd}/gu);
  return alpha < 6 || (digit > alpha * 2 && digit > 8);
}
