/**
 * Strict money coercion applied to total and tax before the review gate.
 */

import type { FieldResult } from '@/types/extraction';
import { DEFAULT_SCORING_CONFIG, type MoneyScoring } from '@/config/scoring-config';

export function isPlausibleAmount(value: number, scoring: MoneyScoring = DEFAULT_SCORING_CONFIG.money): boolean {
  if (!Number.isFinite(value) || value < 0) return false;
  if (value >= scoring.maxValue) return false;
  // large round numbers are usually SKUs or order ids
  if (Number.isInteger(value) && value >= scoring.skuIntegerFloor) return false;
  return true;
}

export function coerceMoneyField(
  field: FieldResult<number>,
  rejectFlag: string,
  scoring: MoneyScoring = DEFAULT_SCORING_CONFIG.money
): { field: FieldResult<number>; flag: string | null } {
  if (field.value === null || isPlausibleAmount(field.value, scoring)) {
    return { field, flag: null };
  }

  console.warn(`⚠️ [MoneyCoercion] Rejected implausible amount ${field.value} (${rejectFlag})`);
  return {
    field: {
      value: null,
      confidence: 0,
      reasoning: `rejected implausible amount ${field.value}`,
      provenance: null,
    },
    flag: rejectFlag,
  };
}
