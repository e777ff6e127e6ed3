// States without a statewide sales tax
import type { FieldResult } from '@/types/extraction';

export const NO_SALES_TAX_STATES: ReadonlySet<string> = new Set(['AK', 'DE', 'MT', 'NH', 'OR']);

export function normalizeState(state: string | null | undefined): string | null {
  const trimmed = state?.trim().toUpperCase();
  return trimmed ? trimmed : null;
}

/**
 * Drops the tax field for businesses in a no-sales-tax state. Returns the
 * field unchanged and no flag otherwise.
 */
export function applySalesTaxStateRule(
  tax: FieldResult<number>,
  businessState: string | null | undefined
): { tax: FieldResult<number>; flag: string | null } {
  const state = normalizeState(businessState);
  if (!state || !NO_SALES_TAX_STATES.has(state)) {
    return { tax, flag: null };
  }

  return {
    tax: {
      value: null,
      confidence: 0,
      reasoning: `business state ${state} has no statewide sales tax`,
      provenance: null,
    },
    flag: 'NO_SALES_TAX_STATE',
  };
}
