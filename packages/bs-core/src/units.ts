// Display-unit helpers. The engine reports vega/rho unscaled and theta per day;
// callers that want other units convert here.

import { DAYS_PER_YEAR, INPUT_FIELDS, INPUT_RANGES, PERCENT, type InputField } from './constants';

/** Rho or vega per one percentage point move (unscaled / 100). */
export function perPercentPoint(x: number): number {
  return x / PERCENT;
}

/** Daily theta back to a per-year figure. */
export function annualizeTheta(dailyTheta: number): number {
  return dailyTheta * DAYS_PER_YEAR;
}

/** Rate entered as a percentage (e.g. 5 for 5%) to the decimal the engine takes. */
export function percentToDecimal(pct: number): number {
  return pct / PERCENT;
}

export interface RangeViolation {
  field: InputField;
  value: number;
  min: number;
  max: number;
}

/**
 * Fields outside the dashboard's widget ranges. Empty when everything fits.
 * Presentation-level check; out-of-range inputs may still be valid for the model.
 */
export function checkInputRanges(values: Partial<Record<InputField, number>>): RangeViolation[] {
  const out: RangeViolation[] = [];
  for (const field of INPUT_FIELDS) {
    const range = INPUT_RANGES[field];
    const value = values[field];
    if (value === undefined) continue;
    if (!(value >= range.min && value <= range.max)) {
      out.push({ field, value, min: range.min, max: range.max });
    }
  }
  return out;
}
