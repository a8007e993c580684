import type { MarketInputs } from '@core-types';

// Theta is reported per calendar day; fixed divisor, no leap-year or trading-day basis.
export const DAYS_PER_YEAR = 365;

// Display scale for "per 1%" rho / vega.
export const PERCENT = 100;

export interface Range {
  min: number;
  max: number;
}

export type InputField = keyof MarketInputs | 'purchasePrice';

export const INPUT_FIELDS: readonly InputField[] = [
  'underlyingPrice',
  'strikePrice',
  'timeToMaturity',
  'volatility',
  'riskFreeRate',
  'purchasePrice',
];

// Widget ranges of the dashboard. The engine itself accepts anything valid for the model.
export const INPUT_RANGES: Readonly<Record<InputField, Range>> = {
  underlyingPrice: { min: 1, max: 10_000 },
  strikePrice:     { min: 1, max: 10_000 },
  timeToMaturity:  { min: 0.01, max: 10 },
  volatility:      { min: 0.01, max: 2.0 },
  riskFreeRate:    { min: 0, max: 0.2 },
  purchasePrice:   { min: 0, max: 1_000 },
};

