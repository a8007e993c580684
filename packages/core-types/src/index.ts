export type OptionKind = 'call' | 'put';

export type GreekName = 'delta' | 'gamma' | 'vega' | 'theta' | 'rho';

/** The five scalars a Black-Scholes valuation is a function of. */
export interface MarketInputs {
  underlyingPrice: number; // S
  strikePrice: number;     // K
  timeToMaturity: number;  // T, years
  riskFreeRate: number;    // r, continuously compounded (decimal)
  volatility: number;      // sigma, annualized (decimal)
}

export interface GreekSet {
  delta: number;
  gamma: number;
  vega: number;   // per unit of vol (1.0 = 100%)
  theta: number;  // per calendar day
  rho: number;    // per unit of rate
}

export interface OptionQuote {
  kind: OptionKind;
  price: number;
  greeks: GreekSet;
}

export interface HeatmapRanges {
  volMin: number;
  volMax: number;
  spotMin: number;
  spotMax: number;
}

// Rows are indexed by vol, columns by spot.
export interface HeatmapGrid {
  spots: number[];
  vols: number[];
  call: number[][];
  put: number[][];
  pnl: boolean;
}

export interface PayoffCurve {
  spots: number[];
  call: number[];
  put: number[];
  pnl: boolean;
}

export interface PurchasePrices {
  call?: number;
  put?: number;
}
