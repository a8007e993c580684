/**
 * Black-Scholes-Merton snapshot (European, no dividend yield).
 * Conventions:
 *  - Vega: per absolute vol unit (1.0 = 100% vol)
 *  - Theta: per calendar day (annual / 365)
 *  - Rho: per absolute rate unit (1.0 = 100%)
 */

import type { GreekName, GreekSet, MarketInputs, OptionKind, OptionQuote } from '@core-types';
import { DAYS_PER_YEAR } from './constants';
import { InvalidParameterError } from './errors';
import { normCdf, normPdf } from './normal';

/** Terms shared by every price and Greek of one snapshot. Absent at expiry. */
export interface BlackScholesTerms {
  d1: number;
  d2: number;
  sqrtT: number;
  discount: number; // e^(-rT)
}

function requireFinite(parameter: keyof MarketInputs, value: number): void {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidParameterError(parameter, value, 'must be a finite number');
  }
}

function requirePositive(parameter: keyof MarketInputs, value: number): void {
  requireFinite(parameter, value);
  if (value <= 0) {
    throw new InvalidParameterError(parameter, value, 'must be > 0');
  }
}

export function assertValidInputs(inputs: MarketInputs): void {
  requirePositive('underlyingPrice', inputs.underlyingPrice);
  requirePositive('strikePrice', inputs.strikePrice);
  requireFinite('timeToMaturity', inputs.timeToMaturity);
  if (inputs.timeToMaturity < 0) {
    throw new InvalidParameterError('timeToMaturity', inputs.timeToMaturity, 'must be >= 0');
  }
  requireFinite('riskFreeRate', inputs.riskFreeRate);
  requirePositive('volatility', inputs.volatility);
}

function computeTerms(S: number, K: number, T: number, r: number, sigma: number): BlackScholesTerms | null {
  if (T <= 0) return null;
  const sqrtT = Math.sqrt(T);
  const volT = sigma * sqrtT;
  const d1 = (Math.log(S / K) + (r + 0.5 * sigma * sigma) * T) / volT;
  return { d1, d2: d1 - volT, sqrtT, discount: Math.exp(-r * T) };
}

function unknownKind(kind: never): never {
  throw new InvalidParameterError('kind', kind, 'expected "call" or "put"');
}

/**
 * Immutable market state for one valuation. d1/d2 are computed once at
 * construction and shared by every price and Greek read from it.
 */
export class OptionSnapshot implements MarketInputs {
  readonly underlyingPrice: number;
  readonly strikePrice: number;
  readonly timeToMaturity: number;
  readonly riskFreeRate: number;
  readonly volatility: number;
  readonly terms: Readonly<BlackScholesTerms> | null;

  constructor(S: number, K: number, T: number, r: number, sigma: number) {
    assertValidInputs({ underlyingPrice: S, strikePrice: K, timeToMaturity: T, riskFreeRate: r, volatility: sigma });
    this.underlyingPrice = S;
    this.strikePrice = K;
    this.timeToMaturity = T;
    this.riskFreeRate = r;
    this.volatility = sigma;
    const terms = computeTerms(S, K, T, r, sigma);
    this.terms = terms ? Object.freeze(terms) : null;
    Object.freeze(this);
  }

  static create(inputs: MarketInputs): OptionSnapshot {
    return new OptionSnapshot(
      inputs.underlyingPrice,
      inputs.strikePrice,
      inputs.timeToMaturity,
      inputs.riskFreeRate,
      inputs.volatility,
    );
  }

  /** Copy with some inputs replaced; validated like any other snapshot. */
  with(overrides: Partial<MarketInputs>): OptionSnapshot {
    return OptionSnapshot.create({ ...this.toInputs(), ...overrides });
  }

  toInputs(): MarketInputs {
    return {
      underlyingPrice: this.underlyingPrice,
      strikePrice: this.strikePrice,
      timeToMaturity: this.timeToMaturity,
      riskFreeRate: this.riskFreeRate,
      volatility: this.volatility,
    };
  }

  get expired(): boolean {
    return this.terms === null;
  }

  price(kind: OptionKind): number {
    const S = this.underlyingPrice;
    const K = this.strikePrice;
    const t = this.terms;
    switch (kind) {
      case 'call':
        return t ? S * normCdf(t.d1) - K * t.discount * normCdf(t.d2) : Math.max(0, S - K);
      case 'put':
        return t ? K * t.discount * normCdf(-t.d2) - S * normCdf(-t.d1) : Math.max(0, K - S);
      default:
        return unknownKind(kind);
    }
  }

  delta(kind: OptionKind): number {
    const S = this.underlyingPrice;
    const K = this.strikePrice;
    const t = this.terms;
    switch (kind) {
      case 'call':
        return t ? normCdf(t.d1) : S > K ? 1 : 0;
      case 'put':
        return t ? normCdf(t.d1) - 1 : S < K ? -1 : 0;
      default:
        return unknownKind(kind);
    }
  }

  /** Same for call and put. */
  gamma(): number {
    const t = this.terms;
    if (!t) return 0;
    return normPdf(t.d1) / (this.underlyingPrice * this.volatility * t.sqrtT);
  }

  /** Same for call and put. */
  vega(): number {
    const t = this.terms;
    if (!t) return 0;
    return this.underlyingPrice * normPdf(t.d1) * t.sqrtT;
  }

  theta(kind: OptionKind): number {
    const t = this.terms;
    if (!t) return 0;
    const decay = (-this.underlyingPrice * normPdf(t.d1) * this.volatility) / (2 * t.sqrtT);
    const carry = this.riskFreeRate * this.strikePrice * t.discount;
    switch (kind) {
      case 'call':
        return (decay - carry * normCdf(t.d2)) / DAYS_PER_YEAR;
      case 'put':
        return (decay + carry * normCdf(-t.d2)) / DAYS_PER_YEAR;
      default:
        return unknownKind(kind);
    }
  }

  rho(kind: OptionKind): number {
    const t = this.terms;
    if (!t) return 0;
    const kt = this.strikePrice * this.timeToMaturity * t.discount;
    switch (kind) {
      case 'call':
        return kt * normCdf(t.d2);
      case 'put':
        return -kt * normCdf(-t.d2);
      default:
        return unknownKind(kind);
    }
  }

  /** Gamma and vega ignore `kind`. */
  greek(name: GreekName, kind: OptionKind): number {
    switch (name) {
      case 'delta':
        return this.delta(kind);
      case 'gamma':
        return this.gamma();
      case 'vega':
        return this.vega();
      case 'theta':
        return this.theta(kind);
      case 'rho':
        return this.rho(kind);
      default: {
        const unknown: never = name;
        throw new InvalidParameterError('greek', unknown, 'expected delta, gamma, vega, theta or rho');
      }
    }
  }

  greeks(kind: OptionKind): GreekSet {
    return {
      delta: this.delta(kind),
      gamma: this.gamma(),
      vega: this.vega(),
      theta: this.theta(kind),
      rho: this.rho(kind),
    };
  }

  quote(kind: OptionKind): OptionQuote {
    return { kind, price: this.price(kind), greeks: this.greeks(kind) };
  }

  /** call - put; equals S - K·e^(-rT) for any valid snapshot. */
  parityGap(): number {
    return this.price('call') - this.price('put');
  }
}
