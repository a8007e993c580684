import type { GreekName, MarketInputs, OptionKind } from '@core-types';
import { InvalidParameterError } from './errors';
import { OptionSnapshot } from './snapshot';

export const OPTION_KINDS: readonly OptionKind[] = ['call', 'put'];
export const GREEK_NAMES: readonly GreekName[] = ['delta', 'gamma', 'vega', 'theta', 'rho'];

/** Case-insensitive "call" / "put". */
export function parseOptionKind(text: string): OptionKind {
  const norm = text.trim().toLowerCase();
  const kind = OPTION_KINDS.find((k) => k === norm);
  if (!kind) throw new InvalidParameterError('kind', text, 'option type must be "call" or "put"');
  return kind;
}

export function parseGreekName(text: string): GreekName {
  const norm = text.trim().toLowerCase();
  const name = GREEK_NAMES.find((g) => g === norm);
  if (!name) throw new InvalidParameterError('greek', text, `expected one of ${GREEK_NAMES.join(', ')}`);
  return name;
}

/** Payoff at expiry. */
export function intrinsicValue(S: number, K: number, kind: OptionKind): number {
  return kind === 'call' ? Math.max(0, S - K) : Math.max(0, K - S);
}

export function priceOption(inputs: MarketInputs, kind: OptionKind): number {
  return OptionSnapshot.create(inputs).price(kind);
}

export function optionGreek(inputs: MarketInputs, name: GreekName, kind: OptionKind): number {
  return OptionSnapshot.create(inputs).greek(name, kind);
}
