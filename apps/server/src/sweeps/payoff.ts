// Value at expiry across a spot window: each point priced through the engine with T = 0.

import type { MarketInputs, OptionKind, PayoffCurve, PurchasePrices } from "@core-types";
import { InvalidParameterError } from "@bs-core/errors";
import { OptionSnapshot } from "@bs-core/snapshot";
import type { PayoffConfig } from "../config/schema";
import { linspace } from "./grid";
import { applyPnl } from "./pnl";

export const DEFAULT_PAYOFF: PayoffConfig = { points: 100, spanPct: 0.5 };

export interface PayoffOptions {
  points?: number;
  purchase?: PurchasePrices;
  config?: PayoffConfig;
}

/** Spot where the expiry P&L crosses zero for a purchase price. */
export function breakeven(strike: number, purchase: number, kind: OptionKind): number {
  return kind === "call" ? strike + purchase : strike - purchase;
}

export function buildPayoff(inputs: MarketInputs, opts: PayoffOptions = {}): PayoffCurve {
  const expiry = OptionSnapshot.create(inputs).with({ timeToMaturity: 0 });
  const cfg = opts.config ?? DEFAULT_PAYOFF;
  const points = opts.points ?? cfg.points;
  if (!Number.isInteger(points) || points < 2) {
    throw new InvalidParameterError("points", points, "must be an integer >= 2");
  }

  const S = inputs.underlyingPrice;
  const spots = linspace(S * (1 - cfg.spanPct), S * (1 + cfg.spanPct), points);
  const atExpiry = spots.map((underlyingPrice) => expiry.with({ underlyingPrice }));
  let call = atExpiry.map((snap) => snap.price("call"));
  let put = atExpiry.map((snap) => snap.price("put"));

  const purchase = opts.purchase ?? {};
  if (purchase.call !== undefined) call = applyPnl(call, purchase.call);
  if (purchase.put !== undefined) put = applyPnl(put, purchase.put);

  return {
    spots,
    call,
    put,
    pnl: purchase.call !== undefined || purchase.put !== undefined,
  };
}
