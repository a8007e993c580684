// Terminal rendering of the dashboard's headline numbers.

import type { MarketInputs, PurchasePrices } from "@core-types";
import { OptionSnapshot } from "@bs-core/snapshot";
import { assertPurchasePrice, pnlOf } from "../sweeps/pnl";

// Display precision per figure, as the dashboard shows them.
export const DECIMALS = {
  price: 2,
  delta: 4,
  gamma: 6,
  vega: 2,
  theta: 4,
  rho: 2,
} as const;

export function signed(x: number, dp: number): string {
  const s = x.toFixed(dp);
  return x > 0 ? `+${s}` : s;
}

export interface ReportOptions {
  purchase?: PurchasePrices;
}

export function formatQuoteReport(inputs: MarketInputs, opts: ReportOptions = {}): string {
  const snap = OptionSnapshot.create(inputs);
  const call = snap.quote("call");
  const put = snap.quote("put");
  const purchase = opts.purchase ?? {};
  if (purchase.call !== undefined) assertPurchasePrice(purchase.call);
  if (purchase.put !== undefined) assertPurchasePrice(purchase.put);

  const priceLine = (label: string, price: number, paid: number | undefined) =>
    paid === undefined
      ? `  ${label.padEnd(6)} $${price.toFixed(DECIMALS.price)}`
      : `  ${label.padEnd(6)} $${price.toFixed(DECIMALS.price)}  P&L ${signed(pnlOf(price, paid), DECIMALS.price)}`;

  const lines = [
    "=".repeat(50),
    "BLACK-SCHOLES EUROPEAN OPTION",
    "=".repeat(50),
    `  S=${inputs.underlyingPrice}  K=${inputs.strikePrice}  T=${inputs.timeToMaturity}y  ` +
      `r=${(inputs.riskFreeRate * 100).toFixed(2)}%  σ=${inputs.volatility.toFixed(2)}`,
    "",
    "PRICES",
    priceLine("Call", call.price, purchase.call),
    priceLine("Put", put.price, purchase.put),
    "",
    "GREEKS",
    `  Delta (Call)  ${call.greeks.delta.toFixed(DECIMALS.delta)}`,
    `  Delta (Put)   ${put.greeks.delta.toFixed(DECIMALS.delta)}`,
    `  Gamma         ${call.greeks.gamma.toFixed(DECIMALS.gamma)}`,
    `  Vega          ${call.greeks.vega.toFixed(DECIMALS.vega)}`,
    `  Theta (Call)  ${call.greeks.theta.toFixed(DECIMALS.theta)}`,
    `  Theta (Put)   ${put.greeks.theta.toFixed(DECIMALS.theta)}`,
    `  Rho (Call)    ${call.greeks.rho.toFixed(DECIMALS.rho)}`,
    `  Rho (Put)     ${put.greeks.rho.toFixed(DECIMALS.rho)}`,
    "=".repeat(50),
  ];
  return lines.join("\n");
}
