// P&L overlay: option value minus what was paid for it. Display arithmetic only.

import { INPUT_RANGES } from "@bs-core/constants";
import { InvalidParameterError } from "@bs-core/errors";

export function assertPurchasePrice(purchase: number): void {
  const { min, max } = INPUT_RANGES.purchasePrice;
  if (!Number.isFinite(purchase) || purchase < min || purchase > max) {
    throw new InvalidParameterError("purchasePrice", purchase, `must be within [${min}, ${max}]`);
  }
}

export function pnlOf(value: number, purchase: number): number {
  return value - purchase;
}

export function applyPnl(values: readonly number[], purchase: number): number[] {
  assertPurchasePrice(purchase);
  return values.map((v) => pnlOf(v, purchase));
}

export function applyPnlGrid(grid: readonly (readonly number[])[], purchase: number): number[][] {
  assertPurchasePrice(purchase);
  return grid.map((row) => row.map((v) => pnlOf(v, purchase)));
}
