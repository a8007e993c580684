/**
 * Price × volatility sensitivity grid. Every cell is an independent snapshot
 * (spot and vol replaced, strike / maturity / rate held), so the grid is
 * evaluated as one flat batch.
 */

import type { HeatmapGrid, HeatmapRanges, MarketInputs, PurchasePrices } from "@core-types";
import { INPUT_RANGES, type Range } from "@bs-core/constants";
import { InvalidParameterError } from "@bs-core/errors";
import { OptionSnapshot } from "@bs-core/snapshot";
import type { HeatmapConfig } from "../config/schema";
import { evaluateGrid, linspace } from "./grid";
import { applyPnlGrid } from "./pnl";

export const DEFAULT_HEATMAP: HeatmapConfig = {
  steps: 20,
  volSpan: 0.3,
  volFloor: 0.05,
  spotSpanPct: 0.3,
};

/** Window centred on the current inputs, kept inside the dashboard's widget ranges. */
export function defaultHeatmapRanges(inputs: MarketInputs, cfg: HeatmapConfig = DEFAULT_HEATMAP): HeatmapRanges {
  const vol = INPUT_RANGES.volatility;
  const spot = INPUT_RANGES.underlyingPrice;
  const sigma = inputs.volatility;
  const S = inputs.underlyingPrice;
  return {
    volMin: Math.max(cfg.volFloor, sigma - cfg.volSpan),
    volMax: Math.min(vol.max, sigma + cfg.volSpan),
    spotMin: Math.max(spot.min, S * (1 - cfg.spotSpanPct)),
    spotMax: Math.min(spot.max, S * (1 + cfg.spotSpanPct)),
  };
}

function checkAxis(name: string, lo: number, hi: number, bounds: Range): void {
  for (const [label, v] of [[`${name}Min`, lo], [`${name}Max`, hi]] as const) {
    if (!Number.isFinite(v) || v < bounds.min || v > bounds.max) {
      throw new InvalidParameterError(label, v, `must be within [${bounds.min}, ${bounds.max}]`);
    }
  }
  if (!(lo < hi)) {
    throw new InvalidParameterError(`${name}Min`, lo, `must be below ${name}Max (${hi})`);
  }
}

export function assertHeatmapRanges(ranges: HeatmapRanges): void {
  checkAxis("vol", ranges.volMin, ranges.volMax, INPUT_RANGES.volatility);
  checkAxis("spot", ranges.spotMin, ranges.spotMax, INPUT_RANGES.underlyingPrice);
}

export interface HeatmapOptions {
  ranges?: HeatmapRanges;
  steps?: number;
  purchase?: PurchasePrices;
  config?: HeatmapConfig;
}

export function buildHeatmap(inputs: MarketInputs, opts: HeatmapOptions = {}): HeatmapGrid {
  const base = OptionSnapshot.create(inputs);
  const cfg = opts.config ?? DEFAULT_HEATMAP;
  const ranges = opts.ranges ?? defaultHeatmapRanges(inputs, cfg);
  assertHeatmapRanges(ranges);
  const steps = opts.steps ?? cfg.steps;
  if (!Number.isInteger(steps) || steps < 2) {
    throw new InvalidParameterError("steps", steps, "must be an integer >= 2");
  }

  const vols = linspace(ranges.volMin, ranges.volMax, steps);
  const spots = linspace(ranges.spotMin, ranges.spotMax, steps);

  const cells = evaluateGrid(vols, spots, (volatility, underlyingPrice) => {
    const snap = base.with({ underlyingPrice, volatility });
    return { call: snap.price("call"), put: snap.price("put") };
  });
  let call = cells.map((row) => row.map((c) => c.call));
  let put = cells.map((row) => row.map((c) => c.put));

  const purchase = opts.purchase ?? {};
  if (purchase.call !== undefined) call = applyPnlGrid(call, purchase.call);
  if (purchase.put !== undefined) put = applyPnlGrid(put, purchase.put);

  return {
    spots,
    vols,
    call,
    put,
    pnl: purchase.call !== undefined || purchase.put !== undefined,
  };
}
