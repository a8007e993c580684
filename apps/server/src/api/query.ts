import { z } from "zod";
import type { MarketInputs, PurchasePrices } from "@core-types";

const num = z.coerce.number();

// Short names as the dashboard sends them; omitted fields fall back to the configured defaults.
export const MarketQuerySchema = z.object({
  S: num.optional(),
  K: num.optional(),
  T: num.optional(),
  r: num.optional(),
  sigma: num.optional(),
});

export const PurchaseQuerySchema = z.object({
  purchaseCall: num.optional(),
  purchasePut: num.optional(),
});

export const GreekQuerySchema = MarketQuerySchema.extend({
  name: z.string(),
  kind: z.string().default("call"),
});

export const HeatmapQuerySchema = MarketQuerySchema.merge(PurchaseQuerySchema).extend({
  volMin: num.optional(),
  volMax: num.optional(),
  spotMin: num.optional(),
  spotMax: num.optional(),
  steps: z.coerce.number().int().min(2).max(200).optional(),
});

export const PayoffQuerySchema = MarketQuerySchema.merge(PurchaseQuerySchema).extend({
  points: z.coerce.number().int().min(2).max(2000).optional(),
});

export type MarketQuery = z.infer<typeof MarketQuerySchema>;

export function toMarketInputs(q: MarketQuery, defaults: MarketInputs): MarketInputs {
  return {
    underlyingPrice: q.S ?? defaults.underlyingPrice,
    strikePrice: q.K ?? defaults.strikePrice,
    timeToMaturity: q.T ?? defaults.timeToMaturity,
    riskFreeRate: q.r ?? defaults.riskFreeRate,
    volatility: q.sigma ?? defaults.volatility,
  };
}

export function toPurchase(q: z.infer<typeof PurchaseQuerySchema>): PurchasePrices {
  return { call: q.purchaseCall, put: q.purchasePut };
}
