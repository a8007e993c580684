import type { FastifyInstance } from "fastify";
import type { HeatmapRanges } from "@core-types";
import type { AppConfig } from "../../config/schema";
import { buildHeatmap, defaultHeatmapRanges } from "../../sweeps/heatmap";
import { buildPayoff } from "../../sweeps/payoff";
import { HeatmapQuerySchema, PayoffQuerySchema, toMarketInputs, toPurchase } from "../query";

export async function sweepRoutes(f: FastifyInstance, opts: { config: AppConfig }) {
  const { defaults, heatmap, payoff } = opts.config;

  f.get("/heatmap", async (req) => {
    const q = HeatmapQuerySchema.parse(req.query);
    const inputs = toMarketInputs(q, defaults);
    const fallback = defaultHeatmapRanges(inputs, heatmap);
    const ranges: HeatmapRanges = {
      volMin: q.volMin ?? fallback.volMin,
      volMax: q.volMax ?? fallback.volMax,
      spotMin: q.spotMin ?? fallback.spotMin,
      spotMax: q.spotMax ?? fallback.spotMax,
    };
    return buildHeatmap(inputs, { ranges, steps: q.steps, purchase: toPurchase(q), config: heatmap });
  });

  f.get("/payoff", async (req) => {
    const q = PayoffQuerySchema.parse(req.query);
    const inputs = toMarketInputs(q, defaults);
    return buildPayoff(inputs, { points: q.points, purchase: toPurchase(q), config: payoff });
  });
}
