import type { FastifyInstance } from "fastify";
import { OptionSnapshot } from "@bs-core/snapshot";
import { parseGreekName, parseOptionKind } from "@bs-core/pricing";
import type { AppConfig } from "../../config/schema";
import { GreekQuerySchema, MarketQuerySchema, toMarketInputs } from "../query";

export async function pricingRoutes(f: FastifyInstance, opts: { config: AppConfig }) {
  const defaults = opts.config.defaults;

  f.get("/price", async (req) => {
    const inputs = toMarketInputs(MarketQuerySchema.parse(req.query), defaults);
    const snap = OptionSnapshot.create(inputs);
    return {
      inputs,
      call: snap.quote("call"),
      put: snap.quote("put"),
      parity: {
        gap: snap.parityGap(),
        expected: inputs.underlyingPrice - inputs.strikePrice * Math.exp(-inputs.riskFreeRate * inputs.timeToMaturity),
      },
    };
  });

  f.get("/greek", async (req) => {
    const q = GreekQuerySchema.parse(req.query);
    const name = parseGreekName(q.name);
    const kind = parseOptionKind(q.kind);
    const snap = OptionSnapshot.create(toMarketInputs(q, defaults));
    return { name, kind, value: snap.greek(name, kind) };
  });
}
