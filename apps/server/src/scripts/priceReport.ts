/**
 * Price Report - terminal view of price, Greeks and optional P&L
 *
 * Usage:
 *   npm run report -- --spot 100 --strike 100 --maturity 1 --rate 0.05 --vol 0.2
 *   npm run report -- --spot 110 --strike 100 --maturity 0.5 --rate-pct 5 --vol 0.25 --purchase-call 12
 */

import { pathToFileURL } from "url";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import type { MarketInputs } from "@core-types";
import { isInvalidParameter } from "@bs-core/errors";
import { percentToDecimal, checkInputRanges } from "@bs-core/units";
import { loadConfig } from "../config/configManager";
import { createLogger } from "../logging/logger";
import { formatQuoteReport } from "../report/quoteReport";

const log = createLogger("report");

export interface ReportArgs {
  spot: number;
  strike: number;
  maturity: number;
  rate?: number;
  ratePct?: number;
  vol: number;
  purchaseCall?: number;
  purchasePut?: number;
}

export function argsToInputs(args: ReportArgs, fallbackRate: number): MarketInputs {
  const riskFreeRate =
    args.ratePct !== undefined ? percentToDecimal(args.ratePct) : args.rate ?? fallbackRate;
  return {
    underlyingPrice: args.spot,
    strikePrice: args.strike,
    timeToMaturity: args.maturity,
    riskFreeRate,
    volatility: args.vol,
  };
}

export async function main(argv: string[]): Promise<number> {
  const { defaults } = loadConfig();
  const args = await yargs(argv)
    .scriptName("price-report")
    .option("spot", { type: "number", default: defaults.underlyingPrice, desc: "underlying price S" })
    .option("strike", { type: "number", default: defaults.strikePrice, desc: "strike K" })
    .option("maturity", { type: "number", default: defaults.timeToMaturity, desc: "time to maturity T (years)" })
    .option("rate", { type: "number", desc: "risk-free rate r (decimal)" })
    .option("rate-pct", { type: "number", desc: "risk-free rate r (percent)" })
    .conflicts("rate", "rate-pct")
    .option("vol", { type: "number", default: defaults.volatility, desc: "volatility sigma (decimal)" })
    .option("purchase-call", { type: "number", desc: "price paid for the call" })
    .option("purchase-put", { type: "number", desc: "price paid for the put" })
    .strict()
    .help()
    .parse();

  const inputs = argsToInputs(args, defaults.riskFreeRate);
  for (const v of checkInputRanges(inputs)) {
    log.warn(`${v.field}=${v.value} outside dashboard range [${v.min}, ${v.max}]`);
  }

  try {
    console.log(formatQuoteReport(inputs, { purchase: { call: args.purchaseCall, put: args.purchasePut } }));
    return 0;
  } catch (err) {
    if (isInvalidParameter(err)) {
      console.error(err.message);
      return 1;
    }
    throw err;
  }
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main(hideBin(process.argv)).then(
    (code) => process.exit(code),
    (err: unknown) => {
      log.error("FATAL:", err);
      process.exit(1);
    },
  );
}
