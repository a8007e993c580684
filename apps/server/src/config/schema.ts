import { z } from "zod";

export const ServerSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(0).max(65535),
  cors: z.boolean(),
  logRequests: z.boolean(),
});

export const DefaultsSchema = z.object({
  underlyingPrice: z.number().positive(),
  strikePrice: z.number().positive(),
  timeToMaturity: z.number().nonnegative(),
  riskFreeRate: z.number(),
  volatility: z.number().positive(),
});

export const HeatmapSchema = z.object({
  steps: z.number().int().min(2).max(200),
  volSpan: z.number().positive(),
  volFloor: z.number().positive(),
  spotSpanPct: z.number().positive().lt(1),
});

export const PayoffSchema = z.object({
  points: z.number().int().min(2).max(2000),
  spanPct: z.number().positive().lt(1),
});

export const AppConfigSchema = z.object({
  server: ServerSchema,
  defaults: DefaultsSchema,
  heatmap: HeatmapSchema,
  payoff: PayoffSchema,
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type HeatmapConfig = z.infer<typeof HeatmapSchema>;
export type PayoffConfig = z.infer<typeof PayoffSchema>;
