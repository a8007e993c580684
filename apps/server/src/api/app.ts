import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import { ZodError } from "zod";
import { isInvalidParameter } from "@bs-core/errors";
import type { AppConfig } from "../config/schema";
import { createLogger } from "../logging/logger";
import { pricingRoutes } from "./routes/pricing";
import { sweepRoutes } from "./routes/sweeps";

const log = createLogger("api");

export async function buildApp(config: AppConfig): Promise<FastifyInstance> {
  const app = Fastify({ logger: config.server.logRequests });
  if (config.server.cors) {
    await app.register(cors, { origin: true });
  }

  app.setErrorHandler(async (err, req, reply) => {
    if (err instanceof ZodError) {
      const issue = err.issues[0];
      return reply.status(400).send({
        error: "InvalidParameter",
        message: issue ? `${issue.path.join(".")}: ${issue.message}` : err.message,
        parameter: issue?.path.join("."),
      });
    }
    if (isInvalidParameter(err)) {
      return reply.status(400).send({ error: "InvalidParameter", message: err.message, parameter: err.parameter });
    }
    log.error(`${req.method} ${req.url} failed:`, err);
    return reply.status(500).send({ error: "Internal", message: "internal error" });
  });

  app.get("/health", async () => ({ ok: true, ts: Date.now() }));
  await app.register(pricingRoutes, { config });
  await app.register(sweepRoutes, { config });

  return app;
}
