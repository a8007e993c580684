import { pathToFileURL } from "url";
import { buildApp } from "./api/app";
import { loadConfig } from "./config/configManager";
import { createLogger } from "./logging/logger";

const log = createLogger("server");

export async function startServer() {
  const config = loadConfig();
  const { host, port } = config.server;
  log.info(`HOST=${host} PORT=${port} LOG_LEVEL=${process.env.LOG_LEVEL ?? "info"}`);

  const app = await buildApp(config);

  const shutdown = (signal: string) => {
    log.info(`${signal} received, closing`);
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error("close failed:", err);
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  await app.listen({ port, host });
  log.info(`pricer up http://${host}:${port}`);
  return app;
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  startServer().catch((err: unknown) => {
    log.error("FATAL:", err);
    process.exit(1);
  });
}
