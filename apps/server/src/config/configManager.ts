import "dotenv/config";
import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import YAML from "yaml";
import { AppConfigSchema, type AppConfig } from "./schema";

function deepFreeze<T>(obj: T): T {
  Object.freeze(obj);
  if (obj && typeof obj === "object") {
    for (const val of Object.values(obj)) {
      if (val && typeof val === "object" && !Object.isFrozen(val)) {
        deepFreeze(val);
      }
    }
  }
  return obj;
}

let cached: AppConfig | null = null;

const HERE = path.dirname(fileURLToPath(import.meta.url));
const REPO_ROOT = path.resolve(HERE, "..", "..", "..", "..");

function resolveConfigPath(preferred: string): string {
  const candidates = [
    preferred,
    path.resolve(process.cwd(), preferred),
    path.join(REPO_ROOT, preferred),
    path.join(REPO_ROOT, "config", "default.yaml"),
  ];

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }

  throw new Error(
    `Unable to locate configuration file. Tried: ${candidates.join(", ")}`
  );
}

function envPort(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  const port = Number(raw);
  return Number.isInteger(port) ? port : undefined;
}

/** Parse a YAML document into a validated config. PORT / HOST env vars override `server`. */
export function parseConfig(raw: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = AppConfigSchema.parse(YAML.parse(raw));
  return {
    ...parsed,
    server: {
      ...parsed.server,
      host: env.HOST?.trim() || parsed.server.host,
      port: envPort(env.PORT) ?? parsed.server.port,
    },
  };
}

export function loadConfig(configPath = process.env.PRICER_CONFIG ?? "config/default.yaml"): AppConfig {
  if (cached) return cached;

  const resolved = resolveConfigPath(configPath);
  const raw = fs.readFileSync(resolved, "utf-8");
  cached = deepFreeze(parseConfig(raw));
  return cached;
}

export function resetConfigCache() {
  cached = null;
}
