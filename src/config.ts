import { config as loadEnv } from "dotenv";
import { z } from "zod";
import path from "path";
import { fileURLToPath } from "url";

const boolFromEnv = (defaultValue: boolean) =>
  z.preprocess((value) => {
    if (typeof value === "boolean") return value;
    if (typeof value === "number") return value !== 0;
    if (typeof value === "string") {
      const normalized = value.trim().toLowerCase();
      if (normalized === "") return undefined;
      if (["true", "1", "yes", "y", "on"].includes(normalized)) return true;
      if (["false", "0", "no", "n", "off"].includes(normalized)) return false;
    }
    return value;
  }, z.boolean().default(defaultValue));

// Load .env from the project root, regardless of process.cwd()
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const envPath = path.resolve(__dirname, "../.env");
const envResult = loadEnv({ path: envPath });

if (envResult.error && "code" in envResult.error && envResult.error.code !== "ENOENT") {
  console.warn(`[config] Failed to load .env from ${envPath}:`, envResult.error.message);
}

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  BIND_HOST: z.string().default("0.0.0.0"),
  // Read-only catalog file produced by the crawler + embedding pipeline
  CATALOG_DB_PATH: z.string().min(1).default("shl_products.db"),
  // false: start anyway and report 503 on /api/v1/health until restarted
  CATALOG_REQUIRE_ON_START: boolFromEnv(true),
  CORS_ALLOW_ORIGIN: z.string().default("*"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  GRACEFUL_SHUTDOWN_MS: z.coerce.number().int().positive().default(10000),
});

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env) {
  const parsed = envSchema.parse(env);

  return {
    port: parsed.PORT,
    bindHost: parsed.BIND_HOST,
    catalogDbPath: parsed.CATALOG_DB_PATH,
    catalogRequireOnStart: parsed.CATALOG_REQUIRE_ON_START,
    corsAllowOrigin: parsed.CORS_ALLOW_ORIGIN,
    logLevel: parsed.LOG_LEVEL,
    gracefulShutdownMs: parsed.GRACEFUL_SHUTDOWN_MS,
  };
}

export type RuntimeConfig = ReturnType<typeof loadRuntimeConfig>;

export const runtimeConfig: RuntimeConfig = loadRuntimeConfig();
