import { config as loadEnv } from "dotenv";
import { z } from "zod";
import path from "path";
import { fileURLToPath } from "url";

// Load .env from apps/backend directory, regardless of process.cwd()
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
export const backendRoot = path.resolve(__dirname, "..");
const envPath = path.resolve(backendRoot, ".env");
const envResult = loadEnv({ path: envPath });

if (envResult.error && process.env.NODE_ENV !== "test") {
  console.warn(`[config] No .env loaded from ${envPath}:`, envResult.error.message);
}

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(4000),
  BIND_HOST: z.string().default("127.0.0.1"),
  SQLITE_DB: z.string().default("data/study-slots.db"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  // Experiment revision; part of every slot key unless a quota opts out
  EXPERIMENT_VERSION: z.string().min(1).default("1"),
  // Inactivity window after which a running session counts as expired (24h)
  SESSION_TIMEOUT_SEC: z.coerce.number().int().positive().default(86400),
  QUOTA_CONFIG_PATH: z.string().default("config/quotas.json"),
  GRACEFUL_SHUTDOWN_MS: z.coerce.number().int().positive().default(10000),
});

const parsed = envSchema.parse(process.env);

export const runtimeConfig = {
  env: parsed.NODE_ENV,
  port: parsed.PORT,
  bindHost: parsed.BIND_HOST,
  sqlitePath: parsed.SQLITE_DB,
  logLevel: parsed.LOG_LEVEL,
  experimentVersion: parsed.EXPERIMENT_VERSION,
  sessionTimeoutMs: parsed.SESSION_TIMEOUT_SEC * 1000,
  quotaConfigPath: path.isAbsolute(parsed.QUOTA_CONFIG_PATH)
    ? parsed.QUOTA_CONFIG_PATH
    : path.resolve(backendRoot, parsed.QUOTA_CONFIG_PATH),
  gracefulShutdownMs: parsed.GRACEFUL_SHUTDOWN_MS,
};

export type RuntimeConfig = typeof runtimeConfig;
