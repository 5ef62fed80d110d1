// packages/config/src/env.ts
import { parseOptimizeOptions, type OptimizeOptions } from "@pngslim/schemas";
import { readSettings, settingsFile } from "./settings.js";

export type AppConfig = {
  redisUrl: string;
  port: number;
  corsOrigin: string;
  rateLimit: { windowMs: number; max: number };
  uploadLimitBytes: number;
  workerConcurrency: number;
  /** Option overrides from PNGSLIM_* variables, still unvalidated. */
  defaults: Record<string, string>;
};

function intFromEnv(env: NodeJS.ProcessEnv, name: string, fallback: number, min = 0): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) {
    throw new Error(`[config] ${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return n;
}

// PNGSLIM_<KEY> → option key
const OPTION_ENV: Record<string, string> = {
  PNGSLIM_LEVEL: "level",
  PNGSLIM_LOSSY: "lossy",
  PNGSLIM_MODE: "mode",
  PNGSLIM_OPTIMIZER: "optimizer",
  PNGSLIM_DITHERER: "ditherer",
  PNGSLIM_STRIP: "strip",
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const defaults: Record<string, string> = {};
  for (const [name, key] of Object.entries(OPTION_ENV)) {
    const v = env[name];
    if (v !== undefined && v !== "") defaults[key] = v;
  }
  return {
    redisUrl: env.REDIS_URL || "redis://localhost:6379",
    port: intFromEnv(env, "PORT", 4000, 1),
    corsOrigin: env.API_CORS_ORIGIN ?? "*",
    rateLimit: {
      windowMs: intFromEnv(env, "RATE_LIMIT_WINDOW_MS", 60_000, 1),
      max: intFromEnv(env, "RATE_LIMIT_MAX", 300, 1),
    },
    uploadLimitBytes: intFromEnv(env, "UPLOAD_LIMIT_MB", 25, 1) * 1024 * 1024,
    workerConcurrency: intFromEnv(env, "WORKER_CONCURRENCY", 1, 1),
    defaults,
  };
}

/**
 * Effective optimize options: the settings file's `optimize` section, then
 * PNGSLIM_* variables, then the caller's own values.
 */
export async function resolveOptimizeOptions(
  overrides: Record<string, unknown> = {},
  env: NodeJS.ProcessEnv = process.env,
  file?: string
): Promise<OptimizeOptions> {
  const settings = await readSettings(file ?? settingsFile(env));
  const fromFile = settings.optimize;
  const base = fromFile && typeof fromFile === "object" && !Array.isArray(fromFile) ? fromFile : {};
  return parseOptimizeOptions({ ...base, ...loadConfig(env).defaults, ...overrides }, { coerce: true });
}
