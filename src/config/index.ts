/**
 * Centralized configuration loaded from environment variables.
 * Uses zod for runtime validation.
 */

import { z } from "zod";
import dotenv from "dotenv";
import { ConfigurationMissingError } from "../utils/errors.js";

dotenv.config();

const WindowListSchema = z
  .string()
  .transform((raw) =>
    raw
      .split(",")
      .map((s) => s.trim())
      .filter((s) => s.length > 0)
      .map(Number)
  )
  .pipe(z.array(z.number().int().min(2)).min(1));

const ConfigSchema = z.object({
  // MarketData provider
  marketData: z.object({
    apiKey: z.string().optional(),
    baseUrl: z.string().url().default("https://api.marketdata.app/v1"),
    timeoutMs: z.coerce.number().int().positive().default(30_000),
  }),

  // Retry policy shared by every provider call
  retry: z.object({
    maxAttempts: z.coerce.number().int().min(1).default(5),
    baseDelayMs: z.coerce.number().min(0).default(1_000),
    rateLimitMultiplier: z.coerce.number().min(1).default(1.5),
  }),

  // Quote batching
  quotes: z.object({
    chunkSize: z.coerce.number().int().positive().default(20),
    maxSymbols: z.coerce.number().int().positive().default(80),
  }),

  // Scan worker pool + ranking
  scan: z.object({
    maxConcurrent: z.coerce.number().int().positive().default(4),
    minTimeMs: z.coerce.number().min(0).default(250),
    top: z.coerce.number().int().positive().default(50),
    maxUnscored: z.coerce.number().int().min(0).default(10),
  }),

  // Realized volatility
  rv: z.object({
    windows: WindowListSchema.default("20,60"),
    defaultWindow: z.coerce.number().int().min(2).default(20),
    /** Which stored RV rows scans read: rolling backfill (population) or snapshot (sample) */
    scanVariance: z.enum(["population", "sample"]).default("population"),
    tradingDays: z.coerce.number().positive().default(252),
    maxAgeDays: z.coerce.number().int().min(0).default(7),
    lookbackDays: z.coerce.number().int().positive().default(730),
  }),

  // Storage
  dataDir: z.string().default("data"),
  universeCsv: z.string().default("sp500.csv"),

  // System
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  port: z.coerce.number().default(8000),
});

export type Config = z.infer<typeof ConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw = {
    marketData: {
      apiKey: env.MARKETDATA_API_KEY?.trim() || undefined,
      baseUrl: env.MARKETDATA_BASE_URL,
      timeoutMs: env.PROVIDER_TIMEOUT_MS,
    },
    retry: {
      maxAttempts: env.RETRY_MAX_ATTEMPTS,
      baseDelayMs: env.RETRY_BASE_DELAY_MS,
      rateLimitMultiplier: env.RETRY_RATE_LIMIT_MULTIPLIER,
    },
    quotes: {
      chunkSize: env.QUOTE_CHUNK_SIZE,
      maxSymbols: env.QUOTE_MAX_SYMBOLS,
    },
    scan: {
      maxConcurrent: env.SCAN_MAX_CONCURRENT,
      minTimeMs: env.SCAN_MIN_TIME_MS,
      top: env.SCAN_TOP,
      maxUnscored: env.SCAN_MAX_UNSCORED,
    },
    rv: {
      windows: env.RV_WINDOWS,
      defaultWindow: env.RV_DEFAULT_WINDOW,
      scanVariance: env.RV_SCAN_VARIANCE,
      tradingDays: env.RV_TRADING_DAYS,
      maxAgeDays: env.RV_MAX_AGE_DAYS,
      lookbackDays: env.BACKFILL_LOOKBACK_DAYS,
    },
    dataDir: env.DATA_DIR,
    universeCsv: env.UNIVERSE_CSV,
    logLevel: env.LOG_LEVEL,
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
  };

  return ConfigSchema.parse(raw);
}

/**
 * The provider token is optional at load time so that offline commands
 * (universe refresh, reading stored RV) still start without it.
 */
export function requireApiKey(cfg: Config = config): string {
  const key = cfg.marketData.apiKey;
  if (!key) {
    throw new ConfigurationMissingError("MARKETDATA_API_KEY");
  }
  return key;
}

/** Singleton config instance */
export const config = loadConfig();
