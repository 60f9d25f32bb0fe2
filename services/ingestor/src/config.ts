import { TIMEFRAME_IDS } from "@candle-tape/candle-primitives";
import { z } from "zod";

const isoTimestamp = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), "Expected an ISO-8601 timestamp")
  .transform((value) => Date.parse(value));

const configSchema = z.object({
  BYBIT_BASE_URL: z.string().url().default("https://api.bybit.com"),
  BYBIT_CATEGORY: z.enum(["spot", "linear", "inverse"]).default("spot"),
  CANDLE_SOURCE: z.enum(["bybit", "synthetic"]).default("bybit"),
  STORAGE_ROOT: z.string().min(1).default("data/ohlcv"),
  DEFAULT_TIMEFRAME: z.enum(TIMEFRAME_IDS).default("1h"),
  BACKFILL_START: isoTimestamp.default("2020-01-01T00:00:00Z"),
  PAGE_LIMIT: z.coerce.number().int().min(1).max(1000).default(1000),
  // Bybit allows 600 requests per 5s per IP; stay well under it.
  RATE_LIMIT_REQUESTS: z.coerce.number().int().positive().default(10),
  RATE_LIMIT_INTERVAL_MS: z.coerce.number().int().positive().default(1_000),
  RATE_LIMIT_MAX_CONCURRENT: z.coerce.number().int().positive().default(4),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  FETCH_MAX_RETRIES: z.coerce.number().int().min(0).default(5),
  FETCH_BACKOFF_MS: z.coerce.number().int().positive().default(500),
  INGEST_MAX_FAILURES: z.coerce.number().int().min(1).default(3),
  INGEST_BACKOFF_MS: z.coerce.number().int().min(0).default(5_000),
  GAP_REFETCH_ATTEMPTS: z.coerce.number().int().min(0).default(2),
  PARTITION_MAX_ROWS: z.coerce.number().int().positive().default(100_000),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

export type IngestorConfig = z.infer<typeof configSchema>;

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): IngestorConfig {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    throw new Error(
      `Invalid ingestor configuration: ${JSON.stringify(issues)}`,
    );
  }
  return result.data;
}
