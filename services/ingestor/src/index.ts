import "dotenv/config";
import path from "node:path";
import { parseArgs } from "node:util";
import {
  parseTimeframe,
  type Timeframe,
} from "@candle-tape/candle-primitives";
import { BybitClient, type BybitCategory } from "./bybitClient.ts";
import type { CandleSource } from "./candleSource.ts";
import { CandleStore } from "./candleStore.ts";
import { type IngestorConfig, loadConfig } from "./config.ts";
import { IngestOrchestrator } from "./ingestOrchestrator.ts";
import { reportOutcomes } from "./ingestReport.ts";
import { logger } from "./logger.ts";
import { RateBudget } from "./rateBudget.ts";
import { SyntheticSource } from "./syntheticSource.ts";

const USAGE = `Usage:
  ingest <symbols,...> [timeframes,...] [--from ISO] [--until ISO]
  watermark <symbol> <timeframe>
  read <symbol> <timeframe> [--from ISO] [--until ISO]
  instruments [spot|linear|inverse]`;

async function main(argv: string[]): Promise<number> {
  const config = loadConfig();
  logger.level = config.LOG_LEVEL;

  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      from: { type: "string" },
      until: { type: "string" },
    },
  });
  const [command, ...rest] = positionals;

  const store = new CandleStore({
    root: path.resolve(process.cwd(), config.STORAGE_ROOT),
    maxRowsPerPartition: config.PARTITION_MAX_ROWS,
    logger,
  });

  switch (command) {
    case "ingest":
      return ingest(config, store, rest, values);
    case "watermark":
      return printWatermark(store, rest);
    case "read":
      return readCandles(store, rest, values);
    case "instruments":
      return listInstruments(config, rest);
    default:
      process.stderr.write(`${USAGE}\n`);
      return 2;
  }
}

async function ingest(
  config: IngestorConfig,
  store: CandleStore,
  args: string[],
  flags: { from?: string; until?: string },
): Promise<number> {
  const [symbolList, timeframeList = config.DEFAULT_TIMEFRAME] = args;
  if (!symbolList) {
    process.stderr.write(`${USAGE}\n`);
    return 2;
  }

  const timeframes = timeframeList.split(",").map(parseTimeframe);
  const pairs = symbolList
    .split(",")
    .flatMap((symbol) => timeframes.map((timeframe) => ({ symbol, timeframe })));
  const targetEnd = flags.until ? parseTimestamp(flags.until) : Date.now();

  const budget = createBudget(config);
  const source = createSource(config, budget);
  const orchestrator = new IngestOrchestrator({
    source,
    store,
    logger,
    backfillStart: config.BACKFILL_START,
    pageLimit: config.PAGE_LIMIT,
    maxConsecutiveFailures: config.INGEST_MAX_FAILURES,
    backoffMs: config.INGEST_BACKOFF_MS,
    gapRefetchAttempts: config.GAP_REFETCH_ATTEMPTS,
  });

  const controller = new AbortController();
  process.once("SIGINT", () => {
    logger.info("received SIGINT, stopping after in-flight windows");
    controller.abort();
  });

  const outcomes = await orchestrator.runMany(pairs, targetEnd, {
    signal: controller.signal,
    backfillStart: flags.from ? parseTimestamp(flags.from) : undefined,
  });
  await budget.stop();

  return reportOutcomes(outcomes, logger);
}

async function printWatermark(store: CandleStore, args: string[]): Promise<number> {
  const [symbol, timeframeId] = args;
  if (!symbol || !timeframeId) {
    process.stderr.write(`${USAGE}\n`);
    return 2;
  }
  const watermark = await store.watermark(symbol, parseTimeframe(timeframeId));
  process.stdout.write(
    watermark === null
      ? "no data\n"
      : `${new Date(watermark).toISOString()} (${watermark})\n`,
  );
  return 0;
}

async function readCandles(
  store: CandleStore,
  args: string[],
  flags: { from?: string; until?: string },
): Promise<number> {
  const [symbol, timeframeId] = args;
  if (!symbol || !timeframeId) {
    process.stderr.write(`${USAGE}\n`);
    return 2;
  }
  const timeframe: Timeframe = parseTimeframe(timeframeId);
  const start = flags.from ? parseTimestamp(flags.from) : 0;
  const end = flags.until ? parseTimestamp(flags.until) : Number.MAX_SAFE_INTEGER;

  for await (const candle of store.readRange(symbol, timeframe, start, end)) {
    process.stdout.write(`${JSON.stringify(candle)}\n`);
  }
  return 0;
}

async function listInstruments(config: IngestorConfig, args: string[]): Promise<number> {
  const [category = config.BYBIT_CATEGORY] = args;
  if (!isCategory(category)) {
    process.stderr.write(`Unknown category "${category}"\n`);
    return 2;
  }
  const budget = createBudget(config);
  const client = createBybitClient(config, budget);
  try {
    for (const instrument of await client.fetchInstruments(category)) {
      process.stdout.write(`${JSON.stringify(instrument)}\n`);
    }
  } finally {
    await budget.stop();
  }
  return 0;
}

function createBudget(config: IngestorConfig): RateBudget {
  return new RateBudget({
    requestsPerInterval: config.RATE_LIMIT_REQUESTS,
    intervalMs: config.RATE_LIMIT_INTERVAL_MS,
    maxConcurrent: config.RATE_LIMIT_MAX_CONCURRENT,
    logger,
  });
}

function createBybitClient(config: IngestorConfig, budget: RateBudget): BybitClient {
  return new BybitClient({
    baseUrl: config.BYBIT_BASE_URL,
    category: config.BYBIT_CATEGORY,
    budget,
    logger,
    timeoutMs: config.FETCH_TIMEOUT_MS,
    maxRetries: config.FETCH_MAX_RETRIES,
    baseDelayMs: config.FETCH_BACKOFF_MS,
  });
}

function createSource(config: IngestorConfig, budget: RateBudget): CandleSource {
  if (config.CANDLE_SOURCE === "synthetic") {
    return new SyntheticSource();
  }
  return createBybitClient(config, budget);
}

function isCategory(value: string): value is BybitCategory {
  return value === "spot" || value === "linear" || value === "inverse";
}

function parseTimestamp(value: string): number {
  const parsed = Date.parse(value);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid timestamp "${value}"`);
  }
  return parsed;
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    logger.error({ error }, "fatal ingestor error");
    process.exitCode = 1;
  });
