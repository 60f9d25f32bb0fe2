import fs from "node:fs/promises";
import path from "node:path";
import {
  ConcurrentIngestionError,
  PermanentFetchError,
  type Timeframe,
  TransientFetchError,
} from "@candle-tape/candle-primitives";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import type { CandlePage, CandleSource } from "../candleSource.ts";
import { CandleStore } from "../candleStore.ts";
import { type IngestionState, IngestOrchestrator } from "../ingestOrchestrator.ts";
import { SyntheticSource } from "../syntheticSource.ts";
import {
  captureLogger,
  collect,
  makeTempDir,
  MINUTE,
  minutes,
  ONE_MINUTE,
  row,
  ScriptedSource,
  silentLogger,
  T0,
} from "./helpers.ts";

const SYMBOL = "BTCUSDT";
const NOW = T0 + 180 * MINUTE;

let root: string;
let store: CandleStore;
let sleeps: number[];

function createOrchestrator(
  source: CandleSource,
  overrides: { now?: () => number; gapRefetchAttempts?: number } = {},
): IngestOrchestrator {
  return new IngestOrchestrator({
    source,
    store,
    logger: silentLogger,
    backfillStart: T0,
    pageLimit: 50,
    backoffMs: 10,
    now: overrides.now ?? (() => NOW),
    gapRefetchAttempts: overrides.gapRefetchAttempts,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  });
}

function syntheticScripted(now = NOW): ScriptedSource {
  const synthetic = new SyntheticSource({ now: () => now });
  return new ScriptedSource({
    candleAt: (openTime) => synthetic.candleAt(SYMBOL, ONE_MINUTE, openTime),
    now,
  });
}

function transientError(): TransientFetchError {
  return new TransientFetchError("HTTP 503", {
    symbol: SYMBOL,
    timeframe: "1m",
    status: 503,
    attempts: 6,
  });
}

async function storedOpenTimes(): Promise<number[]> {
  const stored = await collect(store.readRange(SYMBOL, ONE_MINUTE, 0, Number.MAX_SAFE_INTEGER));
  return stored.map((c) => c.openTime);
}

beforeEach(async () => {
  root = await makeTempDir();
  store = new CandleStore({ root, logger: silentLogger });
  sleeps = [];
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

describe("IngestOrchestrator.run", () => {
  test("backfills an empty series in page-sized windows", async () => {
    const synthetic = new SyntheticSource({ now: () => NOW });
    const orchestrator = createOrchestrator(synthetic);

    const result = await orchestrator.run(SYMBOL, ONE_MINUTE, T0 + 120 * MINUTE);

    expect(result).toEqual({
      status: "completed",
      watermark: T0 + 119 * MINUTE,
      windows: 3,
      committed: 120,
      filled: 0,
    });
    const stored = await collect(store.readRange(SYMBOL, ONE_MINUTE, T0, T0 + 120 * MINUTE));
    expect(stored).toHaveLength(120);
    expect(stored[77]).toEqual({
      symbol: SYMBOL,
      timeframe: "1m",
      ...synthetic.candleAt(SYMBOL, ONE_MINUTE, T0 + 77 * MINUTE),
    });
  });

  test("a second run over the same range changes nothing", async () => {
    const orchestrator = createOrchestrator(new SyntheticSource({ now: () => NOW }));
    await orchestrator.run(SYMBOL, ONE_MINUTE, T0 + 120 * MINUTE);
    const dir = path.join(root, SYMBOL, "1m");
    const manifestBefore = await fs.readFile(path.join(dir, "manifest.json"), "utf-8");
    const filesBefore = await fs.readdir(dir);

    const result = await orchestrator.run(SYMBOL, ONE_MINUTE, T0 + 120 * MINUTE);

    expect(result).toEqual({
      status: "noop",
      watermark: T0 + 119 * MINUTE,
      windows: 0,
      committed: 0,
      filled: 0,
    });
    expect(await fs.readFile(path.join(dir, "manifest.json"), "utf-8")).toBe(manifestBefore);
    expect(await fs.readdir(dir)).toEqual(filesBefore);
  });

  test("re-fetches a gap and commits the complete sequence", async () => {
    const source = new ScriptedSource({
      candleAt: (openTime) => row(openTime),
      now: NOW,
      missingOnce: [T0 + 2 * MINUTE],
    });

    const result = await createOrchestrator(source).run(SYMBOL, ONE_MINUTE, T0 + 5 * MINUTE);

    expect(source.calls).toEqual([
      { symbol: SYMBOL, startTime: T0, limit: 5 },
      { symbol: SYMBOL, startTime: T0 + 2 * MINUTE, limit: 1 },
    ]);
    expect(result.committed).toBe(5);
    expect(result.filled).toBe(0);
    expect(await storedOpenTimes()).toEqual(minutes(T0, 5));
  });

  test("fills a gap the exchange never serves with flat candles", async () => {
    const source = new ScriptedSource({
      candleAt: (openTime) => (openTime === T0 + 2 * MINUTE ? null : row(openTime)),
      now: NOW,
    });

    const result = await createOrchestrator(source).run(SYMBOL, ONE_MINUTE, T0 + 5 * MINUTE);

    expect(source.calls).toHaveLength(3);
    expect(result.filled).toBe(1);
    expect(await storedOpenTimes()).toEqual(minutes(T0, 5));
    const [filled] = await collect(
      store.readRange(SYMBOL, ONE_MINUTE, T0 + 2 * MINUTE, T0 + 3 * MINUTE),
    );
    expect(filled).toEqual({
      symbol: SYMBOL,
      timeframe: "1m",
      openTime: T0 + 2 * MINUTE,
      open: 100.5,
      high: 100.5,
      low: 100.5,
      close: 100.5,
      volume: 0,
    });
  });

  test("never commits the candle that is still forming", async () => {
    const now = T0 + 5 * MINUTE + 30_000;
    const source = new ScriptedSource({ candleAt: (openTime) => row(openTime), now });

    const result = await createOrchestrator(source, { now: () => now }).run(
      SYMBOL,
      ONE_MINUTE,
      T0 + 60 * MINUTE,
    );

    expect(result.watermark).toBe(T0 + 4 * MINUTE);
    expect(await storedOpenTimes()).toEqual(minutes(T0, 5));
  });

  test("walks past empty pages before the first listed candle", async () => {
    const listedAt = T0 + 100 * MINUTE;
    const source = new ScriptedSource({
      candleAt: (openTime) => (openTime >= listedAt ? row(openTime) : null),
      now: NOW,
    });

    const result = await createOrchestrator(source).run(SYMBOL, ONE_MINUTE, T0 + 150 * MINUTE);

    expect(source.calls.map((call) => call.startTime)).toEqual([
      T0,
      T0 + 50 * MINUTE,
      T0 + 100 * MINUTE,
    ]);
    expect(result).toMatchObject({ windows: 3, committed: 50, watermark: T0 + 149 * MINUTE });
  });

  test("resumes from the stored watermark", async () => {
    const source = syntheticScripted();
    const orchestrator = createOrchestrator(source);
    await orchestrator.run(SYMBOL, ONE_MINUTE, T0 + 60 * MINUTE);

    const result = await orchestrator.run(SYMBOL, ONE_MINUTE, T0 + 120 * MINUTE);

    expect(source.calls.slice(2).map((call) => call.startTime)).toEqual([
      T0 + 60 * MINUTE,
      T0 + 110 * MINUTE,
    ]);
    expect(result.committed).toBe(60);
    expect(await storedOpenTimes()).toEqual(minutes(T0, 120));
  });

  test("starts an empty series at the requested backfill start", async () => {
    const source = syntheticScripted();

    await createOrchestrator(source).run(SYMBOL, ONE_MINUTE, T0 + 20 * MINUTE, {
      backfillStart: T0 + 10 * MINUTE,
    });

    expect(source.calls[0]?.startTime).toBe(T0 + 10 * MINUTE);
    expect(await storedOpenTimes()).toEqual(minutes(T0 + 10 * MINUTE, 10));
  });

  test("logs the merge counts for each window", async () => {
    const { logger, records } = captureLogger();
    const orchestrator = new IngestOrchestrator({
      source: syntheticScripted(),
      store,
      logger,
      backfillStart: T0,
      now: () => NOW,
    });

    await orchestrator.run(SYMBOL, ONE_MINUTE, T0 + 2 * MINUTE);

    expect(records.filter((record) => record.msg === "merged window")).toEqual([
      expect.objectContaining({
        symbol: SYMBOL,
        timeframe: "1m",
        start: T0,
        received: 2,
        merged: 2,
        rejected: 0,
        amended: 0,
        gaps: 0,
      }),
    ]);
  });

  test("moves through the ingestion states in order", async () => {
    const transitions: IngestionState[] = [];

    await createOrchestrator(syntheticScripted()).run(SYMBOL, ONE_MINUTE, T0 + 2 * MINUTE, {
      onTransition: (_from, to) => transitions.push(to),
    });

    expect(transitions).toEqual([
      "computing-gap",
      "fetching",
      "merging",
      "committing",
      "computing-gap",
      "idle",
    ]);
  });
});

describe("IngestOrchestrator failures", () => {
  test("backs off after a transient failure and then completes", async () => {
    const source = syntheticScripted();
    source.failNext(transientError());
    const transitions: IngestionState[] = [];

    const result = await createOrchestrator(source).run(SYMBOL, ONE_MINUTE, T0 + 5 * MINUTE, {
      onTransition: (_from, to) => transitions.push(to),
    });

    expect(sleeps).toEqual([10]);
    expect(transitions.slice(0, 3)).toEqual(["computing-gap", "fetching", "error-backoff"]);
    expect(result).toMatchObject({ status: "completed", committed: 5 });
  });

  test("fails after too many consecutive transient failures", async () => {
    const source = syntheticScripted();
    source.failNext(transientError(), transientError(), transientError());
    const transitions: IngestionState[] = [];

    await expect(
      createOrchestrator(source).run(SYMBOL, ONE_MINUTE, T0 + 5 * MINUTE, {
        onTransition: (_from, to) => transitions.push(to),
      }),
    ).rejects.toBeInstanceOf(TransientFetchError);

    expect(sleeps).toEqual([10, 20]);
    expect(transitions.at(-1)).toBe("failed");
    expect(await store.watermark(SYMBOL, ONE_MINUTE)).toBeNull();
    const lease = await store.acquireWriter(SYMBOL, ONE_MINUTE);
    await lease.release();
  });

  test("fails at once on a permanent error", async () => {
    const source = syntheticScripted();
    source.failNext(new PermanentFetchError("unknown symbol", { symbol: SYMBOL, timeframe: "1m", retCode: 10001 }));
    const transitions: IngestionState[] = [];

    await expect(
      createOrchestrator(source).run(SYMBOL, ONE_MINUTE, T0 + 5 * MINUTE, {
        onTransition: (_from, to) => transitions.push(to),
      }),
    ).rejects.toBeInstanceOf(PermanentFetchError);

    expect(source.calls).toHaveLength(1);
    expect(sleeps).toEqual([]);
    expect(transitions).toEqual(["computing-gap", "fetching", "failed"]);
  });

  test("keeps earlier windows when a later one fails", async () => {
    const source = syntheticScripted();
    const orchestrator = createOrchestrator(source);
    await orchestrator.run(SYMBOL, ONE_MINUTE, T0 + 50 * MINUTE);
    source.failNext(new PermanentFetchError("maintenance", { symbol: SYMBOL, timeframe: "1m", status: 400 }));

    await expect(orchestrator.run(SYMBOL, ONE_MINUTE, T0 + 100 * MINUTE)).rejects.toBeInstanceOf(
      PermanentFetchError,
    );
    expect(await store.watermark(SYMBOL, ONE_MINUTE)).toBe(T0 + 49 * MINUTE);
  });
});

describe("IngestOrchestrator cancellation and concurrency", () => {
  test("stops at the next window boundary once cancelled", async () => {
    const controller = new AbortController();

    const result = await createOrchestrator(syntheticScripted()).run(SYMBOL, ONE_MINUTE, T0 + 120 * MINUTE, {
      signal: controller.signal,
      onTransition: (_from, to) => {
        if (to === "committing") {
          controller.abort();
        }
      },
    });

    expect(result).toEqual({
      status: "cancelled",
      watermark: T0 + 49 * MINUTE,
      windows: 1,
      committed: 50,
      filled: 0,
    });
    expect(await storedOpenTimes()).toEqual(minutes(T0, 50));
  });

  test("cuts a backoff short when cancelled", async () => {
    const source = syntheticScripted();
    source.failNext(transientError());
    const controller = new AbortController();
    const orchestrator = new IngestOrchestrator({
      source,
      store,
      logger: silentLogger,
      backfillStart: T0,
      backoffMs: 60_000,
      now: () => NOW,
    });
    const startedAt = Date.now();

    const result = await orchestrator.run(SYMBOL, ONE_MINUTE, T0 + 5 * MINUTE, {
      signal: controller.signal,
      onTransition: (_from, to) => {
        if (to === "error-backoff") {
          setTimeout(() => controller.abort(), 20);
        }
      },
    });

    expect(Date.now() - startedAt).toBeLessThan(5_000);
    expect(result).toMatchObject({ status: "cancelled", committed: 0, watermark: null });
    expect(source.calls).toHaveLength(1);
  });

  test("does nothing when cancelled before starting", async () => {
    const source = syntheticScripted();
    const controller = new AbortController();
    controller.abort();

    const result = await createOrchestrator(source).run(SYMBOL, ONE_MINUTE, T0 + 120 * MINUTE, {
      signal: controller.signal,
    });

    expect(result.status).toBe("cancelled");
    expect(source.calls).toEqual([]);
  });

  test("rejects a second concurrent run for the same series", async () => {
    const orchestrator = createOrchestrator(syntheticScripted());

    const [first, second] = await Promise.allSettled([
      orchestrator.run(SYMBOL, ONE_MINUTE, T0 + 60 * MINUTE),
      orchestrator.run(SYMBOL, ONE_MINUTE, T0 + 60 * MINUTE),
    ]);

    expect(first.status).toBe("fulfilled");
    expect(second.status).toBe("rejected");
    if (second.status === "rejected") {
      expect(second.reason).toBeInstanceOf(ConcurrentIngestionError);
    }
    expect(await storedOpenTimes()).toEqual(minutes(T0, 60));
  });
});

describe("IngestOrchestrator.runMany", () => {
  test("runs pairs independently and reports each outcome", async () => {
    const synthetic = new SyntheticSource({ now: () => NOW });
    const source: CandleSource = {
      maxPageLimit: synthetic.maxPageLimit,
      async fetchPage(symbol: string, timeframe: Timeframe, startTime: number, limit: number): Promise<CandlePage> {
        if (symbol === "NOPEUSDT") {
          throw new PermanentFetchError("unknown symbol", { symbol, timeframe: timeframe.id, retCode: 10001 });
        }
        return synthetic.fetchPage(symbol, timeframe, startTime, limit);
      },
    };

    const outcomes = await createOrchestrator(source).runMany(
      [
        { symbol: "BTCUSDT", timeframe: ONE_MINUTE },
        { symbol: "NOPEUSDT", timeframe: ONE_MINUTE },
        { symbol: "ETHUSDT", timeframe: ONE_MINUTE },
      ],
      T0 + 30 * MINUTE,
    );

    expect(outcomes.map((outcome) => [outcome.symbol, outcome.ok])).toEqual([
      ["BTCUSDT", true],
      ["NOPEUSDT", false],
      ["ETHUSDT", true],
    ]);
    const [btc, nope] = outcomes;
    if (btc?.ok) {
      expect(btc.result.committed).toBe(30);
    }
    if (nope && !nope.ok) {
      expect(nope.error).toBeInstanceOf(PermanentFetchError);
    }
    expect(await store.watermark("ETHUSDT", ONE_MINUTE)).toBe(T0 + 29 * MINUTE);
  });
});
