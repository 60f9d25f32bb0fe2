import {
  alignDown,
  alignUp,
  type Candle,
  type RawCandle,
  StaleWriteError,
  stepsBetween,
  type Timeframe,
  TransientFetchError,
} from "@candle-tape/candle-primitives";
import type { Logger } from "pino";
import { type CandleSource, fetchRange } from "./candleSource.ts";
import type { CandleStore, WriterLease } from "./candleStore.ts";
import { fillGaps, type MergeResult, mergeCandles } from "./candleMerger.ts";
import { wait } from "./wait.ts";

export type IngestionState =
  | "idle"
  | "computing-gap"
  | "fetching"
  | "merging"
  | "committing"
  | "error-backoff"
  | "failed";

export interface RunOptions {
  signal?: AbortSignal;
  /** First open time to fetch when the series is empty. */
  backfillStart?: number;
  onTransition?: (from: IngestionState, to: IngestionState) => void;
}

export interface RunResult {
  status: "completed" | "noop" | "cancelled";
  watermark: number | null;
  /** Pages fetched for new windows, gap re-fetches excluded. */
  windows: number;
  committed: number;
  /** Carry-forward candles written for gaps the exchange never filled. */
  filled: number;
}

export type PairOutcome =
  | { symbol: string; timeframe: Timeframe; ok: true; result: RunResult }
  | { symbol: string; timeframe: Timeframe; ok: false; error: unknown };

interface IngestOrchestratorOptions {
  source: CandleSource;
  store: CandleStore;
  logger: Logger;
  backfillStart: number;
  pageLimit?: number;
  maxConsecutiveFailures?: number;
  backoffMs?: number;
  gapRefetchAttempts?: number;
  now?: () => number;
  /** Backoff delay; resolves early once the signal aborts. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

interface WindowOutcome {
  batch: Candle[];
  filled: number;
  nextCursor: number | null;
}

const DEFAULT_MAX_CONSECUTIVE_FAILURES = 3;
const DEFAULT_BACKOFF_MS = 5_000;
const DEFAULT_GAP_REFETCH_ATTEMPTS = 2;

/**
 * Drives fetch, merge and commit cycles for one (symbol, timeframe) until
 * the watermark reaches the target. Runs resume from the persisted
 * watermark, so a second run over the same range is a no-op.
 */
export class IngestOrchestrator {
  private readonly source: CandleSource;
  private readonly store: CandleStore;
  private readonly logger: Logger;
  private readonly backfillStart: number;
  private readonly pageLimit: number;
  private readonly maxConsecutiveFailures: number;
  private readonly backoffMs: number;
  private readonly gapRefetchAttempts: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(options: IngestOrchestratorOptions) {
    this.source = options.source;
    this.store = options.store;
    this.logger = options.logger.child({ component: "orchestrator" });
    this.backfillStart = options.backfillStart;
    this.pageLimit = Math.min(
      options.pageLimit ?? options.source.maxPageLimit,
      options.source.maxPageLimit,
    );
    this.maxConsecutiveFailures =
      options.maxConsecutiveFailures ?? DEFAULT_MAX_CONSECUTIVE_FAILURES;
    this.backoffMs = options.backoffMs ?? DEFAULT_BACKOFF_MS;
    this.gapRefetchAttempts =
      options.gapRefetchAttempts ?? DEFAULT_GAP_REFETCH_ATTEMPTS;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? wait;
  }

  async run(
    symbol: string,
    timeframe: Timeframe,
    targetEndTime: number,
    options: RunOptions = {},
  ): Promise<RunResult> {
    const log = this.logger.child({ symbol, timeframe: timeframe.id });
    let state: IngestionState = "idle";
    const transition = (next: IngestionState) => {
      log.debug({ from: state, to: next }, "state transition");
      options.onTransition?.(state, next);
      state = next;
    };

    // Only closed candles are committed.
    const targetEnd = Math.min(
      alignUp(timeframe, targetEndTime),
      alignDown(timeframe, this.now()),
    );
    const backfillStart = alignUp(timeframe, options.backfillStart ?? this.backfillStart);
    const result: RunResult = { status: "completed", watermark: null, windows: 0, committed: 0, filled: 0 };

    let lease: WriterLease;
    try {
      lease = await this.store.acquireWriter(symbol, timeframe);
    } catch (error) {
      transition("failed");
      log.error({ error }, "could not start ingestion");
      throw error;
    }

    log.info(
      { targetEnd: new Date(targetEnd).toISOString() },
      "ingestion started",
    );

    try {
      let cursor: number | null = null;
      let failures = 0;

      for (;;) {
        transition("computing-gap");
        const watermark = await this.store.watermark(symbol, timeframe);
        result.watermark = watermark;

        if (options.signal?.aborted) {
          result.status = "cancelled";
          break;
        }
        if (watermark !== null && watermark >= targetEnd - timeframe.stepMs) {
          break;
        }

        const resumeAt = watermark === null ? backfillStart : watermark + timeframe.stepMs;
        const start = cursor !== null && cursor > resumeAt ? cursor : resumeAt;
        if (start >= targetEnd) {
          break;
        }

        let outcome: WindowOutcome;
        try {
          outcome = await this.processWindow(symbol, timeframe, start, targetEnd, transition, log);
          result.windows += 1;

          if (outcome.batch.length === 0) {
            if (outcome.nextCursor === null || outcome.nextCursor <= start) {
              log.info({ start }, "no further candles upstream");
              break;
            }
            cursor = outcome.nextCursor;
            failures = 0;
            continue;
          }

          transition("committing");
          await this.store.append(symbol, timeframe, outcome.batch, lease);
        } catch (error) {
          if (!(error instanceof TransientFetchError) && !(error instanceof StaleWriteError)) {
            throw error;
          }
          failures += 1;
          if (failures >= this.maxConsecutiveFailures) {
            throw error;
          }
          if (error instanceof StaleWriteError) {
            log.warn({ watermark: error.watermark }, "stale write, recomputing window");
            cursor = null;
            continue;
          }
          transition("error-backoff");
          const delayMs = this.backoffMs * 2 ** (failures - 1);
          log.warn({ failures, delayMs, reason: error.message }, "fetch failed, backing off");
          await this.sleep(delayMs, options.signal);
          continue;
        }

        result.committed += outcome.batch.length;
        result.filled += outcome.filled;
        failures = 0;
        cursor = null;
      }
    } catch (error) {
      transition("failed");
      log.error({ error, committed: result.committed }, "ingestion failed");
      throw error;
    } finally {
      await lease.release();
    }

    if (result.status === "completed" && result.windows === 0) {
      result.status = "noop";
    }
    transition("idle");
    log.info(
      {
        status: result.status,
        watermark: result.watermark,
        windows: result.windows,
        committed: result.committed,
        filled: result.filled,
      },
      "ingestion finished",
    );
    return result;
  }

  /**
   * Runs distinct pairs concurrently. A failed pair does not stop the others.
   */
  async runMany(
    pairs: ReadonlyArray<{ symbol: string; timeframe: Timeframe }>,
    targetEndTime: number,
    options: RunOptions = {},
  ): Promise<PairOutcome[]> {
    const settled = await Promise.allSettled(
      pairs.map(({ symbol, timeframe }) => this.run(symbol, timeframe, targetEndTime, options)),
    );
    return settled.map((outcome, index): PairOutcome => {
      const { symbol, timeframe } = pairs[index];
      return outcome.status === "fulfilled"
        ? { symbol, timeframe, ok: true, result: outcome.value }
        : { symbol, timeframe, ok: false, error: outcome.reason };
    });
  }

  private async processWindow(
    symbol: string,
    timeframe: Timeframe,
    start: number,
    targetEnd: number,
    transition: (next: IngestionState) => void,
    log: Logger,
  ): Promise<WindowOutcome> {
    transition("fetching");
    const limit = Math.min(this.pageLimit, stepsBetween(timeframe, start, targetEnd));
    const page = await this.source.fetchPage(symbol, timeframe, start, limit);

    transition("merging");
    const tail = await this.store.tail(symbol, timeframe);
    let raw: RawCandle[] = page.candles.filter((row) => row.openTime < targetEnd);
    let merged: MergeResult = mergeCandles(symbol, timeframe, tail, raw, log);

    for (
      let attempt = 0;
      merged.gaps.length > 0 && attempt < this.gapRefetchAttempts;
      attempt += 1
    ) {
      transition("fetching");
      for (const gap of merged.gaps) {
        log.info({ gap, attempt: attempt + 1 }, "re-fetching gap");
        const rows = await fetchRange(this.source, symbol, timeframe, gap.start, gap.end, this.pageLimit);
        raw = [...raw, ...rows];
      }
      transition("merging");
      merged = mergeCandles(symbol, timeframe, tail, raw, log);
    }

    log.debug(
      {
        start,
        received: raw.length,
        merged: merged.batch.length,
        rejected: merged.rejected.length,
        amended: merged.amended,
        gaps: merged.gaps.length,
      },
      "merged window",
    );

    if (merged.gaps.length === 0) {
      return { batch: merged.batch, filled: 0, nextCursor: page.nextCursor };
    }

    const { batch, filled } = fillGaps(timeframe, tail, merged.batch);
    log.warn({ gaps: merged.gaps, filled }, "gaps stayed empty after re-fetch, filling flat");
    return { batch, filled, nextCursor: page.nextCursor };
  }
}
