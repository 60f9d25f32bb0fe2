import {
  type Candle,
  isAligned,
  type RawCandle,
  type TimeRange,
  type Timeframe,
  ValidationError,
} from "@candle-tape/candle-primitives";
import type { Logger } from "pino";

export interface MergeResult {
  /** Time-ordered, duplicate-free candles after the existing tail. */
  batch: Candle[];
  /** Missing `[start, end)` ranges between consecutive candles. */
  gaps: TimeRange[];
  rejected: ValidationError[];
  /** In-batch duplicates replaced by a later fetch with different values. */
  amended: number;
}

export function validateRow(timeframe: Timeframe, row: RawCandle): ValidationError | null {
  const { openTime, open, high, low, close, volume } = row;
  if (!isAligned(timeframe, openTime)) {
    return new ValidationError(`open time ${openTime} not aligned to ${timeframe.id}`, openTime);
  }
  if (![open, high, low, close, volume].every(Number.isFinite)) {
    return new ValidationError("non-numeric field", openTime);
  }
  if (high < low) {
    return new ValidationError(`high ${high} below low ${low}`, openTime);
  }
  if (Math.min(open, close) < low || Math.max(open, close) > high) {
    return new ValidationError("open or close outside the high-low range", openTime);
  }
  if (volume < 0) {
    return new ValidationError(`negative volume ${volume}`, openTime);
  }
  return null;
}

/**
 * Validates and merges freshly fetched rows onto the stored tail. Rows are
 * taken in fetch order, so a later duplicate replaces an earlier one.
 * Invalid rows are logged and dropped; gaps are reported, not filled.
 */
export function mergeCandles(
  symbol: string,
  timeframe: Timeframe,
  existingTail: Candle | null,
  incoming: readonly RawCandle[],
  logger: Logger,
): MergeResult {
  const rejected: ValidationError[] = [];
  const byOpenTime = new Map<number, Candle>();
  let amended = 0;

  for (const row of incoming) {
    const error = validateRow(timeframe, row);
    if (error) {
      rejected.push(error);
      logger.warn({ symbol, timeframe: timeframe.id, openTime: row.openTime, reason: error.message }, "dropping invalid candle");
      continue;
    }

    const candle: Candle = Object.freeze({ symbol, timeframe: timeframe.id, ...pickOhlcv(row) });

    if (existingTail && candle.openTime <= existingTail.openTime) {
      if (candle.openTime === existingTail.openTime && !sameValues(candle, existingTail)) {
        logger.warn(
          { symbol, timeframe: timeframe.id, openTime: candle.openTime },
          "upstream amended a committed candle, keeping stored value",
        );
      }
      continue;
    }

    const previous = byOpenTime.get(candle.openTime);
    if (previous && !sameValues(previous, candle)) {
      amended += 1;
      logger.warn(
        { symbol, timeframe: timeframe.id, openTime: candle.openTime },
        "upstream amended a candle within the batch, keeping the latest fetch",
      );
    }
    byOpenTime.set(candle.openTime, candle);
  }

  const batch = [...byOpenTime.values()].sort((a, b) => a.openTime - b.openTime);
  const gaps = findGaps(timeframe, existingTail?.openTime ?? null, batch);

  if (gaps.length > 0) {
    logger.warn({ symbol, timeframe: timeframe.id, gaps }, "gaps in fetched candles");
  }

  return { batch, gaps, rejected, amended };
}

export function findGaps(
  timeframe: Timeframe,
  anchor: number | null,
  batch: readonly Candle[],
): TimeRange[] {
  const gaps: TimeRange[] = [];
  let previous = anchor;
  for (const candle of batch) {
    if (previous !== null && candle.openTime - previous > timeframe.stepMs) {
      gaps.push({ start: previous + timeframe.stepMs, end: candle.openTime });
    }
    previous = candle.openTime;
  }
  return gaps;
}

/**
 * Fills each gap with flat candles carrying the previous close forward at
 * zero volume. Returns the contiguous batch and the number of candles added.
 */
export function fillGaps(
  timeframe: Timeframe,
  existingTail: Candle | null,
  batch: readonly Candle[],
): { batch: Candle[]; filled: number } {
  const result: Candle[] = [];
  let previous = existingTail;
  let filled = 0;

  for (const candle of batch) {
    if (previous) {
      for (
        let openTime = previous.openTime + timeframe.stepMs;
        openTime < candle.openTime;
        openTime += timeframe.stepMs
      ) {
        const price = previous.close;
        const flat: Candle = Object.freeze({
          symbol: candle.symbol,
          timeframe: candle.timeframe,
          openTime,
          open: price,
          high: price,
          low: price,
          close: price,
          volume: 0,
        });
        result.push(flat);
        filled += 1;
      }
    }
    result.push(candle);
    previous = candle;
  }

  return { batch: result, filled };
}

function pickOhlcv({ openTime, open, high, low, close, volume }: RawCandle): RawCandle {
  return { openTime, open, high, low, close, volume };
}

function sameValues(a: RawCandle, b: RawCandle): boolean {
  return (
    a.open === b.open &&
    a.high === b.high &&
    a.low === b.low &&
    a.close === b.close &&
    a.volume === b.volume
  );
}
