import {
  type RawCandle,
  type Timeframe,
  stepsBetween,
} from "@candle-tape/candle-primitives";

export interface CandlePage {
  /** Oldest first. */
  candles: RawCandle[];
  /** Start of the next page, or `null` once the page reaches "now". */
  nextCursor: number | null;
}

/**
 * Paginated candle endpoint. `startTime` must be aligned to the timeframe
 * and `limit` must not exceed `maxPageLimit`.
 */
export interface CandleSource {
  readonly maxPageLimit: number;
  fetchPage(
    symbol: string,
    timeframe: Timeframe,
    startTime: number,
    limit: number,
  ): Promise<CandlePage>;
}

/**
 * Fetches every page covering `[start, end)` and returns the rows in fetch
 * order, trimmed to the range.
 */
export async function fetchRange(
  source: CandleSource,
  symbol: string,
  timeframe: Timeframe,
  start: number,
  end: number,
  pageLimit: number = source.maxPageLimit,
): Promise<RawCandle[]> {
  const rows: RawCandle[] = [];
  let cursor: number | null = start;

  while (cursor !== null && cursor < end) {
    const limit = Math.min(pageLimit, source.maxPageLimit, stepsBetween(timeframe, cursor, end));
    const page = await source.fetchPage(symbol, timeframe, cursor, limit);
    rows.push(
      ...page.candles.filter((row) => row.openTime >= start && row.openTime < end),
    );
    if (page.nextCursor !== null && page.nextCursor <= cursor) {
      break;
    }
    cursor = page.nextCursor;
  }

  return rows;
}
