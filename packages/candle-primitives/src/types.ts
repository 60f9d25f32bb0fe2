import type { TimeframeId } from "./timeframe.ts";

/**
 * A committed OHLCV candle. Identified by `(symbol, timeframe, openTime)`.
 */
export interface Candle {
  readonly symbol: string;
  readonly timeframe: TimeframeId;
  /**
   * Open time in milliseconds since epoch, aligned to the timeframe step.
   */
  readonly openTime: number;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

/**
 * A row as parsed off the wire, before validation. Fields may be NaN.
 */
export interface RawCandle {
  openTime: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface SeriesKey {
  symbol: string;
  timeframe: TimeframeId;
}

/**
 * Half-open range `[start, end)` of open times.
 */
export interface TimeRange {
  start: number;
  end: number;
}

export interface CandleColumns {
  openTime: number[];
  open: number[];
  high: number[];
  low: number[];
  close: number[];
  volume: number[];
}

export const PARTITION_FORMAT_VERSION = 1;
