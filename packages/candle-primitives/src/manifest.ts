import { CandleTapeError } from "./errors.ts";
import type { Timeframe, TimeframeId } from "./timeframe.ts";

export interface PartitionEntry {
  /** File name relative to the series directory. */
  file: string;
  sequence: number;
  period: string;
  firstOpenTime: number;
  lastOpenTime: number;
  rowCount: number;
  sealed: boolean;
}

/**
 * Per-series record of what is durably committed. `watermark` is the open
 * time of the last committed candle, `null` before the first append.
 */
export interface SeriesManifest {
  symbol: string;
  timeframe: TimeframeId;
  stepMs: number;
  watermark: number | null;
  sequence: number;
  partitions: PartitionEntry[];
  updatedAtMs: number;
}

export const PARTITION_EXTENSION = ".ohlcv";
export const TEMP_MARKER = ".tmp-";

export function createInitialManifest(
  symbol: string,
  timeframe: Timeframe,
): SeriesManifest {
  return {
    symbol,
    timeframe: timeframe.id,
    stepMs: timeframe.stepMs,
    watermark: null,
    sequence: 0,
    partitions: [],
    updatedAtMs: Date.now(),
  };
}

/**
 * Strips characters that are unsafe in a directory name. Returns `""` for
 * a symbol with nothing usable left, including one made only of dots.
 */
export function sanitizeSymbol(symbol: string): string {
  const cleaned = symbol.replace(/[^A-Za-z0-9._-]/g, "");
  return /^\.*$/.test(cleaned) ? "" : cleaned;
}

export function seriesDir(symbol: string, timeframe: TimeframeId): string {
  const safe = sanitizeSymbol(symbol);
  if (safe === "") {
    throw new CandleTapeError(`Invalid symbol "${symbol}"`);
  }
  return `${safe}/${timeframe}`;
}

/**
 * Calendar period a candle falls into: `YYYY-MM` for intraday timeframes,
 * `YYYY` for daily and weekly.
 */
export function partitionPeriod(timeframe: Timeframe, openTime: number): string {
  const date = new Date(openTime);
  const year = String(date.getUTCFullYear());
  if (timeframe.partitionSpan === "year") {
    return year;
  }
  const month = String(date.getUTCMonth() + 1).padStart(2, "0");
  return `${year}-${month}`;
}

export function buildPartitionFile(period: string, sequence: number): string {
  const seq = String(sequence).padStart(6, "0");
  return `${period}-${seq}${PARTITION_EXTENSION}`;
}

export function parsePartitionFile(
  file: string,
): { period: string; sequence: number } | null {
  const match = /^(\d{4}(?:-\d{2})?)-(\d{6})\.ohlcv$/.exec(file);
  if (!match) {
    return null;
  }
  return { period: match[1], sequence: Number(match[2]) };
}

export function isTempArtifact(file: string): boolean {
  return file.includes(TEMP_MARKER);
}

export const MANIFEST_FILE = "manifest.json";
export const WRITER_LOCK_FILE = ".writer.lock";
