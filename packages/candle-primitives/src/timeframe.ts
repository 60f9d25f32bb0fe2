import { CandleTapeError } from "./errors.ts";

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

export interface Timeframe {
  id: TimeframeId;
  stepMs: number;
  /**
   * Shift applied before aligning to `stepMs`. Weekly candles open on
   * Monday 00:00 UTC while the epoch is a Thursday.
   */
  offsetMs: number;
  /** Interval code used by the exchange kline endpoint. */
  exchangeInterval: string;
  partitionSpan: "month" | "year";
}

export const TIMEFRAME_IDS = [
  "1m",
  "3m",
  "5m",
  "15m",
  "30m",
  "1h",
  "2h",
  "4h",
  "6h",
  "12h",
  "1d",
  "1w",
] as const;

export type TimeframeId = (typeof TIMEFRAME_IDS)[number];

const TIMEFRAMES: Record<TimeframeId, Timeframe> = {
  "1m": intraday("1m", MINUTE_MS, "1"),
  "3m": intraday("3m", 3 * MINUTE_MS, "3"),
  "5m": intraday("5m", 5 * MINUTE_MS, "5"),
  "15m": intraday("15m", 15 * MINUTE_MS, "15"),
  "30m": intraday("30m", 30 * MINUTE_MS, "30"),
  "1h": intraday("1h", HOUR_MS, "60"),
  "2h": intraday("2h", 2 * HOUR_MS, "120"),
  "4h": intraday("4h", 4 * HOUR_MS, "240"),
  "6h": intraday("6h", 6 * HOUR_MS, "360"),
  "12h": intraday("12h", 12 * HOUR_MS, "720"),
  "1d": { id: "1d", stepMs: DAY_MS, offsetMs: 0, exchangeInterval: "D", partitionSpan: "year" },
  "1w": {
    id: "1w",
    stepMs: 7 * DAY_MS,
    offsetMs: 4 * DAY_MS,
    exchangeInterval: "W",
    partitionSpan: "year",
  },
};

function intraday(id: TimeframeId, stepMs: number, exchangeInterval: string): Timeframe {
  return { id, stepMs, offsetMs: 0, exchangeInterval, partitionSpan: "month" };
}

export function isTimeframeId(value: string): value is TimeframeId {
  return TIMEFRAME_IDS.some((id) => id === value);
}

export function parseTimeframe(value: string): Timeframe {
  if (!isTimeframeId(value)) {
    throw new CandleTapeError(
      `Unsupported timeframe "${value}". Expected one of ${TIMEFRAME_IDS.join(", ")}`,
    );
  }
  return TIMEFRAMES[value];
}

export function isAligned(timeframe: Timeframe, openTime: number): boolean {
  return (
    Number.isSafeInteger(openTime) &&
    mod(openTime - timeframe.offsetMs, timeframe.stepMs) === 0
  );
}

export function alignDown(timeframe: Timeframe, timestampMs: number): number {
  const shifted = Math.floor(timestampMs) - timeframe.offsetMs;
  return shifted - mod(shifted, timeframe.stepMs) + timeframe.offsetMs;
}

export function alignUp(timeframe: Timeframe, timestampMs: number): number {
  const down = alignDown(timeframe, timestampMs);
  return down === timestampMs ? down : down + timeframe.stepMs;
}

/**
 * Number of whole steps in `[start, end)`.
 */
export function stepsBetween(timeframe: Timeframe, start: number, end: number): number {
  return Math.max(0, Math.ceil((end - start) / timeframe.stepMs));
}

function mod(value: number, divisor: number): number {
  return ((value % divisor) + divisor) % divisor;
}
