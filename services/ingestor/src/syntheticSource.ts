import type { RawCandle, Timeframe } from "@candle-tape/candle-primitives";
import type { CandlePage, CandleSource } from "./candleSource.ts";

interface SyntheticSourceOptions {
  seed?: number;
  startPrice?: number;
  volatility?: number;
  /** First open time with data; earlier pages come back empty. */
  listedAt?: number;
  now?: () => number;
}

const mulberry32 = (seed: number): (() => number) => {
  let state = seed;

  return () => {
    state += 0x6d2b79f5;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

function hashString(value: string): number {
  let hash = 2166136261;
  for (let i = 0; i < value.length; i += 1) {
    hash = Math.imul(hash ^ value.charCodeAt(i), 16777619);
  }
  return hash >>> 0;
}

/**
 * Deterministic candle source for dry runs: the candle at a given open time
 * is always the same, so re-fetching a range returns identical rows.
 */
export class SyntheticSource implements CandleSource {
  readonly maxPageLimit = 1000;

  private readonly seed: number;
  private readonly startPrice: number;
  private readonly volatility: number;
  private readonly listedAt: number;
  private readonly now: () => number;

  constructor(options: SyntheticSourceOptions = {}) {
    this.seed = options.seed ?? 0x5eed;
    this.startPrice = options.startPrice ?? 100;
    this.volatility = options.volatility ?? 0.8;
    this.listedAt = options.listedAt ?? 0;
    this.now = options.now ?? Date.now;
  }

  async fetchPage(
    symbol: string,
    timeframe: Timeframe,
    startTime: number,
    limit: number,
  ): Promise<CandlePage> {
    const now = this.now();
    const windowEnd = startTime + limit * timeframe.stepMs;
    const candles: RawCandle[] = [];

    for (let openTime = startTime; openTime < windowEnd && openTime <= now; openTime += timeframe.stepMs) {
      if (openTime >= this.listedAt) {
        candles.push(this.candleAt(symbol, timeframe, openTime));
      }
    }

    return { candles, nextCursor: windowEnd <= now ? windowEnd : null };
  }

  candleAt(symbol: string, timeframe: Timeframe, openTime: number): RawCandle {
    const rng = mulberry32(
      (this.seed ^ hashString(`${symbol}:${timeframe.id}:${openTime}`)) >>> 0,
    );
    const wave = Math.sin(openTime / (timeframe.stepMs * 240));
    const drift = (rng() - 0.5) * this.volatility;
    const open = Math.max(1, this.startPrice * (1 + 0.05 * wave) + drift);
    const close = Math.max(1, open + (rng() - 0.5) * this.volatility);
    const high = Math.max(open, close) + rng() * (this.volatility / 2);
    const low = Math.min(open, close) - rng() * (this.volatility / 2);
    const volume = 10_000 + rng() * 5_000;

    return { openTime, open, high, low, close, volume };
  }
}
