import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
  type Candle,
  parseTimeframe,
  type RawCandle,
  type Timeframe,
} from "@candle-tape/candle-primitives";
import pino, { type Logger } from "pino";
import type { CandlePage, CandleSource } from "../candleSource.ts";

export const T0 = Date.UTC(2024, 0, 1); // 2024-01-01T00:00:00Z
export const MINUTE = 60_000;
export const ONE_MINUTE = parseTimeframe("1m");

export const silentLogger = pino({ level: "silent" });

/**
 * Logger that keeps each record it writes, for asserting on warnings.
 */
export function captureLogger(): { logger: Logger; records: Array<Record<string, unknown>> } {
  const records: Array<Record<string, unknown>> = [];
  const logger = pino(
    { level: "debug" },
    {
      write(line: string) {
        records.push(JSON.parse(line));
      },
    },
  );
  return { logger, records };
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "candle-tape-"));
}

export function row(openTime: number, price = 100): RawCandle {
  return {
    openTime,
    open: price,
    high: price + 1,
    low: price - 1,
    close: price + 0.5,
    volume: 10,
  };
}

export function candle(openTime: number, price = 100, symbol = "BTCUSDT"): Candle {
  return { symbol, timeframe: "1m", ...row(openTime, price) };
}

export function minutes(start: number, count: number): number[] {
  return Array.from({ length: count }, (_, index) => start + index * MINUTE);
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

interface ScriptedSourceOptions {
  /** Candle at an open time, or `null` where the exchange has none. */
  candleAt: (openTime: number) => RawCandle | null;
  now: number;
  /** Open times left out the first time a page covers them. */
  missingOnce?: Iterable<number>;
  maxPageLimit?: number;
}

/**
 * In-process exchange stand-in that records every page request.
 */
export class ScriptedSource implements CandleSource {
  readonly maxPageLimit: number;
  readonly calls: Array<{ symbol: string; startTime: number; limit: number }> = [];

  private readonly candleAt: (openTime: number) => RawCandle | null;
  private readonly now: number;
  private readonly missingOnce: Set<number>;
  private readonly failures: Error[] = [];

  constructor(options: ScriptedSourceOptions) {
    this.candleAt = options.candleAt;
    this.now = options.now;
    this.missingOnce = new Set(options.missingOnce ?? []);
    this.maxPageLimit = options.maxPageLimit ?? 1000;
  }

  failNext(...errors: Error[]): void {
    this.failures.push(...errors);
  }

  async fetchPage(
    symbol: string,
    timeframe: Timeframe,
    startTime: number,
    limit: number,
  ): Promise<CandlePage> {
    this.calls.push({ symbol, startTime, limit });
    const failure = this.failures.shift();
    if (failure) {
      throw failure;
    }

    const windowEnd = startTime + limit * timeframe.stepMs;
    const candles: RawCandle[] = [];
    for (let openTime = startTime; openTime < windowEnd && openTime <= this.now; openTime += timeframe.stepMs) {
      if (this.missingOnce.delete(openTime)) {
        continue;
      }
      const found = this.candleAt(openTime);
      if (found) {
        candles.push(found);
      }
    }
    return { candles, nextCursor: windowEnd <= this.now ? windowEnd : null };
  }
}
