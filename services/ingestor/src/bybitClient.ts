import {
  isAligned,
  PermanentFetchError,
  type RawCandle,
  type Timeframe,
  TransientFetchError,
} from "@candle-tape/candle-primitives";
import type { Logger } from "pino";
import { z } from "zod";
import type { CandlePage, CandleSource } from "./candleSource.ts";
import type { RateBudget } from "./rateBudget.ts";
import { wait } from "./wait.ts";

export type BybitCategory = "spot" | "linear" | "inverse";

export interface BybitInstrument {
  symbol: string;
  baseCoin: string;
  quoteCoin: string;
  status: string;
}

interface BybitClientOptions {
  baseUrl: string;
  category: BybitCategory;
  budget: RateBudget;
  logger: Logger;
  timeoutMs?: number;
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  fetchImpl?: typeof fetch;
}

export const BYBIT_MAX_PAGE_LIMIT = 1000;

const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_MAX_RETRIES = 5;
const DEFAULT_BASE_DELAY_MS = 500;
const DEFAULT_MAX_DELAY_MS = 30_000;

// 10000 server timeout, 10006 too many visits, 10016 server error
const TRANSIENT_RET_CODES = new Set([10000, 10006, 10016]);

const envelopeSchema = z.object({
  retCode: z.number(),
  retMsg: z.string(),
  result: z.unknown(),
  time: z.number().optional(),
});

const klineResultSchema = z.object({
  list: z.array(z.array(z.string())),
});

const instrumentsResultSchema = z.object({
  list: z.array(
    z.object({
      symbol: z.string(),
      baseCoin: z.string(),
      quoteCoin: z.string(),
      status: z.string(),
    }),
  ),
  nextPageCursor: z.string().optional(),
});

interface RequestContext {
  symbol: string;
  timeframe: string;
}

interface Envelope {
  result: unknown;
  serverTimeMs: number;
}

class RetryableFailure extends Error {
  readonly status?: number;
  readonly retCode?: number;

  constructor(message: string, details: { status?: number; retCode?: number; cause?: unknown } = {}) {
    super(message, { cause: details.cause });
    this.status = details.status;
    this.retCode = details.retCode;
  }
}

/**
 * Client for the Bybit v5 public market endpoints.
 */
export class BybitClient implements CandleSource {
  readonly maxPageLimit = BYBIT_MAX_PAGE_LIMIT;

  private readonly options: Required<Omit<BybitClientOptions, "fetchImpl">>;
  private readonly fetchImpl: typeof fetch;

  constructor(options: BybitClientOptions) {
    this.options = {
      ...options,
      timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      maxRetries: options.maxRetries ?? DEFAULT_MAX_RETRIES,
      baseDelayMs: options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS,
      maxDelayMs: options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS,
    };
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetchPage(
    symbol: string,
    timeframe: Timeframe,
    startTime: number,
    limit: number,
  ): Promise<CandlePage> {
    const context = { symbol, timeframe: timeframe.id };
    if (!isAligned(timeframe, startTime)) {
      throw new PermanentFetchError(
        `Start time ${startTime} is not aligned to ${timeframe.id}`,
        context,
      );
    }
    if (!Number.isInteger(limit) || limit < 1 || limit > this.maxPageLimit) {
      throw new PermanentFetchError(
        `Page limit ${limit} outside 1..${this.maxPageLimit}`,
        context,
      );
    }

    const windowEnd = startTime + limit * timeframe.stepMs;
    const url = this.buildUrl("/v5/market/kline", {
      category: this.options.category,
      symbol,
      interval: timeframe.exchangeInterval,
      start: String(startTime),
      end: String(windowEnd - 1),
      limit: String(limit),
    });

    const envelope = await this.request(url, context);
    const parsed = klineResultSchema.safeParse(envelope.result);
    if (!parsed.success) {
      throw new TransientFetchError("Malformed kline result", {
        ...context,
        attempts: 1,
        cause: parsed.error,
      });
    }

    // Bybit lists newest first.
    const candles = parsed.data.list.map(toRawCandle).reverse();
    this.options.logger.debug(
      { ...context, startTime, limit, received: candles.length },
      "fetched kline page",
    );

    return {
      candles,
      nextCursor: windowEnd <= envelope.serverTimeMs ? windowEnd : null,
    };
  }

  async fetchInstruments(
    category: BybitCategory = this.options.category,
  ): Promise<BybitInstrument[]> {
    const context = { symbol: "*", timeframe: "-" };
    const instruments: BybitInstrument[] = [];
    let cursor: string | undefined;

    do {
      const params: Record<string, string> = { category, limit: "1000" };
      if (cursor) {
        params.cursor = cursor;
      }
      const envelope = await this.request(
        this.buildUrl("/v5/market/instruments-info", params),
        context,
      );
      const parsed = instrumentsResultSchema.safeParse(envelope.result);
      if (!parsed.success) {
        throw new TransientFetchError("Malformed instruments result", {
          ...context,
          attempts: 1,
          cause: parsed.error,
        });
      }
      instruments.push(
        ...parsed.data.list.map(({ symbol, baseCoin, quoteCoin, status }) => ({
          symbol,
          baseCoin,
          quoteCoin,
          status,
        })),
      );
      cursor = parsed.data.nextPageCursor || undefined;
    } while (cursor);

    this.options.logger.info(
      { category, count: instruments.length },
      "fetched instruments",
    );
    return instruments;
  }

  private buildUrl(pathname: string, params: Record<string, string>): URL {
    const url = new URL(pathname, this.options.baseUrl);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    return url;
  }

  private async request(url: URL, context: RequestContext): Promise<Envelope> {
    const { maxRetries, baseDelayMs, maxDelayMs, logger } = this.options;

    for (let attempt = 0; ; attempt += 1) {
      try {
        return await this.options.budget.schedule(() => this.send(url, context));
      } catch (error) {
        if (!(error instanceof RetryableFailure)) {
          throw error;
        }
        if (attempt >= maxRetries) {
          throw new TransientFetchError(
            `Giving up on ${url.pathname} after ${attempt + 1} attempts: ${error.message}`,
            {
              ...context,
              attempts: attempt + 1,
              status: error.status,
              retCode: error.retCode,
              cause: error,
            },
          );
        }
        const delayMs = Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);
        logger.warn(
          { ...context, attempt: attempt + 1, delayMs, reason: error.message },
          "retrying bybit request",
        );
        await wait(delayMs);
      }
    }
  }

  private async send(url: URL, context: RequestContext): Promise<Envelope> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw new RetryableFailure("network error", { cause: error });
    }

    this.trackQuota(response.headers);

    const { status } = response;
    if (status === 403 || status === 429 || status >= 500) {
      throw new RetryableFailure(`HTTP ${status}`, { status });
    }
    if (!response.ok) {
      throw new PermanentFetchError(`Bybit rejected request with HTTP ${status}`, {
        ...context,
        status,
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new RetryableFailure("unparsable response body", { status, cause: error });
    }

    const parsed = envelopeSchema.safeParse(body);
    if (!parsed.success) {
      throw new RetryableFailure("malformed response envelope", { status, cause: parsed.error });
    }

    const { retCode, retMsg, result, time } = parsed.data;
    if (retCode !== 0) {
      if (TRANSIENT_RET_CODES.has(retCode)) {
        throw new RetryableFailure(`retCode ${retCode}: ${retMsg}`, { status, retCode });
      }
      throw new PermanentFetchError(`Bybit retCode ${retCode}: ${retMsg}`, {
        ...context,
        status,
        retCode,
      });
    }

    return { result, serverTimeMs: time ?? Date.now() };
  }

  private trackQuota(headers: Headers): void {
    const remaining = headers.get("X-Bapi-Limit-Status");
    const resetAt = headers.get("X-Bapi-Limit-Reset-Timestamp");
    if (remaining === null || resetAt === null) {
      return;
    }
    if (Number(remaining) <= 0 && Number.isFinite(Number(resetAt))) {
      this.options.budget.pauseUntil(Number(resetAt));
    }
  }
}

function toRawCandle(row: string[]): RawCandle {
  const [openTime, open, high, low, close, volume] = row.map(Number);
  return {
    openTime: openTime ?? Number.NaN,
    open: open ?? Number.NaN,
    high: high ?? Number.NaN,
    low: low ?? Number.NaN,
    close: close ?? Number.NaN,
    volume: volume ?? Number.NaN,
  };
}
