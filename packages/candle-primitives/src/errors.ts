export class CandleTapeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

interface FetchErrorContext {
  symbol: string;
  timeframe: string;
  /** HTTP status, when a response arrived. */
  status?: number;
  /** Exchange return code, when the body parsed. */
  retCode?: number;
  cause?: unknown;
}

/**
 * Network failure, timeout, 5xx or rate-limit response that outlasted the
 * client's retries. The orchestrator may reschedule the window.
 */
export class TransientFetchError extends CandleTapeError {
  readonly symbol: string;
  readonly timeframe: string;
  readonly status?: number;
  readonly retCode?: number;
  readonly attempts: number;

  constructor(message: string, context: FetchErrorContext & { attempts: number }) {
    super(message, { cause: context.cause });
    this.symbol = context.symbol;
    this.timeframe = context.timeframe;
    this.status = context.status;
    this.retCode = context.retCode;
    this.attempts = context.attempts;
  }
}

/**
 * The exchange refused the request itself (unknown symbol, bad parameter).
 */
export class PermanentFetchError extends CandleTapeError {
  readonly symbol: string;
  readonly timeframe: string;
  readonly status?: number;
  readonly retCode?: number;

  constructor(message: string, context: FetchErrorContext) {
    super(message, { cause: context.cause });
    this.symbol = context.symbol;
    this.timeframe = context.timeframe;
    this.status = context.status;
    this.retCode = context.retCode;
  }
}

export class ValidationError extends CandleTapeError {
  readonly openTime: number;

  constructor(message: string, openTime: number) {
    super(message);
    this.openTime = openTime;
  }
}

export class StaleWriteError extends CandleTapeError {
  readonly watermark: number;
  readonly firstOpenTime: number;

  constructor(watermark: number, firstOpenTime: number) {
    super(
      `Append at ${firstOpenTime} is at or behind watermark ${watermark}`,
    );
    this.watermark = watermark;
    this.firstOpenTime = firstOpenTime;
  }
}

export class DiscontinuityError extends CandleTapeError {
  readonly expectedOpenTime: number;
  readonly actualOpenTime: number;

  constructor(expectedOpenTime: number, actualOpenTime: number) {
    super(`Expected candle at ${expectedOpenTime}, got ${actualOpenTime}`);
    this.expectedOpenTime = expectedOpenTime;
    this.actualOpenTime = actualOpenTime;
  }
}

export class ConcurrentIngestionError extends CandleTapeError {
  readonly symbol: string;
  readonly timeframe: string;

  constructor(symbol: string, timeframe: string, detail: string) {
    super(`Ingestion for ${symbol} ${timeframe} already in progress: ${detail}`);
    this.symbol = symbol;
    this.timeframe = timeframe;
  }
}

export class CorruptPartitionError extends CandleTapeError {
  readonly path: string;

  constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super(`Corrupt partition ${path}: ${reason}`, options);
    this.path = path;
  }
}
