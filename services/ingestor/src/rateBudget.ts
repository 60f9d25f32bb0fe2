import Bottleneck from "bottleneck";
import type { Logger } from "pino";
import { wait } from "./wait.ts";

export interface RateBudgetOptions {
  requestsPerInterval: number;
  intervalMs: number;
  maxConcurrent: number;
  logger: Logger;
  now?: () => number;
}

/**
 * Process-wide request budget shared by every fetch. Callers queue until
 * the reservoir refills instead of failing.
 */
export class RateBudget {
  private readonly limiter: Bottleneck;
  private readonly logger: Logger;
  private readonly now: () => number;
  private resumeAtMs = 0;

  constructor(options: RateBudgetOptions) {
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
    this.limiter = new Bottleneck({
      maxConcurrent: options.maxConcurrent,
      reservoir: options.requestsPerInterval,
      reservoirRefreshAmount: options.requestsPerInterval,
      reservoirRefreshInterval: options.intervalMs,
    });

    this.limiter.on("depleted", () => {
      this.logger.debug("rate budget depleted, queueing requests");
    });
  }

  schedule<T>(task: () => Promise<T>): Promise<T> {
    return this.limiter.schedule(async () => {
      const delay = this.resumeAtMs - this.now();
      if (delay > 0) {
        await wait(delay);
      }
      return task();
    });
  }

  /**
   * Holds every queued request until `epochMs`, e.g. when the exchange
   * reports an exhausted quota.
   */
  pauseUntil(epochMs: number): void {
    if (epochMs <= this.resumeAtMs) {
      return;
    }
    this.resumeAtMs = epochMs;
    this.logger.warn(
      { resumeAt: new Date(epochMs).toISOString() },
      "exchange quota exhausted, pausing requests",
    );
  }

  async stop(): Promise<void> {
    await this.limiter.disconnect();
  }
}
