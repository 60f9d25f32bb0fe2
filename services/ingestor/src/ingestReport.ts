import type { Logger } from "pino";
import type { PairOutcome } from "./ingestOrchestrator.ts";

/**
 * Logs every pair outcome and returns the process exit code: 1 when any
 * pair failed, 0 when every pair completed, was a no-op or was cancelled.
 */
export function reportOutcomes(outcomes: readonly PairOutcome[], logger: Logger): number {
  let failed = 0;
  for (const outcome of outcomes) {
    const pair = { symbol: outcome.symbol, timeframe: outcome.timeframe.id };
    if (outcome.ok) {
      logger.info({ ...pair, ...outcome.result }, "pair done");
    } else {
      failed += 1;
      logger.error({ ...pair, error: outcome.error }, "pair failed");
    }
  }
  return failed > 0 ? 1 : 0;
}
