import pino from "pino";

export const logger = pino({
  name: "candle-tape",
  level: process.env.LOG_LEVEL ?? "info",
});
