export * from "./binary.ts";
export * from "./errors.ts";
export * from "./manifest.ts";
export * from "./timeframe.ts";
export * from "./types.ts";
