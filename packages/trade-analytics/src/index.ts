/**
 * `@repo/trade-analytics` turns a journal of closed trades into performance
 * statistics. Nothing here touches the filesystem; reading and writing
 * journal files lives in `@repo/trade-log-csv`.
 */
export * from "./types";
export * from "./config";
export * from "./errors";
export * from "./logger";
export * from "./schema";
export * from "./loader";
export * from "./metrics";
export * from "./equity";
export * from "./summary";
export * from "./grouping";
export * from "./filters";
export * from "./analysis";
export * from "./report";
export * from "./format";
