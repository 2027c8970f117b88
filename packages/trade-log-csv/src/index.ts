import {
  analyzeTradeLog,
  type AnalyzeOptions,
  type TradeAnalysis,
} from "@repo/trade-analytics";
import { readTradeLogFile, type ReadTradeLogOptions } from "./reader";

export * from "./errors";
export * from "./reader";
export * from "./writer";

export type LoadTradeLogFileOptions = AnalyzeOptions &
  Pick<ReadTradeLogOptions, "separator">;

export async function loadTradeLogFile(
  path: string,
  options: LoadTradeLogFileOptions = {},
): Promise<TradeAnalysis> {
  const rows = await readTradeLogFile(path, {
    schema: options.schema,
    separator: options.separator,
  });
  return analyzeTradeLog(rows, options);
}
