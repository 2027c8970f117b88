import { createAnalyticsConfig, type AnalyticsConfig } from "./config";
import { buildEquitySeries } from "./equity";
import { isValidationError } from "./errors";
import { groupByCategory, groupByMonth, groupBySymbol } from "./grouping";
import { loadTrades } from "./loader";
import { consoleLogger, type Logger } from "./logger";
import { applyMetrics } from "./metrics";
import type { TradeLogSchema } from "./schema";
import { summarize } from "./summary";
import type { RawTradeRow, TradeAnalysis, TradeRecord } from "./types";

export interface AnalyzeOptions {
  config?: Partial<AnalyticsConfig>;
  schema?: TradeLogSchema;
  logger?: Logger;
}

function withCategory(trade: TradeRecord, fallback: string): TradeRecord {
  const category = trade.category.trim() || fallback;
  return category === trade.category ? trade : { ...trade, category };
}

/**
 * Analyzes records that are already validated. Blank categories take the
 * configured sentinel here as well, so every returned record carries the
 * key of the category group it is counted in.
 */
export function analyzeTrades(
  trades: readonly TradeRecord[],
  options: AnalyzeOptions = {},
): TradeAnalysis {
  const config = createAnalyticsConfig(options.config);
  const logger = options.logger ?? consoleLogger;
  const summaryOptions = { zeroLossPayoff: config.zeroLossPayoff };

  const series = buildEquitySeries(
    applyMetrics(
      trades.map((trade) => withCategory(trade, config.uncategorizedLabel)),
    ),
  );

  const analysis: TradeAnalysis = {
    summary: summarize(series, summaryOptions),
    byCategory: groupByCategory(series, {
      ...summaryOptions,
      uncategorizedLabel: config.uncategorizedLabel,
    }),
    byMonth: groupByMonth(series, summaryOptions),
    bySymbol: groupBySymbol(series, summaryOptions),
    trades: series,
  };

  const unriskedTrades = series.filter((trade) => trade.riskAmount <= 0).length;
  if (unriskedTrades > 0) {
    logger.warn("Trades without risk amount count as 0R", { unriskedTrades });
  }

  logger.info("Trade log analyzed", {
    trades: series.length,
    categories: analysis.byCategory.length,
    months: analysis.byMonth.length,
    symbols: analysis.bySymbol.length,
    totalPnl: analysis.summary.totalPnl,
  });

  return analysis;
}

/**
 * Full pipeline from raw journal rows. A row that fails validation aborts
 * the run with its `ValidationError`; nothing partial is returned.
 */
export function analyzeTradeLog(
  rows: readonly RawTradeRow[],
  options: AnalyzeOptions = {},
): TradeAnalysis {
  const config = createAnalyticsConfig(options.config);
  const logger = options.logger ?? consoleLogger;

  let trades: TradeRecord[];
  try {
    trades = loadTrades(rows, {
      schema: options.schema,
      uncategorizedLabel: config.uncategorizedLabel,
    });
  } catch (error) {
    if (isValidationError(error)) {
      logger.error("Trade log rejected", {
        rowIndex: error.rowIndex,
        field: error.field,
        reason: error.reason,
      });
    }
    throw error;
  }

  return analyzeTrades(trades, { ...options, config, logger });
}
