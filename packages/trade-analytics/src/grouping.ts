import { defaultAnalyticsConfig } from "./config";
import { summarize, type SummarizeOptions } from "./summary";
import type { GroupedStats, SummaryStats, TradeWithMetrics } from "./types";

export interface GroupOptions extends SummarizeOptions {
  uncategorizedLabel?: string;
}

export type GroupKeyFn<T extends TradeWithMetrics> = (trade: T) => string;

/** `YYYY-MM` bucket of a `YYYY-MM-DD` date. */
export function monthKey(trade: Pick<TradeWithMetrics, "date">): string {
  return trade.date.slice(0, 7);
}

export function partitionBy<T extends TradeWithMetrics>(
  trades: readonly T[],
  keyFn: GroupKeyFn<T>,
): Map<string, T[]> {
  const groups = new Map<string, T[]>();

  for (const trade of trades) {
    const key = keyFn(trade);
    const bucket = groups.get(key);
    if (bucket) {
      bucket.push(trade);
    } else {
      groups.set(key, [trade]);
    }
  }

  return groups;
}

/** Groups come back in the order their keys were first seen. */
export function groupBy<T extends TradeWithMetrics>(
  trades: readonly T[],
  keyFn: GroupKeyFn<T>,
  options: SummarizeOptions = {},
): GroupedStats {
  return [...partitionBy(trades, keyFn)].map(([key, members]) => ({
    key,
    stats: summarize(members, options),
  }));
}

function byTotalPnlDesc(groups: GroupedStats): GroupedStats {
  return [...groups].sort((a, b) => b.stats.totalPnl - a.stats.totalPnl);
}

export function groupByCategory<T extends TradeWithMetrics>(
  trades: readonly T[],
  options: GroupOptions = {},
): GroupedStats {
  const fallback =
    options.uncategorizedLabel ?? defaultAnalyticsConfig.uncategorizedLabel;

  return byTotalPnlDesc(
    groupBy(trades, (trade) => trade.category.trim() || fallback, options),
  );
}

export function groupBySymbol<T extends TradeWithMetrics>(
  trades: readonly T[],
  options: SummarizeOptions = {},
): GroupedStats {
  return byTotalPnlDesc(groupBy(trades, (trade) => trade.symbol, options));
}

export function groupByMonth<T extends TradeWithMetrics>(
  trades: readonly T[],
  options: SummarizeOptions = {},
): GroupedStats {
  return groupBy(trades, monthKey, options).sort((a, b) =>
    a.key < b.key ? -1 : a.key > b.key ? 1 : 0,
  );
}

export function groupedStatsToRecord(
  groups: GroupedStats,
): Record<string, SummaryStats> {
  return Object.fromEntries(groups.map(({ key, stats }) => [key, stats]));
}
