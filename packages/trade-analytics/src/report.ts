import {
  createAnalyticsConfig,
  defaultAnalyticsConfig,
  type AnalyticsConfig,
} from "./config";
import { groupedStatsToRecord } from "./grouping";
import type {
  EquityTrade,
  GroupedStats,
  SummaryStats,
  TradeAnalysis,
} from "./types";

export type ReportNumber = number | "Infinity" | "-Infinity";

export type ReportStats = Record<keyof SummaryStats, ReportNumber>;

export interface TradeReportDocument {
  generatedAt?: string;
  summary: ReportStats;
  byCategory: Record<string, ReportStats>;
  byMonth: Record<string, ReportStats>;
  bySymbol: Record<string, ReportStats>;
  trades: EquityTrade[];
}

export interface ReportOptions {
  config?: Partial<AnalyticsConfig>;
  /** Overrides `config.reportPrecision`, under the same 0..10 rule. */
  precision?: number;
  indent?: number;
  generatedAt?: string;
}

/** Infinity survives rounding; `-0` comes back as `0`. */
export function roundTo(value: number, decimals: number): number {
  if (!Number.isFinite(value)) return value;
  return Number(value.toFixed(decimals)) || 0;
}

export function roundStats(
  stats: SummaryStats,
  decimals = defaultAnalyticsConfig.reportPrecision,
): SummaryStats {
  return {
    ...stats,
    winRate: roundTo(stats.winRate, decimals),
    avgWin: roundTo(stats.avgWin, decimals),
    avgLoss: roundTo(stats.avgLoss, decimals),
    payoffRatio: roundTo(stats.payoffRatio, decimals),
    totalPnl: roundTo(stats.totalPnl, decimals),
    avgPnl: roundTo(stats.avgPnl, decimals),
    totalCommission: roundTo(stats.totalCommission, decimals),
    expectancy: roundTo(stats.expectancy, decimals),
    avgRMultiple: roundTo(stats.avgRMultiple, decimals),
    maxDrawdown: roundTo(stats.maxDrawdown, decimals),
    maxDrawdownPct: roundTo(stats.maxDrawdownPct, decimals),
  };
}

function roundGroups(groups: GroupedStats, decimals: number): GroupedStats {
  return groups.map(({ key, stats }) => ({
    key,
    stats: roundStats(stats, decimals),
  }));
}

/** Rounds computed amounts only; prices and quantities are left as loaded. */
export function roundTrade(trade: EquityTrade, decimals: number): EquityTrade {
  return {
    ...trade,
    grossPnl: roundTo(trade.grossPnl, decimals),
    netPnl: roundTo(trade.netPnl, decimals),
    rMultiple: roundTo(trade.rMultiple, decimals),
    cumulativePnl: roundTo(trade.cumulativePnl, decimals),
    peak: roundTo(trade.peak, decimals),
    drawdown: roundTo(trade.drawdown, decimals),
    drawdownPct: roundTo(trade.drawdownPct, decimals),
  };
}

export function roundAnalysis(
  analysis: TradeAnalysis,
  decimals = defaultAnalyticsConfig.reportPrecision,
): TradeAnalysis {
  return {
    summary: roundStats(analysis.summary, decimals),
    byCategory: roundGroups(analysis.byCategory, decimals),
    byMonth: roundGroups(analysis.byMonth, decimals),
    bySymbol: roundGroups(analysis.bySymbol, decimals),
    trades: analysis.trades.map((trade) => roundTrade(trade, decimals)),
  };
}

export function encodeReportNumber(value: number): ReportNumber {
  if (value === Number.POSITIVE_INFINITY) return "Infinity";
  if (value === Number.NEGATIVE_INFINITY) return "-Infinity";
  return value;
}

function encodeStats(stats: SummaryStats): ReportStats {
  const encode = encodeReportNumber;
  return {
    totalTrades: encode(stats.totalTrades),
    winningTrades: encode(stats.winningTrades),
    losingTrades: encode(stats.losingTrades),
    winRate: encode(stats.winRate),
    avgWin: encode(stats.avgWin),
    avgLoss: encode(stats.avgLoss),
    payoffRatio: encode(stats.payoffRatio),
    totalPnl: encode(stats.totalPnl),
    avgPnl: encode(stats.avgPnl),
    totalCommission: encode(stats.totalCommission),
    expectancy: encode(stats.expectancy),
    avgRMultiple: encode(stats.avgRMultiple),
    maxDrawdown: encode(stats.maxDrawdown),
    maxDrawdownPct: encode(stats.maxDrawdownPct),
  };
}

function encodeGroups(groups: GroupedStats): Record<string, ReportStats> {
  return Object.fromEntries(
    Object.entries(groupedStatsToRecord(groups)).map(([key, stats]) => [
      key,
      encodeStats(stats),
    ]),
  );
}

/**
 * JSON has no infinity, so the payoff sentinel is written as the string
 * `"Infinity"`. Groups become key → stats objects; their insertion order
 * keeps the presentation order of the analysis.
 */
export function toReportDocument(
  analysis: TradeAnalysis,
  generatedAt?: string,
): TradeReportDocument {
  return {
    ...(generatedAt ? { generatedAt } : {}),
    summary: encodeStats(analysis.summary),
    byCategory: encodeGroups(analysis.byCategory),
    byMonth: encodeGroups(analysis.byMonth),
    bySymbol: encodeGroups(analysis.bySymbol),
    trades: analysis.trades,
  };
}

export function serializeReport(
  analysis: TradeAnalysis,
  options: ReportOptions = {},
): string {
  const { reportPrecision: precision } = createAnalyticsConfig({
    ...options.config,
    reportPrecision: options.precision,
  });
  const document = toReportDocument(
    roundAnalysis(analysis, precision),
    options.generatedAt,
  );

  return JSON.stringify(document, null, options.indent ?? 2);
}
