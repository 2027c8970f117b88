import type { ZeroLossPayoff } from "./config";
import { hasEquityFields } from "./equity";
import type { SummaryStats, TradeWithMetrics } from "./types";

export interface SummarizeOptions {
  zeroLossPayoff?: ZeroLossPayoff;
}

export const emptySummaryStats: SummaryStats = {
  totalTrades: 0,
  winningTrades: 0,
  losingTrades: 0,
  winRate: 0,
  avgWin: 0,
  avgLoss: 0,
  payoffRatio: 0,
  totalPnl: 0,
  avgPnl: 0,
  totalCommission: 0,
  expectancy: 0,
  avgRMultiple: 0,
  maxDrawdown: 0,
  maxDrawdownPct: 0,
};

function sum(values: readonly number[]): number {
  return values.reduce((acc, value) => acc + value, 0);
}

function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : sum(values) / values.length;
}

export function payoffRatioFor(
  avgWin: number,
  avgLoss: number,
  zeroLossPayoff: ZeroLossPayoff = "infinity",
): number {
  if (avgLoss !== 0) return Math.abs(avgWin / avgLoss);
  if (avgWin === 0) return 0;
  return zeroLossPayoff === "infinity" ? Number.POSITIVE_INFINITY : 0;
}

/**
 * Reduces any set of trades to summary statistics. Order does not matter.
 * Drawdown figures are read from trades that already carry equity fields
 * from a full-set pass; they are never recomputed here, so a subset reports
 * the drawdown its trades saw in the full run.
 */
export function summarize(
  trades: readonly TradeWithMetrics[],
  options: SummarizeOptions = {},
): SummaryStats {
  const totalTrades = trades.length;
  if (totalTrades === 0) return { ...emptySummaryStats };

  const winners = trades.filter((trade) => trade.isWinner);
  const nonWinners = trades.filter((trade) => !trade.isWinner);

  const winRate = (winners.length / totalTrades) * 100;
  const avgWin = mean(winners.map((trade) => trade.netPnl));
  const avgLoss = mean(nonWinners.map((trade) => trade.netPnl));
  const totalPnl = sum(trades.map((trade) => trade.netPnl));

  let maxDrawdown = 0;
  let maxDrawdownPct = 0;
  for (const trade of trades) {
    if (!hasEquityFields(trade)) continue;
    maxDrawdown = Math.min(maxDrawdown, trade.drawdown);
    maxDrawdownPct = Math.min(maxDrawdownPct, trade.drawdownPct);
  }

  return {
    totalTrades,
    winningTrades: winners.length,
    losingTrades: nonWinners.length,
    winRate,
    avgWin,
    avgLoss,
    payoffRatio: payoffRatioFor(avgWin, avgLoss, options.zeroLossPayoff),
    totalPnl,
    avgPnl: totalPnl / totalTrades,
    totalCommission: sum(trades.map((trade) => trade.commission)),
    expectancy: (winRate / 100) * avgWin + (1 - winRate / 100) * avgLoss,
    avgRMultiple: mean(trades.map((trade) => trade.rMultiple)),
    maxDrawdown,
    maxDrawdownPct,
  };
}
