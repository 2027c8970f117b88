import type { SummaryStats } from "./types";

const currencyFormat = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  maximumFractionDigits: 2,
});

export function formatCurrency(value: number): string {
  return currencyFormat.format(value);
}

/** `value` is already in percent units (`62.5` → `62.50%`). */
export function formatPercent(value: number): string {
  return `${value.toFixed(2)}%`;
}

export function formatRatio(value: number): string {
  if (value === Number.POSITIVE_INFINITY) return "∞";
  return value.toFixed(2);
}

export function formatSummaryLines(stats: SummaryStats): string[] {
  return [
    `Total trades: ${stats.totalTrades}`,
    `Winning trades: ${stats.winningTrades}`,
    `Losing trades: ${stats.losingTrades}`,
    `Win rate: ${formatPercent(stats.winRate)}`,
    `Payoff ratio: ${formatRatio(stats.payoffRatio)}`,
    `Expectancy: ${formatCurrency(stats.expectancy)}`,
    `Average R-multiple: ${formatRatio(stats.avgRMultiple)}`,
    `Total P&L: ${formatCurrency(stats.totalPnl)}`,
    `Total commission: ${formatCurrency(stats.totalCommission)}`,
    `Average win: ${formatCurrency(stats.avgWin)}`,
    `Average loss: ${formatCurrency(stats.avgLoss)}`,
    `Max drawdown: ${formatCurrency(stats.maxDrawdown)} (${formatPercent(stats.maxDrawdownPct)})`,
  ];
}
