import type { EquityPoint, EquityTrade, TradeWithMetrics } from "./types";

/**
 * Orders trades by close date and walks them once, carrying cumulative net
 * P&L and its running peak. Trades sharing a date keep their input order.
 *
 * Both the cumulative P&L and the peak start at 0, so a losing first trade
 * is already in drawdown. Drawdown percent is relative to the peak and is 0
 * while the peak is still 0.
 */
export function buildEquitySeries(
  trades: readonly TradeWithMetrics[],
): EquityTrade[] {
  const ordered = [...trades].sort((a, b) =>
    a.date < b.date ? -1 : a.date > b.date ? 1 : 0,
  );

  let cumulativePnl = 0;
  let peak = 0;

  return ordered.map((trade) => {
    cumulativePnl += trade.netPnl;
    peak = Math.max(peak, cumulativePnl);
    const drawdown = cumulativePnl - peak;

    return {
      ...trade,
      cumulativePnl,
      peak,
      drawdown,
      drawdownPct: peak > 0 ? (drawdown / peak) * 100 : 0,
    };
  });
}

export function equityCurve(series: readonly EquityTrade[]): EquityPoint[] {
  return series.map((trade) => ({
    date: trade.date,
    equity: trade.cumulativePnl,
    drawdown: trade.drawdown,
  }));
}

export function hasEquityFields(
  trade: TradeWithMetrics,
): trade is EquityTrade {
  return "drawdown" in trade && "drawdownPct" in trade;
}
