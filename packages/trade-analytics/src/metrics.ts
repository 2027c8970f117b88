import type { TradeMetrics, TradeRecord, TradeWithMetrics } from "./types";

/** Price-move profit before costs. Shorts profit when price falls. */
export function grossPnlFor(
  trade: Pick<TradeRecord, "side" | "entryPrice" | "exitPrice" | "quantity">,
): number {
  const move =
    trade.side === "long"
      ? trade.exitPrice - trade.entryPrice
      : trade.entryPrice - trade.exitPrice;

  return move * trade.quantity;
}

export function deriveMetrics(trade: TradeRecord): TradeMetrics {
  const grossPnl = grossPnlFor(trade);
  const netPnl = grossPnl - trade.commission;

  return {
    grossPnl,
    netPnl,
    // Unrecorded risk counts as 0R instead of being dropped.
    rMultiple: trade.riskAmount > 0 ? grossPnl / trade.riskAmount : 0,
    isWinner: netPnl > 0,
  };
}

export function withMetrics(trade: TradeRecord): TradeWithMetrics {
  return { ...trade, ...deriveMetrics(trade) };
}

export function applyMetrics(
  trades: readonly TradeRecord[],
): TradeWithMetrics[] {
  return trades.map(withMetrics);
}
