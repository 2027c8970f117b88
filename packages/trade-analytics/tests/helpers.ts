import { withMetrics } from "../src/metrics";
import type { RawTradeRow, TradeRecord, TradeWithMetrics } from "../src/types";

export function trade(overrides: Partial<TradeRecord> = {}): TradeRecord {
  return {
    date: "2024-01-02",
    symbol: "TEST",
    side: "long",
    entryPrice: 100,
    exitPrice: 110,
    quantity: 10,
    commission: 0,
    riskAmount: 0,
    category: "breakout",
    notes: "",
    ...overrides,
  };
}

/**
 * A long trade of one unit from 1000 whose net P&L is exactly `netPnl`
 * (integers only, so the arithmetic stays exact).
 */
export function pnlTrade(
  date: string,
  netPnl: number,
  overrides: Partial<TradeRecord> = {},
): TradeWithMetrics {
  return withMetrics(
    trade({
      date,
      entryPrice: 1000,
      exitPrice: 1000 + netPnl,
      quantity: 1,
      commission: 0,
      ...overrides,
    }),
  );
}

export function row(overrides: RawTradeRow = {}): RawTradeRow {
  return {
    date: "2024-01-02",
    symbol: "TEST",
    side: "long",
    entry_price: "100",
    exit_price: "110",
    quantity: "10",
    commission: "5",
    risk_amount: "50",
    setup: "breakout",
    notes: "",
    ...overrides,
  };
}
