import type { TradeRecord, TradeSide } from "./types";

export interface TradeFilter {
  symbols?: readonly string[];
  sides?: readonly TradeSide[];
  categories?: readonly string[];
  /** Inclusive lower bound, `YYYY-MM-DD`. */
  from?: string;
  /** Inclusive upper bound, `YYYY-MM-DD`. */
  to?: string;
}

function allows<T>(whitelist: readonly T[] | undefined, value: T): boolean {
  return !whitelist || whitelist.length === 0 || whitelist.includes(value);
}

export function matchesFilter(trade: TradeRecord, filter: TradeFilter): boolean {
  if (!allows(filter.symbols, trade.symbol)) return false;
  if (!allows(filter.sides, trade.side)) return false;
  if (!allows(filter.categories, trade.category)) return false;
  if (filter.from && trade.date < filter.from) return false;
  if (filter.to && trade.date > filter.to) return false;
  return true;
}

/**
 * Keeps input order and every field of the kept trades, including equity
 * fields from an earlier full-set pass.
 */
export function filterTrades<T extends TradeRecord>(
  trades: readonly T[],
  filter: TradeFilter,
): T[] {
  return trades.filter((trade) => matchesFilter(trade, filter));
}
