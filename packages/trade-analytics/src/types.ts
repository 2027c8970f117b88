export type TradeSide = "long" | "short";

/**
 * One closed trade as read from the journal. Prices and amounts are in the
 * account currency; `date` is the calendar day the trade closed, formatted
 * `YYYY-MM-DD`, which also makes it sort lexicographically.
 */
export interface TradeRecord {
  date: string;
  symbol: string;
  side: TradeSide;
  entryPrice: number;
  exitPrice: number;
  quantity: number;
  commission: number;
  /** Capital placed at risk. `0` means the risk was not recorded. */
  riskAmount: number;
  category: string;
  notes: string;
}

export interface TradeMetrics {
  grossPnl: number;
  netPnl: number;
  rMultiple: number;
  isWinner: boolean;
}

export type TradeWithMetrics = TradeRecord & TradeMetrics;

export interface EquityFields {
  cumulativePnl: number;
  peak: number;
  drawdown: number;
  drawdownPct: number;
}

/**
 * A trade positioned on the equity curve. The equity fields only make sense
 * relative to the full chronological set they were computed from.
 */
export type EquityTrade = TradeWithMetrics & EquityFields;

export interface EquityPoint {
  date: string;
  equity: number;
  drawdown: number;
}

export interface SummaryStats {
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  /** Percent, 0..100. */
  winRate: number;
  avgWin: number;
  avgLoss: number;
  payoffRatio: number;
  totalPnl: number;
  avgPnl: number;
  totalCommission: number;
  expectancy: number;
  avgRMultiple: number;
  maxDrawdown: number;
  maxDrawdownPct: number;
}

export interface GroupSummary {
  key: string;
  stats: SummaryStats;
}

export type GroupedStats = GroupSummary[];

export interface TradeAnalysis {
  summary: SummaryStats;
  byCategory: GroupedStats;
  byMonth: GroupedStats;
  bySymbol: GroupedStats;
  trades: EquityTrade[];
}

export type RawTradeRow = Record<string, string | undefined>;
