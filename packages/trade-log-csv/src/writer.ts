import {
  defaultTradeLogSchema,
  schemaColumns,
  tradeFieldOrder,
  type EquityTrade,
  type TradeLogSchema,
} from "@repo/trade-analytics";

export interface WriteTradeLogOptions {
  schema?: TradeLogSchema;
}

const derivedColumns = [
  ["grossPnl", "gross_pnl"],
  ["netPnl", "net_pnl"],
  ["rMultiple", "r_multiple"],
  ["isWinner", "is_winner"],
  ["cumulativePnl", "cumulative_pnl"],
  ["peak", "peak"],
  ["drawdown", "drawdown"],
  ["drawdownPct", "drawdown_pct"],
] as const satisfies readonly (readonly [keyof EquityTrade, string])[];

export function escapeCsvCell(value: string | number | boolean): string {
  const text = String(value);
  if (!/[",\r\n]/.test(text)) return text;
  return `"${text.replace(/"/g, '""')}"`;
}

function toLine(cells: readonly (string | number | boolean)[]): string {
  return cells.map(escapeCsvCell).join(",");
}

/** Raw columns in schema order followed by every derived column. */
export function toTradeLogCsv(
  trades: readonly EquityTrade[],
  options: WriteTradeLogOptions = {},
): string {
  const schema = options.schema ?? defaultTradeLogSchema;
  const header = [
    ...schemaColumns(schema),
    ...derivedColumns.map(([, column]) => column),
  ];

  const lines = trades.map((trade) =>
    toLine([
      ...tradeFieldOrder.map((field) => trade[field]),
      ...derivedColumns.map(([field]) => trade[field]),
    ]),
  );

  return [toLine(header), ...lines].join("\n") + "\n";
}

export function tradeLogTemplate(
  schema: TradeLogSchema = defaultTradeLogSchema,
): string {
  const example = {
    date: "2024-03-04",
    symbol: "MSFT",
    side: "long",
    entryPrice: "410.50",
    exitPrice: "415.25",
    quantity: "20",
    commission: "1.50",
    riskAmount: "95.00",
    category: "breakout",
    notes: "Example row",
  } satisfies Record<(typeof tradeFieldOrder)[number], string>;

  return [
    toLine(schemaColumns(schema)),
    toLine(tradeFieldOrder.map((field) => example[field])),
  ].join("\n") + "\n";
}
