import type { z } from "zod";
import { defaultAnalyticsConfig } from "./config";
import { ValidationError } from "./errors";
import {
  defaultTradeLogSchema,
  tradeFieldSchemas,
  type TradeField,
  type TradeLogSchema,
} from "./schema";
import type { RawTradeRow, TradeRecord } from "./types";

export interface LoadTradesOptions {
  schema?: TradeLogSchema;
  uncategorizedLabel?: string;
}

function readField<S extends z.ZodType>(
  row: RawTradeRow,
  rowIndex: number,
  column: string,
  parser: S,
): z.output<S> {
  const result = parser.safeParse(row[column]);
  if (result.success) return result.data;

  const reason = result.error.issues[0]?.message ?? "is invalid";
  throw new ValidationError(rowIndex, column, reason);
}

export function parseTradeRow(
  row: RawTradeRow,
  rowIndex: number,
  options: LoadTradesOptions = {},
): TradeRecord {
  const schema = options.schema ?? defaultTradeLogSchema;
  const uncategorized =
    options.uncategorizedLabel ?? defaultAnalyticsConfig.uncategorizedLabel;
  const read = <K extends TradeField>(field: K) =>
    readField(row, rowIndex, schema[field], tradeFieldSchemas[field]);

  // Property order is validation order.
  const record: TradeRecord = {
    date: read("date"),
    symbol: read("symbol"),
    side: read("side"),
    entryPrice: read("entryPrice"),
    exitPrice: read("exitPrice"),
    quantity: read("quantity"),
    commission: read("commission"),
    riskAmount: read("riskAmount"),
    category: read("category") || uncategorized,
    notes: read("notes"),
  };

  return record;
}

/**
 * Validates raw journal rows into trade records. Fails on the first bad row
 * and returns nothing in that case; callers that want partial loads must
 * filter rows beforehand.
 */
export function loadTrades(
  rows: readonly RawTradeRow[],
  options: LoadTradesOptions = {},
): TradeRecord[] {
  return rows.map((row, rowIndex) => parseTradeRow(row, rowIndex, options));
}
