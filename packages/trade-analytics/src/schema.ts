import { z } from "zod";
import type { TradeRecord } from "./types";

export type TradeField = keyof TradeRecord;

/** Maps every trade field to the column header it is read from. */
export type TradeLogSchema = Record<TradeField, string>;

export const defaultTradeLogSchema: TradeLogSchema = {
  date: "date",
  symbol: "symbol",
  side: "side",
  entryPrice: "entry_price",
  exitPrice: "exit_price",
  quantity: "quantity",
  commission: "commission",
  riskAmount: "risk_amount",
  category: "setup",
  notes: "notes",
};

/** Validation order. The first failing field in this order is reported. */
export const tradeFieldOrder = [
  "date",
  "symbol",
  "side",
  "entryPrice",
  "exitPrice",
  "quantity",
  "commission",
  "riskAmount",
  "category",
  "notes",
] as const satisfies readonly TradeField[];

export const requiredTradeFields = [
  "date",
  "symbol",
  "side",
  "entryPrice",
  "exitPrice",
  "quantity",
  "commission",
  "riskAmount",
] as const satisfies readonly TradeField[];

export function requiredColumns(
  schema: TradeLogSchema = defaultTradeLogSchema,
): string[] {
  return requiredTradeFields.map((field) => schema[field]);
}

export function schemaColumns(
  schema: TradeLogSchema = defaultTradeLogSchema,
): string[] {
  return tradeFieldOrder.map((field) => schema[field]);
}

export const TradeSideSchema = z.enum(["long", "short"], {
  error: "must be long or short",
});

const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;
const WHOLE_PATTERN = /^\+?\d+$/;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function isCalendarDate(value: string): boolean {
  if (!DATE_PATTERN.test(value)) return false;

  const [year, month, day] = value.split("-").map(Number);
  const parsed = new Date(Date.UTC(year, month - 1, day));

  return (
    parsed.getUTCFullYear() === year &&
    parsed.getUTCMonth() === month - 1 &&
    parsed.getUTCDate() === day
  );
}

const requiredText = z
  .string({ error: "is required" })
  .trim()
  .min(1, "is required");

const decimal = requiredText
  .regex(DECIMAL_PATTERN, "must be a decimal number")
  .transform(Number);

const optionalText = z
  .string()
  .optional()
  .transform((value) => value?.trim() ?? "");

export const tradeFieldSchemas = {
  date: requiredText
    .regex(DATE_PATTERN, "must be a date in YYYY-MM-DD form")
    .refine(isCalendarDate, "is not a valid calendar date"),
  symbol: requiredText,
  side: requiredText
    .transform((value) => value.toLowerCase())
    .pipe(TradeSideSchema),
  entryPrice: decimal.pipe(z.number().positive("must be greater than 0")),
  exitPrice: decimal.pipe(z.number().positive("must be greater than 0")),
  quantity: requiredText
    .regex(WHOLE_PATTERN, "must be a whole number")
    .transform(Number)
    .pipe(z.number().int().positive("must be greater than 0")),
  commission: decimal.pipe(z.number().nonnegative("must not be negative")),
  riskAmount: decimal.pipe(z.number().nonnegative("must not be negative")),
  category: optionalText,
  notes: optionalText,
} satisfies { [K in TradeField]: z.ZodType<unknown> };
