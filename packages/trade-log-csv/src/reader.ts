import {
  defaultTradeLogSchema,
  requiredColumns,
  type RawTradeRow,
  type TradeLogSchema,
} from "@repo/trade-analytics";
import csvParser from "csv-parser";
import { createReadStream } from "node:fs";
import type { Readable } from "node:stream";
import { TradeLogHeaderError } from "./errors";

export interface ReadTradeLogOptions {
  schema?: TradeLogSchema;
  separator?: string;
}

function isBlankRow(row: RawTradeRow): boolean {
  return Object.values(row).every((value) => !value);
}

function createParser(options: ReadTradeLogOptions) {
  return csvParser({
    separator: options.separator ?? ",",
    mapHeaders: ({ header }) => header.trim(),
    mapValues: ({ value }) => String(value).trim(),
  });
}

/**
 * Collects parsed rows from `parser`. The first line must be a header that
 * names every required column of the schema; otherwise the promise rejects
 * with `TradeLogHeaderError` before any row is returned.
 *
 * Blank lines are dropped, so a row's index in the result counts data rows
 * only. A `ValidationError.rowIndex` raised over these rows is that index,
 * not a line number in the file.
 */
function collectRows(
  parser: ReturnType<typeof createParser>,
  options: ReadTradeLogOptions,
  source?: Readable,
): Promise<RawTradeRow[]> {
  const required = requiredColumns(options.schema ?? defaultTradeLogSchema);

  return new Promise((resolve, reject) => {
    const rows: RawTradeRow[] = [];
    let sawHeader = false;

    source?.on("error", reject);

    parser
      .on("headers", (headers: string[]) => {
        sawHeader = true;
        const missing = required.filter((column) => !headers.includes(column));
        if (missing.length > 0) {
          source?.destroy();
          parser.destroy(new TradeLogHeaderError(missing));
        }
      })
      .on("data", (row: RawTradeRow) => {
        if (!isBlankRow(row)) rows.push(row);
      })
      .on("error", reject)
      .on("end", () => {
        if (!sawHeader) {
          reject(new TradeLogHeaderError(required));
          return;
        }
        resolve(rows);
      });
  });
}

export function parseTradeLogCsv(
  text: string,
  options: ReadTradeLogOptions = {},
): Promise<RawTradeRow[]> {
  const parser = createParser(options);
  const rows = collectRows(parser, options);
  parser.end(text);
  return rows;
}

export function readTradeLogFile(
  path: string,
  options: ReadTradeLogOptions = {},
): Promise<RawTradeRow[]> {
  const parser = createParser(options);
  const source = createReadStream(path);
  const rows = collectRows(parser, options, source);
  source.pipe(parser);
  return rows;
}
