export class TradeLogHeaderError extends Error {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Trade log header is missing columns: ${missing.join(", ")}`);
    this.name = "TradeLogHeaderError";
    this.missing = missing;
  }
}
