/**
 * Raised by the loader on the first row that cannot become a trade record.
 * `rowIndex` is the 0-based position of the row in the input sequence and
 * `field` is the column header as it appears in the trade log.
 */
export class ValidationError extends Error {
  readonly rowIndex: number;
  readonly field: string;
  readonly reason: string;

  constructor(rowIndex: number, field: string, reason: string) {
    super(`Row ${rowIndex}: ${field} ${reason}`);
    this.name = "ValidationError";
    this.rowIndex = rowIndex;
    this.field = field;
    this.reason = reason;
  }
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}
