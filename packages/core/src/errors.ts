export type LedgerErrorCode =
  | "VALIDATION"
  | "NOT_FOUND"
  | "IMPORT_SCHEMA"
  | "PERSISTENCE";

/**
 * Base class for every failure the ledger layer reports to callers.
 * Parse problems in stored values are not errors; they fall back to defaults.
 */
export class LedgerError extends Error {
  constructor(
    readonly code: LedgerErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends LedgerError {
  constructor(
    message: string,
    readonly field?: string,
  ) {
    super("VALIDATION", message);
  }
}

export class NotFoundError extends LedgerError {
  constructor(message: string) {
    super("NOT_FOUND", message);
  }
}

export class ImportSchemaError extends LedgerError {
  constructor(readonly missingColumns: string[]) {
    super(
      "IMPORT_SCHEMA",
      `CSV is missing required columns: ${missingColumns.join(", ")}`,
    );
  }
}

export class PersistenceError extends LedgerError {
  constructor(message: string, cause?: unknown) {
    super("PERSISTENCE", message, { cause });
  }
}

export function isLedgerError(error: unknown): error is LedgerError {
  return error instanceof LedgerError;
}
