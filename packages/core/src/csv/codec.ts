import Papa from "papaparse";

import { ImportSchemaError, ValidationError } from "../errors";
import type { IdFactory, LedgerDefinition } from "../ledger/definitions";
import { defaultIdFactory, missingColumns } from "../ledger/definitions";
import { ensureUniqueIds } from "../ledger/table";
import type { CellValue, LedgerRow, RawRow } from "../types";
import { ID_COLUMN } from "../types";

export const CSV_MIME_TYPE = "text/csv";

/**
 * Comma separated, header row first, `\n` line endings. Values are quoted
 * only when they need it.
 */
export function serializeCsv(
  fields: readonly string[],
  rows: readonly LedgerRow[],
): string {
  const data = rows.map((row) =>
    fields.map((field): CellValue => row[field] ?? ""),
  );
  return Papa.unparse({ fields: [...fields], data }, { newline: "\n" });
}

/**
 * Serialize a ledger: canonical column order, then the id column.
 */
export function exportCsv<TRecord extends { id: string }>(
  definition: LedgerDefinition<TRecord>,
  records: readonly TRecord[],
): string {
  return serializeCsv(
    [...definition.columns, ID_COLUMN],
    records.map((record) => definition.toRow(record)),
  );
}

export interface ParsedCsv {
  columns: string[];
  rows: RawRow[];
}

export function parseCsv(text: string): ParsedCsv {
  const result = Papa.parse<Record<string, string>>(text, {
    header: true,
    skipEmptyLines: "greedy",
    transformHeader: (header) => header.replace(/^\uFEFF/, "").trim(),
  });

  const quoteError = result.errors.find((error) => error.type === "Quotes");
  if (quoteError) {
    const row = quoteError.row === undefined ? "" : ` (row ${quoteError.row + 1})`;
    throw new ValidationError(`Malformed CSV${row}: ${quoteError.message}`);
  }

  return { columns: result.meta.fields ?? [], rows: result.data };
}

/**
 * Parse an uploaded ledger. Every required column must be present, in any
 * order; otherwise the whole import is rejected. Rows are normalized, and a
 * row repeating an earlier row's `Id` gets a fresh one.
 */
export function importCsv<TRecord extends { id: string }>(
  definition: LedgerDefinition<TRecord>,
  text: string,
  createId: IdFactory = defaultIdFactory,
): TRecord[] {
  const { columns, rows } = parseCsv(text);
  const missing = missingColumns(definition, columns);
  if (missing.length > 0) {
    throw new ImportSchemaError(missing);
  }
  return ensureUniqueIds(
    rows.map((row) => definition.fromRow(row, createId)),
    createId,
  );
}
