import type { LedgerName, LedgerSnapshot, RawRow } from "@attendance/core";
import { ID_COLUMN, ledgerDefinitions } from "@attendance/core";

import type { SqlClient } from "../client";
import {
  keysToPascalCase,
  toPascalCase,
  toSnakeCase,
} from "../utils/case-transform";
import type { LedgerBackend, LedgerWrite } from "./types";

const POSITION_COLUMN = "position";
const INTEGER_COLUMNS = new Set(["Household", "Active"]);
const INSERT_BATCH_SIZE = 500;

const quote = (identifier: string) => `"${identifier.replace(/"/g, '""')}"`;

/**
 * Ledgers as tables in one schema, snake_case columns plus a `position`
 * column that preserves row order. A write replaces the table's contents in
 * a single transaction.
 */
export class PostgresBackend implements LedgerBackend {
  readonly kind = "postgres";
  private schemaReady: Promise<void> | null = null;

  constructor(
    private client: SqlClient,
    private schema: string = "public",
  ) {}

  tableName(ledger: LedgerName): string {
    return `${quote(this.schema)}.${quote(ledger)}`;
  }

  /**
   * Create the schema and ledger tables if they do not exist
   */
  ensureSchema(): Promise<void> {
    if (!this.schemaReady) {
      this.schemaReady = this.createTables().catch((error: unknown) => {
        this.schemaReady = null;
        throw error;
      });
    }
    return this.schemaReady;
  }

  private async createTables(): Promise<void> {
    await this.client.query(`CREATE SCHEMA IF NOT EXISTS ${quote(this.schema)}`);

    for (const definition of Object.values(ledgerDefinitions)) {
      const columns = definition.columns.map((column) => {
        const type = INTEGER_COLUMNS.has(column)
          ? "INTEGER NOT NULL DEFAULT 1"
          : "TEXT NOT NULL DEFAULT ''";
        return `${quote(toSnakeCase(column))} ${type}`;
      });
      await this.client.query(`
        CREATE TABLE IF NOT EXISTS ${this.tableName(definition.name)} (
          ${quote(POSITION_COLUMN)} INTEGER NOT NULL,
          ${quote(toSnakeCase(ID_COLUMN))} TEXT PRIMARY KEY,
          ${columns.join(",\n          ")}
        )
      `);
    }
  }

  async read(ledger: LedgerName): Promise<LedgerSnapshot> {
    await this.ensureSchema();
    const result = await this.client.query(
      `SELECT * FROM ${this.tableName(ledger)} ORDER BY ${quote(POSITION_COLUMN)}`,
    );

    const columns = result.fields
      .map((field) => field.name)
      .filter((name) => name !== POSITION_COLUMN)
      .map(toPascalCase);
    const rows = result.rows.map((row: RawRow) => {
      const { [POSITION_COLUMN]: _position, ...rest } = row;
      return keysToPascalCase(rest);
    });

    return { columns, rows };
  }

  /**
   * Build a multi-row INSERT for one batch.
   * Returns { sql, params } where params are in placeholder order.
   */
  buildInsertQuery(
    ledger: LedgerName,
    columns: readonly string[],
    rows: LedgerWrite["rows"],
    offset: number,
  ): { sql: string; params: unknown[] } {
    const dbColumns = [POSITION_COLUMN, ...columns.map(toSnakeCase)];
    const params: unknown[] = [];
    const values = rows.map((row, index) => {
      params.push(offset + index);
      for (const column of columns) {
        params.push(row[column] ?? (INTEGER_COLUMNS.has(column) ? 1 : ""));
      }
      const start = params.length - dbColumns.length;
      return `(${dbColumns.map((_, i) => `$${start + i + 1}`).join(", ")})`;
    });

    const sql = `INSERT INTO ${this.tableName(ledger)} (${dbColumns.map(quote).join(", ")}) VALUES ${values.join(", ")}`;
    return { sql, params };
  }

  async write(ledger: LedgerName, data: LedgerWrite): Promise<void> {
    await this.ensureSchema();
    await this.client.withTransaction(async (tx) => {
      await tx.query(`DELETE FROM ${this.tableName(ledger)}`);
      for (let i = 0; i < data.rows.length; i += INSERT_BATCH_SIZE) {
        const batch = data.rows.slice(i, i + INSERT_BATCH_SIZE);
        const { sql, params } = this.buildInsertQuery(
          ledger,
          data.columns,
          batch,
          i,
        );
        await tx.query(sql, params);
      }
    });
  }

  async close(): Promise<void> {
    await this.client.end();
  }
}
