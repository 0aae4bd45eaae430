import type { FieldDef, QueryResult, QueryResultRow } from "pg";
import { describe, expect, it } from "vitest";

import type { SqlClient, SqlExecutor } from "../client";
import { PostgresBackend } from "./postgres.backend";

function field(name: string): FieldDef {
  return {
    name,
    tableID: 0,
    columnID: 0,
    dataTypeID: 25,
    dataTypeSize: -1,
    dataTypeModifier: -1,
    format: "text",
  };
}

function result(
  rows: QueryResultRow[] = [],
  fields: FieldDef[] = [],
): QueryResult<QueryResultRow> {
  return { command: "", rowCount: rows.length, oid: 0, fields, rows };
}

/** Records statements and answers SELECTs with a canned result */
class FakeSqlClient implements SqlClient {
  statements: string[] = [];
  params: unknown[][] = [];
  selectResult = result();
  failOn: string | null = null;
  ended = false;

  async query(sql: string, params: unknown[] = []) {
    const statement = sql.trim();
    this.statements.push(statement);
    this.params.push(params);
    if (this.failOn && statement.startsWith(this.failOn)) {
      throw new Error(`failed: ${this.failOn}`);
    }
    return statement.startsWith("SELECT") ? this.selectResult : result();
  }

  async withTransaction<T>(fn: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    this.statements.push("BEGIN");
    try {
      const value = await fn(this);
      this.statements.push("COMMIT");
      return value;
    } catch (error) {
      this.statements.push("ROLLBACK");
      throw error;
    }
  }

  async end() {
    this.ended = true;
  }
}

describe("PostgresBackend", () => {
  it("creates the schema and one table per ledger once", async () => {
    const client = new FakeSqlClient();
    const backend = new PostgresBackend(client, "ledger");

    await backend.read("attendance");
    await backend.read("members");

    const creates = client.statements.filter((sql) => sql.startsWith("CREATE"));
    expect(creates).toHaveLength(4);
    expect(creates[0]).toBe('CREATE SCHEMA IF NOT EXISTS "ledger"');
    expect(creates[1]).toContain('CREATE TABLE IF NOT EXISTS "ledger"."attendance"');
    expect(creates[1]).toContain('"id" TEXT PRIMARY KEY');
    expect(creates[1]).toContain('"service_date" TEXT NOT NULL DEFAULT \'\'');
    expect(creates[1]).toContain('"household" INTEGER NOT NULL DEFAULT 1');
    expect(creates[2]).toContain('"ledger"."members"');
    expect(creates[2]).toContain('"active" INTEGER NOT NULL DEFAULT 1');
    expect(creates[3]).toContain('"ledger"."absences"');
  });

  it("retries schema creation after a failure", async () => {
    const client = new FakeSqlClient();
    client.failOn = "CREATE SCHEMA";
    const backend = new PostgresBackend(client);

    await expect(backend.read("attendance")).rejects.toThrow(
      "failed: CREATE SCHEMA",
    );

    client.failOn = null;
    await backend.read("attendance");
    expect(
      client.statements.filter((sql) => sql.startsWith("CREATE SCHEMA")),
    ).toHaveLength(2);
  });

  it("reads rows in position order with canonical column names", async () => {
    const client = new FakeSqlClient();
    client.selectResult = result(
      [
        {
          position: 0,
          id: "att-1",
          timestamp: "2024-01-07 09:30:00",
          service_date: "2024-01-07",
          service_name: "Sunday 1st Service",
          attendee: "Jane Doe",
          household: 3,
          notes: "",
        },
      ],
      [
        "position",
        "id",
        "timestamp",
        "service_date",
        "service_name",
        "attendee",
        "household",
        "notes",
      ].map(field),
    );
    const backend = new PostgresBackend(client);

    const snapshot = await backend.read("attendance");

    expect(client.statements.at(-1)).toBe(
      'SELECT * FROM "public"."attendance" ORDER BY "position"',
    );
    expect(snapshot).toEqual({
      columns: [
        "Id",
        "Timestamp",
        "ServiceDate",
        "ServiceName",
        "Attendee",
        "Household",
        "Notes",
      ],
      rows: [
        {
          Id: "att-1",
          Timestamp: "2024-01-07 09:30:00",
          ServiceDate: "2024-01-07",
          ServiceName: "Sunday 1st Service",
          Attendee: "Jane Doe",
          Household: 3,
          Notes: "",
        },
      ],
    });
  });

  it("builds a multi-row insert with positions and defaults", () => {
    const backend = new PostgresBackend(new FakeSqlClient());

    const { sql, params } = backend.buildInsertQuery(
      "attendance",
      ["Attendee", "Household", "Id"],
      [
        { Attendee: "Jane Doe", Household: 3, Id: "att-1" },
        { Attendee: "John Smith", Id: "att-2" },
      ],
      0,
    );

    expect(sql).toBe(
      'INSERT INTO "public"."attendance" ("position", "attendee", "household", "id") ' +
        "VALUES ($1, $2, $3, $4), ($5, $6, $7, $8)",
    );
    expect(params).toEqual([
      0,
      "Jane Doe",
      3,
      "att-1",
      1,
      "John Smith",
      1,
      "att-2",
    ]);
  });

  it("replaces the table inside one transaction", async () => {
    const client = new FakeSqlClient();
    const backend = new PostgresBackend(client);
    await backend.ensureSchema();
    client.statements = [];

    await backend.write("members", {
      columns: ["FirstName", "Id"],
      rows: [{ FirstName: "Jane", Id: "mem-1" }],
    });

    expect(client.statements).toEqual([
      "BEGIN",
      'DELETE FROM "public"."members"',
      'INSERT INTO "public"."members" ("position", "first_name", "id") VALUES ($1, $2, $3)',
      "COMMIT",
    ]);
  });

  it("rolls back when an insert fails", async () => {
    const client = new FakeSqlClient();
    const backend = new PostgresBackend(client);
    await backend.ensureSchema();
    client.statements = [];
    client.failOn = "INSERT";

    await expect(
      backend.write("members", {
        columns: ["FirstName", "Id"],
        rows: [{ FirstName: "Jane", Id: "mem-1" }],
      }),
    ).rejects.toThrow("failed: INSERT");

    expect(client.statements[0]).toBe("BEGIN");
    expect(client.statements.at(-1)).toBe("ROLLBACK");
  });

  it("writes an empty table as a bare delete", async () => {
    const client = new FakeSqlClient();
    const backend = new PostgresBackend(client);
    await backend.ensureSchema();
    client.statements = [];

    await backend.write("absences", { columns: ["Note", "Id"], rows: [] });

    expect(client.statements).toEqual([
      "BEGIN",
      'DELETE FROM "public"."absences"',
      "COMMIT",
    ]);
  });

  it("closes the client", async () => {
    const client = new FakeSqlClient();

    await new PostgresBackend(client).close();

    expect(client.ended).toBe(true);
  });
});
