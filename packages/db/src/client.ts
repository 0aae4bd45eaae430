import type { Pool, QueryResult, QueryResultRow } from "pg";

/** Anything that can run a parameterized statement */
export interface SqlExecutor {
  query(
    sql: string,
    params?: unknown[],
  ): Promise<QueryResult<QueryResultRow>>;
}

export interface SqlClient extends SqlExecutor {
  withTransaction<T>(fn: (tx: SqlExecutor) => Promise<T>): Promise<T>;
  end(): Promise<void>;
}

export class DatabaseClient implements SqlClient {
  constructor(private pool: Pool) {}

  /**
   * Execute a parameterized query with type safety
   */
  async query<T extends QueryResultRow>(
    sql: string,
    params: unknown[] = [],
  ): Promise<QueryResult<T>> {
    return this.pool.query<T>(sql, params);
  }

  /**
   * Execute operations within a transaction
   */
  async withTransaction<T>(fn: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    const tx: SqlExecutor = {
      query: (sql, params = []) => client.query<QueryResultRow>(sql, params),
    };
    try {
      await client.query("BEGIN");
      const result = await fn(tx);
      await client.query("COMMIT");
      return result;
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  async end(): Promise<void> {
    await this.pool.end();
  }
}
