import path from "node:path";
import { Pool } from "pg";

import type { AppConfig } from "@attendance/env";
import { StorageDriver } from "@attendance/shared/common/enums";
import { createLogger } from "@attendance/shared/logger";

import { CachedBackend } from "./backends/cached.backend";
import { CsvFileBackend } from "./backends/csv-file.backend";
import { MemoryBackend } from "./backends/memory.backend";
import { PostgresBackend } from "./backends/postgres.backend";
import type { LedgerBackend } from "./backends/types";
import { DatabaseClient } from "./client";

export { DatabaseClient } from "./client";
export { CachedBackend } from "./backends/cached.backend";
export { CsvFileBackend } from "./backends/csv-file.backend";
export { MemoryBackend } from "./backends/memory.backend";
export { PostgresBackend } from "./backends/postgres.backend";
export { emptySnapshot } from "./backends/types";
export type { LedgerBackend, LedgerWrite } from "./backends/types";
export * from "./repositories";

const log = createLogger("storage");

export type BackendConfig = Pick<
  AppConfig,
  | "storageDriver"
  | "csvDataDir"
  | "databaseUrl"
  | "databaseSchema"
  | "cacheTtlSeconds"
>;

function createInnerBackend(config: BackendConfig): LedgerBackend {
  switch (config.storageDriver) {
    case StorageDriver.Memory:
      return new MemoryBackend();
    case StorageDriver.Csv:
      return new CsvFileBackend(path.resolve(config.csvDataDir));
    case StorageDriver.Postgres: {
      if (!config.databaseUrl) {
        throw new Error("DATABASE_URL is required for the postgres driver");
      }
      const pool = new Pool({ connectionString: config.databaseUrl });
      return new PostgresBackend(
        new DatabaseClient(pool),
        config.databaseSchema,
      );
    }
  }
}

/**
 * Backend for the configured driver, behind the read cache
 */
export function createBackend(config: BackendConfig): CachedBackend {
  const backend = new CachedBackend(
    createInnerBackend(config),
    config.cacheTtlSeconds,
  );
  log.info("Ledger storage ready", {
    driver: backend.kind,
    cacheTtlSeconds: config.cacheTtlSeconds,
  });
  return backend;
}
