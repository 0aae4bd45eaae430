import type {
  IdFactory,
  LedgerDefinition,
  LedgerSnapshot,
  RawRow,
} from "@attendance/core";
import {
  appendRow,
  asText,
  defaultIdFactory,
  deleteRowById,
  editRowById,
  ensureUniqueIds,
  exportCsv,
  hasRecognisableHeader,
  ID_COLUMN,
  importCsv,
  normalizeRecords,
  NotFoundError,
  PersistenceError,
} from "@attendance/core";
import type { Logger } from "@attendance/shared/logger";
import { createLogger, serializeError } from "@attendance/shared/logger";

import type { LedgerBackend } from "../backends/types";
import { emptySnapshot } from "../backends/types";
import { runExclusive } from "../utils/write-queue";

const log = createLogger("storage");

const messageOf = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

function lacksUniqueIds(rows: readonly RawRow[]): boolean {
  const seen = new Set<string>();
  return rows.some((row) => {
    const id = asText(row[ID_COLUMN]).trim();
    if (!id || seen.has(id)) return true;
    seen.add(id);
    return false;
  });
}

/**
 * Base repository with the load / save contract every ledger shares.
 * Tables are always read and written whole.
 */
export abstract class LedgerRepository<TRecord extends { id: string }> {
  protected log: Logger;

  constructor(
    protected backend: LedgerBackend,
    protected definition: LedgerDefinition<TRecord>,
    protected createId: IdFactory = defaultIdFactory,
  ) {
    this.log = log.child(`${definition.name}-ledger`);
  }

  get ledger() {
    return this.definition.name;
  }

  /**
   * Current table, or an empty one when the read fails.
   */
  async load(): Promise<TRecord[]> {
    try {
      return await this.loadOrThrow();
    } catch (error) {
      this.log.error("Failed to load ledger", error);
      return [];
    }
  }

  /**
   * Current table. Rows stored without an id, or with one an earlier row
   * already uses, get a fresh id, and the ids are written back so later
   * edits can address them.
   */
  async loadOrThrow(): Promise<TRecord[]> {
    const snapshot = await this.readSnapshot();
    if (!lacksUniqueIds(snapshot.rows)) return this.toRecords(snapshot);

    return this.exclusive(async () => {
      const current = await this.readSnapshot();
      const records = this.toRecords(current);
      if (lacksUniqueIds(current.rows)) {
        try {
          await this.persist(records);
          this.log.info("Assigned ids to stored rows", {
            count: records.length,
          });
        } catch (error) {
          this.log.warn("Could not persist assigned ids", serializeError(error));
        }
      }
      return records;
    });
  }

  /**
   * Normalize and persist the whole table. Returns what was written.
   */
  async save(records: readonly TRecord[]): Promise<TRecord[]> {
    return this.exclusive(() => this.persist(records));
  }

  /**
   * Load, apply a pure table change, save. Changes to one ledger run one
   * at a time. A failed read aborts the change instead of saving over the
   * ledger.
   */
  async mutate(
    change: (table: TRecord[]) => readonly TRecord[],
  ): Promise<TRecord[]> {
    return this.exclusive(async () =>
      this.persist(change(await this.readTable())),
    );
  }

  async insert(record: TRecord): Promise<TRecord> {
    const table = await this.mutate((current) => appendRow(current, record));
    return this.pick(table, record.id);
  }

  async updateById(
    id: string,
    fields: Partial<Omit<TRecord, "id">>,
  ): Promise<TRecord> {
    const table = await this.mutate((current) =>
      editRowById(current, id, fields),
    );
    return this.pick(table, id);
  }

  async deleteById(id: string): Promise<TRecord> {
    return this.exclusive(async () => {
      const table = await this.readTable();
      const removed = this.pick(table, id);
      await this.persist(deleteRowById(table, id));
      return removed;
    });
  }

  async exportCsv(): Promise<string> {
    return exportCsv(this.definition, await this.loadOrThrow());
  }

  /**
   * Replace the ledger with an uploaded CSV. Rejected uploads leave the
   * stored ledger untouched.
   */
  async importCsv(text: string): Promise<TRecord[]> {
    const records = importCsv(this.definition, text, this.createId);
    return this.save(records);
  }

  /**
   * Run a load / change / save cycle with no other write to this ledger in
   * between. Inside it use {@link readTable} and {@link persist}.
   */
  protected exclusive<T>(work: () => Promise<T>): Promise<T> {
    return runExclusive(this.backend, this.ledger, work);
  }

  protected async readTable(): Promise<TRecord[]> {
    return this.toRecords(await this.readSnapshot());
  }

  protected async persist(records: readonly TRecord[]): Promise<TRecord[]> {
    const normalized = normalizeRecords(this.definition, records);
    try {
      await this.backend.write(this.ledger, {
        columns: [...this.definition.columns, ID_COLUMN],
        rows: normalized.map((record) => this.definition.toRow(record)),
      });
    } catch (error) {
      if (error instanceof PersistenceError) throw error;
      throw new PersistenceError(
        `Could not save the ${this.ledger} ledger: ${messageOf(error)}`,
        error,
      );
    }
    return normalized;
  }

  private async readSnapshot(): Promise<LedgerSnapshot> {
    let snapshot: LedgerSnapshot;
    try {
      snapshot = await this.backend.read(this.ledger);
    } catch (error) {
      if (error instanceof PersistenceError) throw error;
      throw new PersistenceError(
        `Could not read the ${this.ledger} ledger: ${messageOf(error)}`,
        error,
      );
    }

    if (
      snapshot.rows.length > 0 &&
      !hasRecognisableHeader(this.definition, snapshot.columns)
    ) {
      this.log.warn("Ignoring ledger with unrecognised header", {
        columns: snapshot.columns,
      });
      return emptySnapshot();
    }
    return snapshot;
  }

  private toRecords(snapshot: LedgerSnapshot): TRecord[] {
    return ensureUniqueIds(
      snapshot.rows.map((row) => this.definition.fromRow(row, this.createId)),
      this.createId,
    );
  }

  protected pick(table: readonly TRecord[], id: string): TRecord {
    const record = table.find((row) => row.id === id);
    if (!record) {
      throw new NotFoundError(`Record ${id} not found`);
    }
    return record;
  }
}
