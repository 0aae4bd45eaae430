import fs from "node:fs";
import path from "node:path";

import type { LedgerName, LedgerSnapshot } from "@attendance/core";
import { parseCsv, PersistenceError, serializeCsv } from "@attendance/core";

import type { LedgerBackend, LedgerWrite } from "./types";
import { emptySnapshot } from "./types";

let tempCounter = 0;

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error && "code" in error && error.code === "ENOENT"
  );
}

/**
 * One `<ledger>.csv` file per ledger in `directory`. Writes go to a temporary
 * file that is renamed over the ledger, so a failed write leaves it intact.
 */
export class CsvFileBackend implements LedgerBackend {
  readonly kind = "csv";

  constructor(private directory: string) {}

  filePath(ledger: LedgerName): string {
    return path.join(this.directory, `${ledger}.csv`);
  }

  async read(ledger: LedgerName): Promise<LedgerSnapshot> {
    let text: string;
    try {
      text = await fs.promises.readFile(this.filePath(ledger), "utf8");
    } catch (error) {
      if (isMissingFile(error)) return emptySnapshot();
      throw new PersistenceError(
        `Could not read ${this.filePath(ledger)}`,
        error,
      );
    }
    return parseCsv(text);
  }

  async write(ledger: LedgerName, data: LedgerWrite): Promise<void> {
    const target = this.filePath(ledger);
    const temp = `${target}.${process.pid}.${++tempCounter}.tmp`;
    try {
      await fs.promises.mkdir(this.directory, { recursive: true });
      await fs.promises.writeFile(
        temp,
        `${serializeCsv(data.columns, data.rows)}\n`,
        "utf8",
      );
      await fs.promises.rename(temp, target);
    } catch (error) {
      await fs.promises.rm(temp, { force: true });
      throw new PersistenceError(`Could not write ${target}`, error);
    }
  }
}
