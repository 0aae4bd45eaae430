import type { LedgerName, LedgerSnapshot } from "@attendance/core";

import type { LedgerBackend, LedgerWrite } from "./types";
import { emptySnapshot } from "./types";

/**
 * Process-local ledgers. Reads and writes copy, so callers never share rows
 * with the store.
 */
export class MemoryBackend implements LedgerBackend {
  readonly kind = "memory";
  private ledgers = new Map<LedgerName, LedgerSnapshot>();

  constructor(seed: Partial<Record<LedgerName, LedgerSnapshot>> = {}) {
    for (const [ledger, snapshot] of Object.entries(seed)) {
      if (snapshot && isLedgerName(ledger)) {
        this.ledgers.set(ledger, structuredClone(snapshot));
      }
    }
  }

  async read(ledger: LedgerName): Promise<LedgerSnapshot> {
    return structuredClone(this.ledgers.get(ledger) ?? emptySnapshot());
  }

  async write(ledger: LedgerName, data: LedgerWrite): Promise<void> {
    this.ledgers.set(ledger, {
      columns: [...data.columns],
      rows: structuredClone([...data.rows]),
    });
  }
}

function isLedgerName(value: string): value is LedgerName {
  return value === "attendance" || value === "members" || value === "absences";
}
