import type { LedgerName, LedgerRow, LedgerSnapshot } from "@attendance/core";

export interface LedgerWrite {
  /** Column order to persist */
  columns: readonly string[];
  rows: readonly LedgerRow[];
}

/**
 * Where ledgers live. Reads return the stored header and rows as-is;
 * writes replace the whole ledger or fail without changing it.
 */
export interface LedgerBackend {
  readonly kind: string;
  read(ledger: LedgerName): Promise<LedgerSnapshot>;
  write(ledger: LedgerName, data: LedgerWrite): Promise<void>;
  close?(): Promise<void>;
}

export const emptySnapshot = (): LedgerSnapshot => ({ columns: [], rows: [] });
