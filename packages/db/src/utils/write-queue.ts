import type { LedgerName } from "@attendance/core";

import type { LedgerBackend } from "../backends/types";

const queues = new WeakMap<LedgerBackend, Map<LedgerName, Promise<void>>>();

/**
 * Run `work` once every earlier call for the same backend and ledger has
 * settled. Repositories sharing a backend share its queues; other ledgers
 * are not held up. Not reentrant.
 */
export function runExclusive<T>(
  backend: LedgerBackend,
  ledger: LedgerName,
  work: () => Promise<T>,
): Promise<T> {
  let byLedger = queues.get(backend);
  if (!byLedger) {
    byLedger = new Map();
    queues.set(backend, byLedger);
  }

  const previous = byLedger.get(ledger) ?? Promise.resolve();
  const result = previous.then(work);
  byLedger.set(
    ledger,
    result.then(
      () => undefined,
      () => undefined,
    ),
  );
  return result;
}
