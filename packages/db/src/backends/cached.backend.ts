import type { LedgerName, LedgerSnapshot } from "@attendance/core";

import type { LedgerBackend, LedgerWrite } from "./types";

interface CacheEntry {
  snapshot: LedgerSnapshot;
  expiresAt: number;
}

/**
 * Read-through cache in front of a slower backend. Entries expire after
 * `ttlSeconds`; a write to a ledger drops its entry. A TTL of 0 disables
 * caching.
 *
 * Every invalidation bumps the ledger's generation, and a read only fills
 * the cache if the generation it started under is still current, so a read
 * that overlaps a write never caches the older snapshot.
 */
export class CachedBackend implements LedgerBackend {
  private entries = new Map<LedgerName, CacheEntry>();
  private generations = new Map<LedgerName, number>();
  private epoch = 0;

  constructor(
    private inner: LedgerBackend,
    private ttlSeconds: number,
    private now: () => number = Date.now,
  ) {}

  get kind(): string {
    return this.inner.kind;
  }

  async read(ledger: LedgerName): Promise<LedgerSnapshot> {
    const entry = this.entries.get(ledger);
    if (entry && entry.expiresAt > this.now()) {
      return structuredClone(entry.snapshot);
    }

    const generation = this.generationOf(ledger);
    const snapshot = await this.inner.read(ledger);
    if (this.ttlSeconds > 0 && this.generationOf(ledger) === generation) {
      this.entries.set(ledger, {
        snapshot: structuredClone(snapshot),
        expiresAt: this.now() + this.ttlSeconds * 1000,
      });
    }
    return snapshot;
  }

  async write(ledger: LedgerName, data: LedgerWrite): Promise<void> {
    this.invalidate(ledger);
    try {
      await this.inner.write(ledger, data);
    } finally {
      this.invalidate(ledger);
    }
  }

  invalidate(ledger?: LedgerName): void {
    if (ledger) {
      this.entries.delete(ledger);
      this.generations.set(ledger, (this.generations.get(ledger) ?? 0) + 1);
    } else {
      this.entries.clear();
      this.epoch += 1;
    }
  }

  private generationOf(ledger: LedgerName): string {
    return `${this.epoch}.${this.generations.get(ledger) ?? 0}`;
  }

  async close(): Promise<void> {
    await this.inner.close?.();
  }
}
