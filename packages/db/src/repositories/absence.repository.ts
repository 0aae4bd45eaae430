import type {
  AbsenceNote,
  IdFactory,
  NotesByAttendee,
  ServiceKey,
} from "@attendance/core";
import {
  absenceLedger,
  notesForService,
  recordAbsenceNotes,
} from "@attendance/core";

import type { LedgerBackend } from "../backends/types";
import { LedgerRepository } from "./base.repository";

export class AbsenceRepository extends LedgerRepository<AbsenceNote> {
  constructor(backend: LedgerBackend, createId?: IdFactory) {
    super(backend, absenceLedger, createId);
  }

  async forService(service: ServiceKey): Promise<Map<string, string>> {
    return notesForService(await this.load(), service);
  }

  /**
   * Append notes for a service; blank notes are skipped. Returns the notes
   * that were added.
   */
  async record(
    service: ServiceKey,
    notes: NotesByAttendee,
    now: Date = new Date(),
  ): Promise<AbsenceNote[]> {
    return this.exclusive(async () => {
      const before = await this.readTable();
      const table = recordAbsenceNotes(
        before,
        service,
        notes,
        now,
        this.createId,
      );
      if (table.length === before.length) return [];

      const saved = await this.persist(table);
      return saved.slice(before.length);
    });
  }
}
