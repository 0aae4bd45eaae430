import type { IdFactory, MemberRecord, MemberUpdate } from "@attendance/core";
import {
  composeAttendeeName,
  editRowById,
  memberLedger,
  ValidationError,
} from "@attendance/core";

import type { LedgerBackend } from "../backends/types";
import { LedgerRepository } from "./base.repository";

export interface NewMember {
  firstName: string;
  lastName: string;
  notes?: string;
  active?: boolean;
}

export class MemberRepository extends LedgerRepository<MemberRecord> {
  constructor(backend: LedgerBackend, createId?: IdFactory) {
    super(backend, memberLedger, createId);
  }

  async listActive(): Promise<MemberRecord[]> {
    const members = await this.load();
    return members.filter((member) => member.active);
  }

  async add(member: NewMember): Promise<MemberRecord> {
    const firstName = member.firstName.trim();
    const lastName = member.lastName.trim();
    if (!firstName && !lastName) {
      throw new ValidationError(
        "A first or last name is required.",
        "firstName",
      );
    }

    return this.insert({
      id: this.createId(),
      firstName,
      lastName,
      attendee: composeAttendeeName(firstName, lastName),
      notes: member.notes?.trim() ?? "",
      active: member.active ?? true,
    });
  }

  /**
   * Update a member. A name change re-derives the attendee name used to
   * match check-ins.
   */
  async edit(id: string, update: MemberUpdate): Promise<MemberRecord> {
    return this.exclusive(async () => {
      const table = await this.readTable();
      const current = this.pick(table, id);

      const firstName = (update.firstName ?? current.firstName).trim();
      const lastName = (update.lastName ?? current.lastName).trim();
      if (!firstName && !lastName) {
        throw new ValidationError(
          "A first or last name is required.",
          "firstName",
        );
      }

      const renamed =
        firstName !== current.firstName || lastName !== current.lastName;
      const saved = await this.persist(
        editRowById(table, id, {
          ...update,
          firstName,
          lastName,
          ...(renamed
            ? { attendee: composeAttendeeName(firstName, lastName) }
            : {}),
        }),
      );
      return this.pick(saved, id);
    });
  }
}
