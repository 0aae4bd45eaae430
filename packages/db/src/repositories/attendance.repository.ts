import type {
  AttendanceRecord,
  AttendanceUpdate,
  IdFactory,
} from "@attendance/core";
import {
  asInt,
  attendanceLedger,
  formatTimestamp,
  toIsoDate,
  ValidationError,
} from "@attendance/core";

import type { LedgerBackend } from "../backends/types";
import { LedgerRepository } from "./base.repository";

export interface NewAttendance {
  serviceDate: string;
  serviceName: string;
  attendee: string;
  household?: unknown;
  notes?: string;
}

export class AttendanceRepository extends LedgerRepository<AttendanceRecord> {
  constructor(backend: LedgerBackend, createId?: IdFactory) {
    super(backend, attendanceLedger, createId);
  }

  /**
   * Validate and append one check-in, stamped with `now`.
   */
  async add(
    entry: NewAttendance,
    now: Date = new Date(),
  ): Promise<AttendanceRecord> {
    const attendee = entry.attendee.trim();
    const serviceName = entry.serviceName.trim();
    if (!attendee) {
      throw new ValidationError("Attendee is required.", "attendee");
    }
    if (!entry.serviceDate.trim()) {
      throw new ValidationError("Service date is required.", "serviceDate");
    }
    const serviceDate = toIsoDate(entry.serviceDate);
    if (!serviceDate) {
      throw new ValidationError(
        `Invalid service date: ${entry.serviceDate}`,
        "serviceDate",
      );
    }
    if (!serviceName) {
      throw new ValidationError("Service name is required.", "serviceName");
    }

    return this.insert({
      id: this.createId(),
      timestamp: formatTimestamp(now),
      serviceDate,
      serviceName,
      attendee,
      household: asInt(entry.household),
      notes: entry.notes?.trim() ?? "",
    });
  }

  async edit(id: string, update: AttendanceUpdate): Promise<AttendanceRecord> {
    const fields: AttendanceUpdate = { ...update };
    if (update.attendee !== undefined) {
      const attendee = update.attendee.trim();
      if (!attendee) {
        throw new ValidationError("Attendee is required.", "attendee");
      }
      fields.attendee = attendee;
    }
    if (update.household !== undefined) {
      fields.household = asInt(update.household);
    }
    return this.updateById(id, fields);
  }
}
