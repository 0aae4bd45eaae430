import { randomUUID } from "node:crypto";

import type {
  AbsenceNote,
  AttendanceRecord,
  CellValue,
  LedgerName,
  LedgerRow,
  MemberRecord,
  RawRow,
} from "../types";
import {
  ABSENCE_COLUMNS,
  ATTENDANCE_COLUMNS,
  ID_COLUMN,
  MEMBER_COLUMNS,
} from "../types";
import {
  asActiveFlag,
  asInt,
  asText,
  normalizeServiceDate,
} from "../utils/coerce";
import { composeAttendeeName } from "../utils/names";

export type IdFactory = () => string;

export const defaultIdFactory: IdFactory = () => randomUUID();

/**
 * Describes one ledger: its canonical columns and how a stored row maps to
 * and from a typed record.
 */
export interface LedgerDefinition<TRecord extends { id: string }> {
  name: LedgerName;
  /** Canonical column order, excluding the id column */
  columns: readonly string[];
  /** Columns an import must carry */
  requiredColumns: readonly string[];
  fromRow(row: RawRow, createId?: IdFactory): TRecord;
  toRow(record: TRecord): LedgerRow;
}

function readId(row: RawRow, createId: IdFactory): string {
  const id = asText(row[ID_COLUMN]).trim();
  return id || createId();
}

function orderedRow(
  columns: readonly string[],
  id: string,
  values: Record<string, CellValue>,
): LedgerRow {
  const row: LedgerRow = {};
  for (const column of columns) {
    row[column] = values[column] ?? "";
  }
  row[ID_COLUMN] = id;
  return row;
}

export const attendanceLedger: LedgerDefinition<AttendanceRecord> = {
  name: "attendance",
  columns: ATTENDANCE_COLUMNS,
  requiredColumns: ATTENDANCE_COLUMNS,
  fromRow(row, createId = defaultIdFactory) {
    return {
      id: readId(row, createId),
      timestamp: asText(row.Timestamp),
      serviceDate: normalizeServiceDate(row.ServiceDate),
      serviceName: asText(row.ServiceName),
      attendee: asText(row.Attendee),
      household: asInt(row.Household),
      notes: asText(row.Notes),
    };
  },
  toRow(record) {
    return orderedRow(ATTENDANCE_COLUMNS, record.id, {
      Timestamp: record.timestamp,
      ServiceDate: record.serviceDate,
      ServiceName: record.serviceName,
      Attendee: record.attendee,
      Household: asInt(record.household),
      Notes: record.notes,
    });
  },
};

export const memberLedger: LedgerDefinition<MemberRecord> = {
  name: "members",
  columns: MEMBER_COLUMNS,
  requiredColumns: MEMBER_COLUMNS,
  fromRow(row, createId = defaultIdFactory) {
    const firstName = asText(row.FirstName).trim();
    const lastName = asText(row.LastName).trim();
    const attendee =
      asText(row.Attendee).trim() || composeAttendeeName(firstName, lastName);
    return {
      id: readId(row, createId),
      firstName,
      lastName,
      attendee,
      notes: asText(row.Notes),
      active: asActiveFlag(row.Active),
    };
  },
  toRow(record) {
    return orderedRow(MEMBER_COLUMNS, record.id, {
      FirstName: record.firstName,
      LastName: record.lastName,
      Attendee: record.attendee,
      Notes: record.notes,
      Active: record.active ? 1 : 0,
    });
  },
};

export const absenceLedger: LedgerDefinition<AbsenceNote> = {
  name: "absences",
  columns: ABSENCE_COLUMNS,
  requiredColumns: ABSENCE_COLUMNS,
  fromRow(row, createId = defaultIdFactory) {
    return {
      id: readId(row, createId),
      timestamp: asText(row.Timestamp),
      serviceDate: normalizeServiceDate(row.ServiceDate),
      serviceName: asText(row.ServiceName),
      attendee: asText(row.Attendee),
      note: asText(row.Note),
    };
  },
  toRow(record) {
    return orderedRow(ABSENCE_COLUMNS, record.id, {
      Timestamp: record.timestamp,
      ServiceDate: record.serviceDate,
      ServiceName: record.serviceName,
      Attendee: record.attendee,
      Note: record.note,
    });
  },
};

/** Header is recognisable when it shares at least one canonical column. */
export function hasRecognisableHeader(
  definition: LedgerDefinition<{ id: string }>,
  columns: readonly string[],
): boolean {
  return definition.columns.some((column) => columns.includes(column));
}

export function missingColumns(
  definition: LedgerDefinition<{ id: string }>,
  columns: readonly string[],
): string[] {
  return definition.requiredColumns.filter(
    (column) => !columns.includes(column),
  );
}

/** Normalize records by running them through the stored-row form. */
export function normalizeRecords<TRecord extends { id: string }>(
  definition: LedgerDefinition<TRecord>,
  records: readonly TRecord[],
): TRecord[] {
  return records.map((record) => definition.fromRow(definition.toRow(record)));
}

export const ledgerDefinitions: Record<
  LedgerName,
  LedgerDefinition<{ id: string }>
> = {
  attendance: attendanceLedger,
  members: memberLedger,
  absences: absenceLedger,
};
