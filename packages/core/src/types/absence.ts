/**
 * Absence note types - one row per (service, absent member)
 */

export const ABSENCE_COLUMNS = [
  "Timestamp",
  "ServiceDate",
  "ServiceName",
  "Attendee",
  "Note",
] as const;

export type AbsenceColumn = (typeof ABSENCE_COLUMNS)[number];

export interface AbsenceNote {
  id: string;
  timestamp: string;
  serviceDate: string;
  serviceName: string;
  attendee: string;
  note: string;
}
