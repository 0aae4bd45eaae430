/**
 * Attendance types - one row per check-in
 */

export const ATTENDANCE_COLUMNS = [
  "Timestamp",
  "ServiceDate",
  "ServiceName",
  "Attendee",
  "Household",
  "Notes",
] as const;

export type AttendanceColumn = (typeof ATTENDANCE_COLUMNS)[number];

export interface AttendanceRecord {
  id: string;
  /** Local wall-clock creation time, `yyyy-MM-dd HH:mm:ss` */
  timestamp: string;
  /** `yyyy-MM-dd` when parsable, otherwise the stored value verbatim */
  serviceDate: string;
  serviceName: string;
  attendee: string;
  /** Always >= 1 */
  household: number;
  notes: string;
}

export type AttendanceUpdate = Partial<
  Pick<AttendanceRecord, "attendee" | "household" | "notes">
>;
