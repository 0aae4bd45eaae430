import type { AbsenceNote, AttendanceRecord, MemberRecord } from "../types";

let attendanceCounter = 0;
let memberCounter = 0;
let absenceCounter = 0;

/**
 * Create an attendance record for unit tests. Each call gets a unique id.
 */
export function createMockAttendance(
  overrides: Partial<AttendanceRecord> = {},
): AttendanceRecord {
  attendanceCounter++;
  return {
    id: `att-${attendanceCounter}`,
    timestamp: "2024-01-07 09:30:00",
    serviceDate: "2024-01-07",
    serviceName: "Sunday 1st Service",
    attendee: `Attendee ${attendanceCounter}`,
    household: 1,
    notes: "",
    ...overrides,
  };
}

export function createMockMember(
  overrides: Partial<MemberRecord> = {},
): MemberRecord {
  memberCounter++;
  const firstName = overrides.firstName ?? "Member";
  const lastName = overrides.lastName ?? `${memberCounter}`;
  return {
    id: `mem-${memberCounter}`,
    firstName,
    lastName,
    attendee: `${firstName} ${lastName}`,
    notes: "",
    active: true,
    ...overrides,
  };
}

export function createMockAbsenceNote(
  overrides: Partial<AbsenceNote> = {},
): AbsenceNote {
  absenceCounter++;
  return {
    id: `abs-${absenceCounter}`,
    timestamp: "2024-01-07 12:00:00",
    serviceDate: "2024-01-07",
    serviceName: "Sunday 1st Service",
    attendee: `Member ${absenceCounter}`,
    note: "Travelling",
    ...overrides,
  };
}

/**
 * Sequential ids for code under test that takes an id factory.
 */
export function createSequentialIds(prefix = "id"): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}

/**
 * Reset all factory counters.
 * Call this in beforeEach() to get predictable ids.
 */
export function resetFactoryCounters(): void {
  attendanceCounter = 0;
  memberCounter = 0;
  absenceCounter = 0;
}
