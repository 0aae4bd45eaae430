import type { IdFactory } from "@attendance/core";

import type { LedgerBackend } from "../backends/types";
import { AbsenceRepository } from "./absence.repository";
import { AttendanceRepository } from "./attendance.repository";
import { MemberRepository } from "./member.repository";

export { LedgerRepository } from "./base.repository";
export { AbsenceRepository } from "./absence.repository";
export { AttendanceRepository } from "./attendance.repository";
export type { NewAttendance } from "./attendance.repository";
export { MemberRepository } from "./member.repository";
export type { NewMember } from "./member.repository";

/**
 * Interface containing all repositories
 */
export interface Repositories {
  attendance: AttendanceRepository;
  members: MemberRepository;
  absences: AbsenceRepository;
}

/**
 * Create all repositories over a shared backend
 */
export function createRepositories(
  backend: LedgerBackend,
  createId?: IdFactory,
): Repositories {
  return {
    attendance: new AttendanceRepository(backend, createId),
    members: new MemberRepository(backend, createId),
    absences: new AbsenceRepository(backend, createId),
  };
}
