import type {
  AbsenceNote,
  AttendanceRecord,
  MemberRecord,
  ServiceKey,
} from "../types";
import type { IdFactory } from "../ledger/definitions";
import { defaultIdFactory } from "../ledger/definitions";
import { filterByService } from "../aggregation/service";
import { formatTimestamp, normalizeServiceDate } from "../utils/coerce";
import type { NameNormalizer } from "../utils/names";
import { exactName } from "../utils/names";

/**
 * Names on the active roster that are not in today's check-in list.
 * Comparison uses `normalize` on both sides; the result keeps the roster's
 * spelling and order, without duplicates.
 */
export function computeAbsentees(
  activeRoster: Iterable<string>,
  presentToday: Iterable<string>,
  normalize: NameNormalizer = exactName,
): string[] {
  const present = new Set<string>();
  for (const name of presentToday) {
    present.add(normalize(name));
  }

  const seen = new Set<string>();
  const absent: string[] = [];
  for (const name of activeRoster) {
    const key = normalize(name);
    if (present.has(key) || seen.has(key)) continue;
    seen.add(key);
    absent.push(name);
  }
  return absent;
}

export type NotesByAttendee =
  | ReadonlyMap<string, string>
  | Readonly<Record<string, string>>;

function isNoteMap(
  notes: NotesByAttendee,
): notes is ReadonlyMap<string, string> {
  return notes instanceof Map;
}

function noteEntries(notes: NotesByAttendee): [string, string][] {
  return isNoteMap(notes) ? [...notes.entries()] : Object.entries(notes);
}

/**
 * Append one absence note per non-blank note. Blank notes are skipped.
 */
export function recordAbsenceNotes(
  existingNotes: readonly AbsenceNote[],
  service: ServiceKey,
  noteByAttendee: NotesByAttendee,
  now: Date = new Date(),
  createId: IdFactory = defaultIdFactory,
): AbsenceNote[] {
  const timestamp = formatTimestamp(now);
  const serviceDate = normalizeServiceDate(service.serviceDate);

  const added = noteEntries(noteByAttendee)
    .map(([attendee, note]) => [attendee, note.trim()] as const)
    .filter(([, note]) => note.length > 0)
    .map(
      ([attendee, note]): AbsenceNote => ({
        id: createId(),
        timestamp,
        serviceDate,
        serviceName: service.serviceName,
        attendee,
        note,
      }),
    );

  return [...existingNotes, ...added];
}

export function activeRosterNames(members: readonly MemberRecord[]): string[] {
  return members.filter((member) => member.active).map((m) => m.attendee);
}

function checkedInNames(
  attendance: readonly AttendanceRecord[],
  service: ServiceKey,
): string[] {
  return filterByService(attendance, service.serviceDate, service.serviceName).map(
    (record) => record.attendee,
  );
}

export function absenteesForService(
  members: readonly MemberRecord[],
  attendance: readonly AttendanceRecord[],
  service: ServiceKey,
  normalize: NameNormalizer = exactName,
): string[] {
  return computeAbsentees(
    activeRosterNames(members),
    checkedInNames(attendance, service),
    normalize,
  );
}

/**
 * Active members not yet checked in to the service, for the check-in picker.
 */
export function checkInCandidates(
  members: readonly MemberRecord[],
  attendance: readonly AttendanceRecord[],
  service: ServiceKey,
  normalize: NameNormalizer = exactName,
): MemberRecord[] {
  const present = new Set(
    checkedInNames(attendance, service).map((name) => normalize(name)),
  );
  return members.filter(
    (member) => member.active && !present.has(normalize(member.attendee)),
  );
}

/** Notes already recorded for a service, keyed by attendee. Latest wins. */
export function notesForService(
  notes: readonly AbsenceNote[],
  service: ServiceKey,
): Map<string, string> {
  const serviceDate = normalizeServiceDate(service.serviceDate);
  const result = new Map<string, string>();
  for (const note of notes) {
    if (
      note.serviceDate === serviceDate &&
      note.serviceName === service.serviceName
    ) {
      result.set(note.attendee, note.note);
    }
  }
  return result;
}
