/**
 * Member types - the roster
 */

export const MEMBER_COLUMNS = [
  "FirstName",
  "LastName",
  "Attendee",
  "Notes",
  "Active",
] as const;

export type MemberColumn = (typeof MEMBER_COLUMNS)[number];

export interface MemberRecord {
  id: string;
  firstName: string;
  lastName: string;
  /** `firstName + " " + lastName`, trimmed. Join key against attendance. */
  attendee: string;
  notes: string;
  active: boolean;
}

export type MemberUpdate = Partial<
  Pick<MemberRecord, "firstName" | "lastName" | "notes" | "active">
>;
