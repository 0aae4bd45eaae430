import type { AttendanceRecord } from "../types";
import { parseServiceDate, toIsoDate } from "../utils/coerce";

export interface ServiceTotals {
  serviceDate: string;
  serviceName: string;
  entries: number;
  people: number;
}

export interface ServiceSummary {
  entries: number;
  people: number;
  allTimeRecords: number;
}

export interface LogFilters {
  date?: string | null;
  serviceContains?: string | null;
  attendeeContains?: string | null;
}

export function sumHousehold(records: readonly AttendanceRecord[]): number {
  return records.reduce((total, record) => total + record.household, 0);
}

/**
 * Rows for one service. An empty or missing `serviceName` matches every
 * service held on `serviceDate`.
 */
export function filterByService(
  records: readonly AttendanceRecord[],
  serviceDate: string,
  serviceName?: string | null,
): AttendanceRecord[] {
  const date = toIsoDate(serviceDate) ?? serviceDate;
  return records.filter(
    (record) =>
      record.serviceDate === date &&
      (!serviceName || record.serviceName === serviceName),
  );
}

/**
 * Chronological order for stored dates; unparsable values sort after every
 * real date, by code point.
 */
export function compareServiceDates(a: string, b: string): number {
  const left = parseServiceDate(a);
  const right = parseServiceDate(b);
  if (left && right) return left.getTime() - right.getTime();
  if (left) return -1;
  if (right) return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Entry count and head count per (date, service). Rows whose date cannot be
 * parsed are kept; this is an all-time view.
 */
export function totalsPerService(
  records: readonly AttendanceRecord[],
): ServiceTotals[] {
  const groups = new Map<string, ServiceTotals>();

  for (const record of records) {
    const key = JSON.stringify([record.serviceDate, record.serviceName]);
    const group = groups.get(key) ?? {
      serviceDate: record.serviceDate,
      serviceName: record.serviceName,
      entries: 0,
      people: 0,
    };
    group.entries += 1;
    group.people += record.household;
    groups.set(key, group);
  }

  return [...groups.values()].sort(
    (a, b) =>
      compareServiceDates(a.serviceDate, b.serviceDate) ||
      compareText(a.serviceName, b.serviceName),
  );
}

export function serviceSummary(
  records: readonly AttendanceRecord[],
  serviceDate: string,
  serviceName?: string | null,
): ServiceSummary {
  const selected = filterByService(records, serviceDate, serviceName);
  return {
    entries: selected.length,
    people: sumHousehold(selected),
    allTimeRecords: records.length,
  };
}

/** Distinct non-empty service names, sorted. */
export function serviceOptions(records: readonly AttendanceRecord[]): string[] {
  const names = new Set(
    records.map((record) => record.serviceName).filter(Boolean),
  );
  return [...names].sort(compareText);
}

function containsIgnoringCase(value: string, needle: string) {
  return value.toLowerCase().includes(needle.toLowerCase());
}

/**
 * Attendance log view: exact service date, case-insensitive substring match
 * on service name and attendee. Empty filters match everything.
 */
export function filterLog(
  records: readonly AttendanceRecord[],
  filters: LogFilters,
): AttendanceRecord[] {
  const date = filters.date ? (toIsoDate(filters.date) ?? filters.date) : null;
  const service = filters.serviceContains?.trim();
  const attendee = filters.attendeeContains?.trim();

  return records.filter(
    (record) =>
      (!date || record.serviceDate === date) &&
      (!service || containsIgnoringCase(record.serviceName, service)) &&
      (!attendee || containsIgnoringCase(record.attendee, attendee)),
  );
}
