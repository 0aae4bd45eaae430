import { format } from "date-fns";

import { ValidationError } from "../errors";
import type { AttendanceRecord } from "../types";
import { ISO_DATE_FORMAT, parseServiceDate, toIsoDate } from "../utils/coerce";
import {
  compareServiceDates,
  compareText,
  serviceOptions,
  sumHousehold,
} from "./service";

export const MIN_ROLLING_WINDOW = 1;
export const MAX_ROLLING_WINDOW = 8;
export const DEFAULT_ROLLING_WINDOW = 3;
export const DEFAULT_TOP_LIMIT = 20;

export interface DateRange {
  start: string;
  end: string;
}

export interface DashboardFilters {
  /** Inclusive on both ends */
  range?: DateRange | null;
  /** Single service name; empty means every service */
  serviceName?: string | null;
}

export interface DailyPoint {
  date: string;
  people: number;
  entries: number;
  /** Trailing mean of `people`; null until the window is full */
  roll: number | null;
}

export interface ServiceMixPoint {
  date: string;
  serviceName: string;
  people: number;
}

export interface AttendeeRanking {
  attendee: string;
  times: number;
  people: number;
}

export interface DashboardKpis {
  uniqueAttendees: number;
  totalEntries: number;
  totalPeople: number;
  avgHousehold: number;
}

export interface Dashboard {
  range: DateRange | null;
  serviceOptions: string[];
  kpis: DashboardKpis;
  daily: DailyPoint[];
  serviceMix: ServiceMixPoint[];
  topAttendees: AttendeeRanking[];
}

interface DatedRecord {
  record: AttendanceRecord;
  date: Date;
  day: string;
}

function parseBound(value: string, label: "start" | "end"): Date {
  const iso = toIsoDate(value);
  const parsed = iso ? parseServiceDate(iso) : null;
  if (!parsed) {
    throw new ValidationError(`Invalid ${label} date: ${value}`, label);
  }
  return parsed;
}

/**
 * Restrict to the inclusive range and service. Rows whose service date does
 * not parse are dropped here, since every view built on this is date-based.
 */
function selectDated(
  records: readonly AttendanceRecord[],
  filters: DashboardFilters,
): DatedRecord[] {
  const start = filters.range ? parseBound(filters.range.start, "start") : null;
  const end = filters.range ? parseBound(filters.range.end, "end") : null;
  const serviceName = filters.serviceName || null;

  const selected: DatedRecord[] = [];
  for (const record of records) {
    const date = parseServiceDate(record.serviceDate);
    if (!date) continue;
    if (start && date.getTime() < start.getTime()) continue;
    if (end && date.getTime() > end.getTime()) continue;
    if (serviceName && record.serviceName !== serviceName) continue;
    selected.push({ record, date, day: format(date, ISO_DATE_FORMAT) });
  }
  return selected;
}

export function applyDashboardFilters(
  records: readonly AttendanceRecord[],
  filters: DashboardFilters,
): AttendanceRecord[] {
  return selectDated(records, filters).map(({ record }) => record);
}

export function assertRollingWindow(window: number): void {
  if (
    !Number.isInteger(window) ||
    window < MIN_ROLLING_WINDOW ||
    window > MAX_ROLLING_WINDOW
  ) {
    throw new ValidationError(
      `Rolling window must be an integer between ${MIN_ROLLING_WINDOW} and ${MAX_ROLLING_WINDOW}`,
      "window",
    );
  }
}

/**
 * Trailing arithmetic mean over the last `window` points. The first
 * `window - 1` points have no value.
 */
export function rollingMean(
  values: readonly number[],
  window: number,
): (number | null)[] {
  assertRollingWindow(window);
  let sum = 0;
  return values.map((value, index) => {
    sum += value;
    if (index >= window) {
      sum -= values[index - window] ?? 0;
    }
    return index >= window - 1 ? sum / window : null;
  });
}

export function dailySeries(
  records: readonly AttendanceRecord[],
  filters: DashboardFilters = {},
  window: number = DEFAULT_ROLLING_WINDOW,
): DailyPoint[] {
  assertRollingWindow(window);
  const days = new Map<string, { date: Date; people: number; entries: number }>();

  for (const { record, date, day } of selectDated(records, filters)) {
    const bucket = days.get(day) ?? { date, people: 0, entries: 0 };
    bucket.people += record.household;
    bucket.entries += 1;
    days.set(day, bucket);
  }

  const ordered = [...days.entries()].sort(
    ([, a], [, b]) => a.date.getTime() - b.date.getTime(),
  );
  const roll = rollingMean(
    ordered.map(([, bucket]) => bucket.people),
    window,
  );

  return ordered.map(([day, bucket], index) => ({
    date: day,
    people: bucket.people,
    entries: bucket.entries,
    roll: roll[index] ?? null,
  }));
}

/** People per (date, service), for a stacked view. */
export function serviceMix(
  records: readonly AttendanceRecord[],
  filters: DashboardFilters = {},
): ServiceMixPoint[] {
  const groups = new Map<string, ServiceMixPoint>();

  for (const { record, day } of selectDated(records, filters)) {
    const key = JSON.stringify([day, record.serviceName]);
    const point = groups.get(key) ?? {
      date: day,
      serviceName: record.serviceName,
      people: 0,
    };
    point.people += record.household;
    groups.set(key, point);
  }

  return [...groups.values()].sort(
    (a, b) =>
      compareServiceDates(a.date, b.date) ||
      compareText(a.serviceName, b.serviceName),
  );
}

/**
 * Attendees ranked by head count, descending. Equal head counts keep the
 * order in which the attendee first appears.
 */
export function topAttendees(
  records: readonly AttendanceRecord[],
  filters: DashboardFilters = {},
  limit: number = DEFAULT_TOP_LIMIT,
): AttendeeRanking[] {
  const groups = new Map<string, AttendeeRanking>();

  for (const { record } of selectDated(records, filters)) {
    const ranking = groups.get(record.attendee) ?? {
      attendee: record.attendee,
      times: 0,
      people: 0,
    };
    ranking.times += 1;
    ranking.people += record.household;
    groups.set(record.attendee, ranking);
  }

  // Array.prototype.sort is stable
  return [...groups.values()]
    .sort((a, b) => b.people - a.people)
    .slice(0, Math.max(0, limit));
}

export function dashboardKpis(
  records: readonly AttendanceRecord[],
): DashboardKpis {
  const totalEntries = records.length;
  const totalPeople = sumHousehold(records);
  return {
    uniqueAttendees: new Set(records.map((record) => record.attendee)).size,
    totalEntries,
    totalPeople,
    avgHousehold:
      Math.round((totalPeople / Math.max(totalEntries, 1)) * 100) / 100,
  };
}

/** Earliest and latest parsable service dates, or null when there are none. */
export function defaultDateRange(
  records: readonly AttendanceRecord[],
): DateRange | null {
  let start: string | null = null;
  let end: string | null = null;

  for (const record of records) {
    if (!parseServiceDate(record.serviceDate)) continue;
    if (!start || compareServiceDates(record.serviceDate, start) < 0) {
      start = record.serviceDate;
    }
    if (!end || compareServiceDates(record.serviceDate, end) > 0) {
      end = record.serviceDate;
    }
  }

  return start && end ? { start, end } : null;
}

export interface DashboardOptions extends DashboardFilters {
  window?: number;
  limit?: number;
}

export function buildDashboard(
  records: readonly AttendanceRecord[],
  options: DashboardOptions = {},
): Dashboard {
  const window = options.window ?? DEFAULT_ROLLING_WINDOW;
  assertRollingWindow(window);

  const range = options.range ?? defaultDateRange(records);
  const filters: DashboardFilters = {
    range,
    serviceName: options.serviceName,
  };
  const filtered = applyDashboardFilters(records, filters);

  return {
    range,
    serviceOptions: serviceOptions(records),
    kpis: dashboardKpis(filtered),
    daily: dailySeries(filtered, {}, window),
    serviceMix: serviceMix(filtered),
    topAttendees: topAttendees(filtered, {}, options.limit),
  };
}
