import { format, isValid, parse, parseISO } from "date-fns";

export const ISO_DATE_FORMAT = "yyyy-MM-dd";
export const TIMESTAMP_FORMAT = "yyyy-MM-dd HH:mm:ss";

const INTEGER_PATTERN = /^[+-]?\d+$/;

/** Largest value a stored integer column holds (32-bit signed). */
export const MAX_STORED_INT = 2_147_483_647;

/**
 * Parse a positive integer, falling back to `fallback` for anything else
 * (blank, non-numeric, fractional strings, zero, negatives, values above
 * {@link MAX_STORED_INT}). Finite numbers are truncated toward zero first.
 */
export function asInt(value: unknown, fallback = 1): number {
  let parsed: number | null = null;

  if (typeof value === "number" && Number.isFinite(value)) {
    parsed = Math.trunc(value);
  } else if (typeof value === "boolean") {
    parsed = value ? 1 : 0;
  } else if (typeof value === "string") {
    const trimmed = value.trim();
    if (INTEGER_PATTERN.test(trimmed)) {
      parsed = Number.parseInt(trimmed, 10);
    }
  }

  if (parsed === null || parsed <= 0 || parsed > MAX_STORED_INT) {
    return fallback;
  }
  return parsed;
}

const FALSE_FLAGS = new Set(["0", "false", "no", "n", "off"]);

/**
 * Roster `Active` flag. Stored as 1/0; anything unrecognised counts as active.
 */
export function asActiveFlag(value: unknown): boolean {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  if (typeof value === "string") {
    return !FALSE_FLAGS.has(value.trim().toLowerCase());
  }
  return true;
}

export function asText(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "number" && Number.isNaN(value)) return "";
  if (value instanceof Date) return format(value, TIMESTAMP_FORMAT);
  return String(value);
}

const DATE_INPUT_FORMATS = [
  ISO_DATE_FORMAT,
  TIMESTAMP_FORMAT,
  "yyyy-MM-dd'T'HH:mm:ss",
  "yyyy/MM/dd",
  "yyyy/M/d",
  "M/d/yyyy",
];

/**
 * Coerce a date-ish value to `yyyy-MM-dd`, or null when it cannot be read as
 * a calendar date.
 */
export function toIsoDate(value: unknown): string | null {
  if (value instanceof Date) {
    return isValid(value) ? format(value, ISO_DATE_FORMAT) : null;
  }
  if (typeof value !== "string") return null;

  const trimmed = value.trim();
  if (!trimmed) return null;

  const referenceDate = new Date(2000, 0, 1);
  for (const pattern of DATE_INPUT_FORMATS) {
    const parsed = parse(trimmed, pattern, referenceDate);
    if (isValid(parsed)) return format(parsed, ISO_DATE_FORMAT);
  }

  const iso = parseISO(trimmed);
  return isValid(iso) ? format(iso, ISO_DATE_FORMAT) : null;
}

/**
 * Storage form of a service date: ISO when parsable, otherwise the trimmed
 * input so the row still counts towards all-time totals.
 */
export function normalizeServiceDate(value: unknown): string {
  return toIsoDate(value) ?? asText(value).trim();
}

/**
 * Parse a stored `yyyy-MM-dd` service date as a local calendar date.
 * Returns null for anything that is not a real date in that exact form.
 */
export function parseServiceDate(value: string): Date | null {
  const parsed = parse(value, ISO_DATE_FORMAT, new Date(2000, 0, 1));
  if (!isValid(parsed)) return null;
  return format(parsed, ISO_DATE_FORMAT) === value ? parsed : null;
}

export function formatTimestamp(date: Date): string {
  return format(date, TIMESTAMP_FORMAT);
}
