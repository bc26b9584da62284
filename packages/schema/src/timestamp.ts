import type { ISO8601 } from "./schema.js";

// date [T|space time [offset]]
const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2})(?::(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function normalizeOffset(raw: string | undefined): string | null {
  if (raw === undefined) return "";
  if (raw === "Z") return "+00:00";

  const sign = raw[0];
  const digits = raw.slice(1).replace(":", "");
  const hh = Number(digits.slice(0, 2));
  const mm = Number(digits.slice(2, 4));
  if (hh > 23 || mm > 59) return null;

  return `${sign}${digits.slice(0, 2)}:${digits.slice(2, 4)}`;
}

/**
 * Parse an ISO-8601 date or date-time and return it in one canonical form:
 * `YYYY-MM-DDTHH:MM:SS[.fraction][±HH:MM]`.
 *
 * - a bare date means midnight
 * - the time may stop after the hour or the minute; the rest is written out as zero
 * - `Z` is written as `+00:00`
 * - the calendar is checked (no Feb 30, no hour 24)
 *
 * Returns null when the value is not a timestamp.
 */
export function parseIsoTimestamp(value: string): ISO8601 | null {
  const m = ISO_PATTERN.exec(value.trim());
  if (!m) return null;

  const [, y, mo, d, hh = "00", mi = "00", ss = "00", fraction, rawOffset] = m;

  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (Number(hh) > 23 || Number(mi) > 59 || Number(ss) > 59) return null;

  const offset = normalizeOffset(rawOffset);
  if (offset === null) return null;

  const frac = fraction ? `.${fraction}` : "";
  return `${y}-${mo}-${d}T${hh}:${mi}:${ss}${frac}${offset}`;
}
