/**
 * DateKey helpers
 *
 * A DateKey is a calendar date as YYYY-MM-DD. Arithmetic runs on UTC
 * midnights so it is independent of the host time zone.
 */

import type { DateKey } from "@/types";
import { InvalidDateError } from "@/errors";
import { MONTH_NAMES } from "@/constants";

const DATE_KEY_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;

const MS_PER_DAY = 86_400_000;

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

function fromUtcDate(date: Date): DateKey {
  return `${date.getUTCFullYear()}-${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())}`;
}

/**
 * Parse and canonicalize a date string
 *
 * Accepts YYYY-MM-DD with optional single-digit month/day ("2024-1-5").
 * Rejects impossible dates such as 2023-02-29.
 *
 * @throws {InvalidDateError}
 */
export function normalizeDateKey(input: string): DateKey {
  const match = DATE_KEY_PATTERN.exec(input.trim());
  if (!match) {
    throw new InvalidDateError(input);
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    throw new InvalidDateError(input);
  }

  return fromUtcDate(date);
}

/**
 * Split a canonical DateKey into numbers (month is 1-based)
 */
export function dateKeyParts(dateKey: DateKey): { year: number; month: number; day: number } {
  const [year, month, day] = dateKey.split("-").map(Number);
  return { year, month, day };
}

/**
 * English month name of a DateKey ("January")
 */
export function monthNameOf(dateKey: DateKey): string {
  return MONTH_NAMES[dateKeyParts(dateKey).month - 1];
}

export function addDays(dateKey: DateKey, days: number): DateKey {
  const { year, month, day } = dateKeyParts(dateKey);
  return fromUtcDate(new Date(Date.UTC(year, month - 1, day) + days * MS_PER_DAY));
}

/**
 * Inclusive day count between two canonical keys (end - start + 1)
 */
export function countDaysInclusive(start: DateKey, end: DateKey): number {
  const a = dateKeyParts(start);
  const b = dateKeyParts(end);
  const diff = Date.UTC(b.year, b.month - 1, b.day) - Date.UTC(a.year, a.month - 1, a.day);
  return Math.round(diff / MS_PER_DAY) + 1;
}

/**
 * Every DateKey from start to end, both included
 * Returns [] when start > end
 */
export function enumerateDateRange(start: DateKey, end: DateKey): DateKey[] {
  const dates: DateKey[] = [];
  for (let current = start; current <= end; current = addDays(current, 1)) {
    dates.push(current);
  }
  return dates;
}

/**
 * Calendar date of an instant as seen in an IANA time zone
 *
 * @throws {RangeError} If the zone is unknown
 */
export function dateKeyInTimeZone(instant: Date, timeZone: string): DateKey {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  }).formatToParts(instant);

  const get = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((part) => part.type === type)?.value ?? "";

  return normalizeDateKey(`${get("year")}-${get("month")}-${get("day")}`);
}

/**
 * Drop repeated keys, keeping first-seen order
 */
export function uniqueDateKeys(dates: readonly DateKey[]): DateKey[] {
  return [...new Set(dates)];
}
