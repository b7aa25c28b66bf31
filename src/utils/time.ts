/**
 * UTC time helpers: instant parsing, API timestamp format, ISO-8601
 * durations and calendar arithmetic
 */

import type { InstantInput } from "../types/index.js";

// "Z", "+01:00", "+0100", "-05"
const OFFSET_SUFFIX = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

export type InstantParseResult =
  | { ok: true; instant: Date }
  | { ok: false; reason: "naive" | "invalid" };

/**
 * Parse an instant, rejecting strings without explicit offset information
 */
export function parseInstant(input: InstantInput): InstantParseResult {
  if (input instanceof Date) {
    return Number.isNaN(input.getTime())
      ? { ok: false, reason: "invalid" }
      : { ok: true, instant: new Date(input.getTime()) };
  }

  // ISO 8601 allows a space between date and time
  const text = input.trim().replace(/^(\d{4}-\d{2}-\d{2}) +/, "$1T");
  // Date-only strings ("2024-01-01") end in digits that look like an offset
  if (!text.includes("T") || !OFFSET_SUFFIX.test(text.slice(text.indexOf("T")))) {
    return { ok: false, reason: "naive" };
  }

  const instant = new Date(text);
  if (Number.isNaN(instant.getTime())) {
    return { ok: false, reason: "invalid" };
  }
  return { ok: true, instant };
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Format as the API's period parameter: YYYYMMDDHHmm in UTC
 */
export function formatApiTimestamp(date: Date): string {
  return (
    pad(date.getUTCFullYear(), 4) +
    pad(date.getUTCMonth() + 1) +
    pad(date.getUTCDate()) +
    pad(date.getUTCHours()) +
    pad(date.getUTCMinutes())
  );
}

function daysInMonthUtc(year: number, monthIndex: number): number {
  return new Date(Date.UTC(year, monthIndex + 1, 0)).getUTCDate();
}

/**
 * Add calendar months in UTC, clamping the day to the target month's
 * length (31 Jan + 1 month = 29 Feb in a leap year)
 */
export function addMonthsUtc(date: Date, months: number): Date {
  const totalMonths = date.getUTCFullYear() * 12 + date.getUTCMonth() + months;
  const year = Math.floor(totalMonths / 12);
  const monthIndex = totalMonths - year * 12;
  const day = Math.min(date.getUTCDate(), daysInMonthUtc(year, monthIndex));

  return new Date(
    Date.UTC(
      year,
      monthIndex,
      day,
      date.getUTCHours(),
      date.getUTCMinutes(),
      date.getUTCSeconds(),
      date.getUTCMilliseconds()
    )
  );
}

export function addYearsUtc(date: Date, years: number): Date {
  return addMonthsUtc(date, years * 12);
}

// ============================================================================
// ISO-8601 durations
// ============================================================================

export interface Duration {
  months: number;
  milliseconds: number;
}

const DURATION_PATTERN =
  /^P(?:(\d+)Y)?(?:(\d+)M)?(?:(\d+)W)?(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?)?$/;

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

/**
 * Parse a resolution such as PT15M, PT60M, PT1H, P1D, P7D, P1M or P1Y.
 * Returns null when the text is not a non-zero duration.
 */
export function parseDuration(text: string): Duration | null {
  const match = DURATION_PATTERN.exec(text.trim());
  if (match === null) {
    return null;
  }

  const part = (index: number): number => Number(match[index] ?? 0);
  const duration: Duration = {
    months: part(1) * 12 + part(2),
    milliseconds:
      part(3) * 7 * DAY_MS +
      part(4) * DAY_MS +
      part(5) * HOUR_MS +
      part(6) * MINUTE_MS +
      part(7) * 1000,
  };

  if (duration.months === 0 && duration.milliseconds === 0) {
    return null;
  }
  return duration;
}

/**
 * start + steps × duration; month and year parts move on the calendar
 */
export function advance(start: Date, duration: Duration, steps: number): Date {
  const shifted =
    duration.months !== 0
      ? addMonthsUtc(start, duration.months * steps)
      : start;
  return new Date(shifted.getTime() + duration.milliseconds * steps);
}
