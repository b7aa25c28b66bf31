/**
 * Date parsing for CLI options
 *
 * Accepts a calendar date ("2024-01-01"), read as midnight in the given
 * time zone, or a full timestamp with an explicit offset.
 */

import { InvalidParameterError } from "../../errors.js";
import { parseInstant } from "../../utils/time.js";

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Offset of a time zone from UTC at a given instant, in milliseconds
 */
export function zoneOffsetMs(instant: Date, timeZone: string): number {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    hourCycle: "h23",
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
  }).formatToParts(instant);

  const get = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find((part) => part.type === type)?.value ?? "0");

  const wallClock = Date.UTC(
    get("year"),
    get("month") - 1,
    get("day"),
    get("hour"),
    get("minute"),
    get("second")
  );
  return wallClock - (instant.getTime() - instant.getUTCMilliseconds());
}

/**
 * The instant at which a calendar day starts in a time zone
 */
export function startOfDayInZone(
  year: number,
  month: number,
  day: number,
  timeZone: string
): Date {
  const guess = Date.UTC(year, month - 1, day);
  const offset = zoneOffsetMs(new Date(guess), timeZone);
  const corrected = zoneOffsetMs(new Date(guess - offset), timeZone);
  return new Date(guess - corrected);
}

export function parseCliInstant(
  text: string,
  timeZone: string,
  name: string
): Date {
  const match = DATE_ONLY.exec(text.trim());
  if (match !== null) {
    const [year, month, day] = match.slice(1).map(Number);
    if (year === undefined || month === undefined || day === undefined) {
      throw new InvalidParameterError(`--${name} is not a valid date: ${text}`);
    }

    // Date.UTC rolls 2024-02-30 over into March
    const calendar = new Date(Date.UTC(year, month - 1, day));
    if (calendar.getUTCMonth() !== month - 1 || calendar.getUTCDate() !== day) {
      throw new InvalidParameterError(`--${name} is not a valid date: ${text}`);
    }
    return startOfDayInZone(year, month, day, timeZone);
  }

  const parsed = parseInstant(text);
  if (!parsed.ok) {
    throw new InvalidParameterError(
      parsed.reason === "naive"
        ? `--${name} needs a date (YYYY-MM-DD) or a timestamp with an offset, got ${text}`
        : `--${name} is not a valid timestamp: ${text}`
    );
  }
  return parsed.instant;
}
