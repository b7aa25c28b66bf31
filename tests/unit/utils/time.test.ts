import { describe, it, expect } from "vitest";

import {
  addMonthsUtc,
  addYearsUtc,
  advance,
  formatApiTimestamp,
  parseDuration,
  parseInstant,
} from "../../../src/utils/time.js";

describe("utils/time", () => {
  describe("parseInstant", () => {
    it("should accept UTC and offset timestamps", () => {
      const utc = parseInstant("2024-01-01T00:00:00Z");
      const offset = parseInstant("2024-01-01T01:00:00+01:00");

      expect(utc).toEqual({ ok: true, instant: new Date(Date.UTC(2024, 0, 1)) });
      expect(offset).toEqual({ ok: true, instant: new Date(Date.UTC(2024, 0, 1)) });
    });

    it("should accept compact offsets", () => {
      const result = parseInstant("2024-06-01T02:00:00+0200");
      expect(result.ok && result.instant.toISOString()).toBe("2024-06-01T00:00:00.000Z");
    });

    it("should reject timestamps without an offset as naive", () => {
      expect(parseInstant("2024-01-01T00:00:00")).toEqual({ ok: false, reason: "naive" });
    });

    it("should accept a space between date and time", () => {
      expect(parseInstant("2024-01-01 00:00:00Z")).toEqual({
        ok: true,
        instant: new Date("2024-01-01T00:00:00Z"),
      });
      expect(parseInstant("2024-06-01 02:00+02:00")).toEqual({
        ok: true,
        instant: new Date("2024-06-01T00:00:00Z"),
      });
    });

    it("should still reject a space-separated timestamp without an offset", () => {
      expect(parseInstant("2024-01-01 00:00:00")).toEqual({ ok: false, reason: "naive" });
    });

    it("should reject date-only strings as naive", () => {
      expect(parseInstant("2024-01-01")).toEqual({ ok: false, reason: "naive" });
    });

    it("should reject unparseable timestamps", () => {
      expect(parseInstant("2024-13-45T99:00:00Z")).toEqual({ ok: false, reason: "invalid" });
    });

    it("should copy Date inputs", () => {
      const input = new Date(Date.UTC(2024, 0, 1));
      const result = parseInstant(input);

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.instant).not.toBe(input);
        expect(result.instant.getTime()).toBe(input.getTime());
      }
    });

    it("should reject invalid Date inputs", () => {
      expect(parseInstant(new Date(Number.NaN))).toEqual({ ok: false, reason: "invalid" });
    });
  });

  describe("formatApiTimestamp", () => {
    it("should format as YYYYMMDDHHmm in UTC", () => {
      expect(formatApiTimestamp(new Date("2024-03-05T07:45:00+01:00"))).toBe("202403050645");
    });
  });

  describe("addMonthsUtc", () => {
    it("should clamp to the end of a shorter month", () => {
      expect(addMonthsUtc(new Date("2024-01-31T00:00:00Z"), 1).toISOString()).toBe(
        "2024-02-29T00:00:00.000Z"
      );
    });

    it("should roll over the year", () => {
      expect(addMonthsUtc(new Date("2023-11-15T12:30:00Z"), 3).toISOString()).toBe(
        "2024-02-15T12:30:00.000Z"
      );
    });
  });

  describe("addYearsUtc", () => {
    it("should move 29 February to 28 February", () => {
      expect(addYearsUtc(new Date("2024-02-29T23:00:00Z"), 1).toISOString()).toBe(
        "2025-02-28T23:00:00.000Z"
      );
    });
  });

  describe("parseDuration", () => {
    it("should parse minute and hour resolutions", () => {
      expect(parseDuration("PT15M")).toEqual({ months: 0, milliseconds: 900_000 });
      expect(parseDuration("PT60M")).toEqual({ months: 0, milliseconds: 3_600_000 });
      expect(parseDuration("PT1H")).toEqual({ months: 0, milliseconds: 3_600_000 });
    });

    it("should parse day, week, month and year resolutions", () => {
      expect(parseDuration("P1D")).toEqual({ months: 0, milliseconds: 86_400_000 });
      expect(parseDuration("P1W")).toEqual({ months: 0, milliseconds: 604_800_000 });
      expect(parseDuration("P1M")).toEqual({ months: 1, milliseconds: 0 });
      expect(parseDuration("P1Y")).toEqual({ months: 12, milliseconds: 0 });
    });

    it("should return null for invalid or zero durations", () => {
      expect(parseDuration("15 minutes")).toBeNull();
      expect(parseDuration("PT0M")).toBeNull();
      expect(parseDuration("P")).toBeNull();
    });
  });

  describe("advance", () => {
    it("should step by fixed durations", () => {
      const start = new Date("2024-01-01T00:00:00Z");
      const step = { months: 0, milliseconds: 900_000 };

      expect(advance(start, step, 0).toISOString()).toBe("2024-01-01T00:00:00.000Z");
      expect(advance(start, step, 3).toISOString()).toBe("2024-01-01T00:45:00.000Z");
    });

    it("should step months on the calendar", () => {
      const start = new Date("2024-01-01T00:00:00Z");
      expect(advance(start, { months: 1, milliseconds: 0 }, 2).toISOString()).toBe(
        "2024-03-01T00:00:00.000Z"
      );
    });
  });
});
