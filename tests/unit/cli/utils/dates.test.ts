import { describe, it, expect } from "vitest";

import {
  parseCliInstant,
  startOfDayInZone,
  zoneOffsetMs,
} from "../../../../src/cli/utils/dates.js";
import { InvalidParameterError } from "../../../../src/errors.js";

describe("cli/utils/dates", () => {
  describe("zoneOffsetMs", () => {
    it("should follow daylight saving time", () => {
      expect(zoneOffsetMs(new Date("2024-01-15T12:00:00Z"), "Europe/Brussels")).toBe(3_600_000);
      expect(zoneOffsetMs(new Date("2024-07-15T12:00:00Z"), "Europe/Brussels")).toBe(7_200_000);
      expect(zoneOffsetMs(new Date("2024-07-15T12:00:00Z"), "UTC")).toBe(0);
    });
  });

  describe("startOfDayInZone", () => {
    it("should find local midnight in winter and summer", () => {
      expect(startOfDayInZone(2024, 1, 1, "Europe/Brussels").toISOString()).toBe(
        "2023-12-31T23:00:00.000Z"
      );
      expect(startOfDayInZone(2024, 7, 1, "Europe/Brussels").toISOString()).toBe(
        "2024-06-30T22:00:00.000Z"
      );
    });

    it("should handle the day clocks change", () => {
      expect(startOfDayInZone(2024, 3, 31, "Europe/Brussels").toISOString()).toBe(
        "2024-03-30T23:00:00.000Z"
      );
      expect(startOfDayInZone(2024, 10, 27, "Europe/Brussels").toISOString()).toBe(
        "2024-10-26T22:00:00.000Z"
      );
    });
  });

  describe("parseCliInstant", () => {
    it("should read calendar dates in the given zone", () => {
      expect(parseCliInstant("2024-01-01", "Europe/Brussels", "start").toISOString()).toBe(
        "2023-12-31T23:00:00.000Z"
      );
      expect(parseCliInstant("2024-01-01", "UTC", "start").toISOString()).toBe(
        "2024-01-01T00:00:00.000Z"
      );
    });

    it("should take timestamps with an offset as they are", () => {
      expect(
        parseCliInstant("2024-01-01T06:00:00+02:00", "Europe/Brussels", "end").toISOString()
      ).toBe("2024-01-01T04:00:00.000Z");
    });

    it("should reject timestamps without an offset", () => {
      expect(() => parseCliInstant("2024-01-01T06:00:00", "UTC", "start")).toThrow(
        InvalidParameterError
      );
    });

    it("should reject impossible dates", () => {
      expect(() => parseCliInstant("2024-02-30", "UTC", "start")).toThrow(
        "--start is not a valid date: 2024-02-30"
      );
    });
  });
});
