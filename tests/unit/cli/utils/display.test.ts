import { describe, it, expect } from "vitest";

import { formatCsv, formatJson, resultColumns } from "../../../../src/cli/utils/display.js";

import type { ResultTable } from "../../../../src/types/index.js";

const table: ResultTable = {
  family: "actual-generation",
  labelColumn: "country",
  rows: [
    {
      timestamp: new Date("2024-01-01T00:00:00Z"),
      value: 5,
      dimension: "France",
      psrCode: "B16",
      psrType: "Solar",
    },
    {
      timestamp: new Date("2024-01-01T00:00:00Z"),
      value: null,
      dimension: "Bosnia and Herzegovina, \"BA\"",
    },
  ],
  missing: [],
};

describe("cli/utils/display", () => {
  describe("resultColumns", () => {
    it("should include the label column and only populated optional columns", () => {
      expect(resultColumns(table).map((c) => c.header)).toEqual([
        "timestamp",
        "country",
        "value",
        "psr_type",
        "psr_code",
      ]);
    });

    it("should leave out the label column for single-value tables", () => {
      const single: ResultTable = {
        family: "actual-load",
        labelColumn: null,
        rows: [{ timestamp: new Date("2024-01-01T00:00:00Z"), value: 1 }],
        missing: [],
      };

      expect(resultColumns(single).map((c) => c.header)).toEqual(["timestamp", "value"]);
    });
  });

  describe("formatCsv", () => {
    it("should write a header, escape fields and leave null values empty", () => {
      expect(formatCsv(table).split("\n")).toEqual([
        "timestamp,country,value,psr_type,psr_code",
        "2024-01-01T00:00:00.000Z,France,5,Solar,B16",
        '2024-01-01T00:00:00.000Z,"Bosnia and Herzegovina, ""BA""",,,',
      ]);
    });
  });

  describe("formatJson", () => {
    it("should serialize timestamps as ISO strings", () => {
      const parsed: unknown = JSON.parse(formatJson(table));

      expect(parsed).toMatchObject({
        family: "actual-generation",
        labelColumn: "country",
        rows: [{ timestamp: "2024-01-01T00:00:00.000Z", value: 5 }, { value: null }],
      });
    });
  });
});
