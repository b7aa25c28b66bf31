import { describe, it, expect } from "vitest";

import { InvalidParameterError } from "../../../src/errors.js";
import {
  CodeRegistry,
  getDefaultRegistry,
  loadRegistry,
} from "../../../src/registry/codes.js";

function smallRegistry(): CodeRegistry {
  return new CodeRegistry({
    area: [
      { code: "FR", canonicalId: "10YFR-RTE------C", displayName: "France", slug: "fr" },
      { code: "ES", canonicalId: "10YES-REE------0", displayName: "Spain", slug: "es" },
    ],
    psrType: [
      { code: "B19", canonicalId: "B19", displayName: "Wind Onshore", slug: "wind_onshore" },
    ],
    processType: [],
    category: [],
  });
}

describe("registry/codes", () => {
  describe("CodeRegistry.resolve", () => {
    it("should resolve by code, canonical id, slug and display name", () => {
      const registry = smallRegistry();

      expect(registry.resolve("area", "FR")?.canonicalId).toBe("10YFR-RTE------C");
      expect(registry.resolve("area", "10YFR-RTE------C")?.code).toBe("FR");
      expect(registry.resolve("area", "france")?.code).toBe("FR");
      expect(registry.resolve("psrType", "wind_onshore")?.code).toBe("B19");
      expect(registry.resolve("psrType", "Wind Onshore")?.code).toBe("B19");
    });

    it("should ignore case and surrounding whitespace", () => {
      expect(smallRegistry().resolve("area", "  es ")?.displayName).toBe("Spain");
    });

    it("should return null for unknown identifiers", () => {
      expect(smallRegistry().resolve("area", "XX")).toBeNull();
    });
  });

  describe("CodeRegistry.lookup", () => {
    it("should throw InvalidParameterError listing available codes", () => {
      const registry = smallRegistry();

      expect(() => registry.lookup("area", "XX")).toThrow(InvalidParameterError);
      expect(() => registry.lookup("area", "XX")).toThrow(
        "Unknown country: 'XX'. Available: ES, FR"
      );
    });

    it("should carry the kind and identifier in details", () => {
      try {
        smallRegistry().lookup("psrType", "B99");
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidParameterError);
        if (error instanceof InvalidParameterError) {
          expect(error.details).toEqual({ kind: "psrType", identifier: "B99" });
          expect(error.message).toBe("Unknown PSR type: 'B99'. Available: B19");
        }
      }
    });
  });

  describe("immutability", () => {
    it("should not be affected by later changes to the input tables", () => {
      const area = [
        { code: "FR", canonicalId: "10YFR-RTE------C", displayName: "France", slug: "fr" },
      ];
      const registry = new CodeRegistry({ area, psrType: [], processType: [], category: [] });

      area[0] = { code: "XX", canonicalId: "XX", displayName: "Nowhere", slug: "xx" };

      expect(registry.list("area").map((e) => e.code)).toEqual(["FR"]);
      expect(Object.isFrozen(registry.list("area"))).toBe(true);
    });
  });

  describe("loadRegistry", () => {
    it("should load the bundled tables", () => {
      const registry = loadRegistry();

      expect(registry.lookup("area", "DE_LU").canonicalId).toBe("10Y1001A1001A82H");
      expect(registry.lookup("psrType", "solar").code).toBe("B16");
      expect(registry.lookup("category", "A04").displayName).toBe("Excess balance");
      expect(registry.lookup("processType", "A16").code).toBe("A16");
    });

    it("should return one shared default registry", () => {
      expect(getDefaultRegistry()).toBe(getDefaultRegistry());
    });
  });
});
