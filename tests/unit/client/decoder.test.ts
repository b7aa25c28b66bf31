import { strToU8 } from "fflate";
import { describe, it, expect } from "vitest";

import { decodePayload, isArchive } from "../../../src/client/decoder.js";
import { APIResponseError } from "../../../src/errors.js";
import { simpleDocument, zipDocuments } from "../../fixtures/documents.js";

import type { RawPayload } from "../../../src/types/index.js";

function payload(bytes: Uint8Array, contentType: string | null = null): RawPayload {
  return { bytes, contentType, contentDisposition: null };
}

const DOC_A = simpleDocument("2024-01-01T00:00Z", [1, 2]);
const DOC_B = simpleDocument("2024-01-02T00:00Z", [3, 4]);

describe("client/decoder", () => {
  describe("isArchive", () => {
    it("should recognize ZIP signatures", () => {
      expect(isArchive(zipDocuments({ "a.xml": DOC_A }))).toBe(true);
      expect(isArchive(zipDocuments({}))).toBe(true);
    });

    it("should not treat XML or short input as an archive", () => {
      expect(isArchive(strToU8(DOC_A))).toBe(false);
      expect(isArchive(new Uint8Array([0x50, 0x4b]))).toBe(false);
    });
  });

  describe("decodePayload", () => {
    it("should return a plain XML document as is", () => {
      expect(decodePayload(payload(strToU8(DOC_A), "text/xml"))).toEqual([DOC_A]);
    });

    it("should ignore a misleading content type", () => {
      const archive = zipDocuments({ "a.xml": DOC_A });
      expect(decodePayload(payload(archive, "text/xml"))).toEqual([DOC_A]);
      expect(decodePayload(payload(strToU8(DOC_B), "application/zip"))).toEqual([DOC_B]);
    });

    it("should return every document of an archive in archive order", () => {
      const archive = zipDocuments({ "first.xml": DOC_A, "second.xml": DOC_B });
      expect(decodePayload(payload(archive))).toEqual([DOC_A, DOC_B]);
    });

    it("should skip non-XML entries", () => {
      const archive = zipDocuments({ "readme.txt": "generated export", "data.xml": DOC_B });
      expect(decodePayload(payload(archive))).toEqual([DOC_B]);
    });

    it("should accept a byte order mark before the XML", () => {
      const withBom = strToU8(`\uFEFF${DOC_A}`);
      expect(decodePayload(payload(withBom))).toEqual([DOC_A]);
    });

    it("should fail on an archive with no entries", () => {
      expect(() => decodePayload(payload(zipDocuments({})))).toThrow(
        new APIResponseError("ZIP archive contains no XML documents.")
      );
    });

    it("should fail on a corrupt archive", () => {
      const corrupt = new Uint8Array(40);
      corrupt.set([0x50, 0x4b, 0x03, 0x04, 1, 2, 3, 4]);
      expect(() => decodePayload(payload(corrupt))).toThrow("Response is a corrupt ZIP archive.");
    });

    it("should fail on a payload that is neither archive nor XML, keeping a snippet", () => {
      try {
        decodePayload(payload(strToU8("Service temporarily unavailable")));
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(APIResponseError);
        if (error instanceof APIResponseError) {
          expect(error.message).toBe("Response is neither a ZIP archive nor an XML document.");
          expect(error.snippet).toBe("Service temporarily unavailable");
        }
      }
    });

    it("should truncate long snippets", () => {
      const long = "x".repeat(2000);
      try {
        decodePayload(payload(strToU8(long)));
        expect.unreachable();
      } catch (error) {
        expect(error instanceof APIResponseError && error.snippet).toBe("x".repeat(500));
      }
    });
  });
});
