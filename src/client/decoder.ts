/**
 * Response Decoder - raw payload bytes to XML documents
 *
 * Archive detection looks at the leading bytes only. The declared
 * content type is not trusted: the API labels ZIP archives and XML
 * documents inconsistently.
 */

import { strFromU8, unzipSync } from "fflate";

import { APIResponseError } from "../errors.js";
import { apiLogger } from "../logger.js";
import { looksLikeXml } from "./xml.js";

import type { RawPayload } from "../types/index.js";

// "PK" followed by a local file header, an (empty archive) end of central
// directory record, or a spanning marker
const ZIP_SIGNATURES: readonly (readonly number[])[] = [
  [0x50, 0x4b, 0x03, 0x04],
  [0x50, 0x4b, 0x05, 0x06],
  [0x50, 0x4b, 0x07, 0x08],
];

export function isArchive(bytes: Uint8Array): boolean {
  return ZIP_SIGNATURES.some((signature) =>
    signature.every((byte, i) => bytes[i] === byte)
  );
}

function snippetOf(bytes: Uint8Array): string {
  return strFromU8(bytes.subarray(0, 1024));
}

/**
 * Decode a payload into one or more XML documents
 */
export function decodePayload(payload: RawPayload): string[] {
  const { bytes } = payload;

  if (!isArchive(bytes)) {
    const text = strFromU8(bytes);
    if (!looksLikeXml(text)) {
      throw new APIResponseError(
        "Response is neither a ZIP archive nor an XML document.",
        { snippet: text }
      );
    }
    return [text];
  }

  let entries: Record<string, Uint8Array>;
  try {
    entries = unzipSync(bytes);
  } catch (error) {
    throw new APIResponseError("Response is a corrupt ZIP archive.", {
      snippet: snippetOf(bytes),
      cause: error,
    });
  }

  const documents: string[] = [];
  const skipped: string[] = [];

  for (const [name, content] of Object.entries(entries)) {
    if (name.endsWith("/")) {
      continue;
    }
    const text = strFromU8(content);
    if (looksLikeXml(text)) {
      documents.push(text);
    } else {
      skipped.push(name);
    }
  }

  if (skipped.length > 0) {
    apiLogger.warn({ skipped }, "Skipped non-XML archive entries");
  }

  if (documents.length === 0) {
    throw new APIResponseError("ZIP archive contains no XML documents.", {
      snippet: `entries: ${Object.keys(entries).join(", ")}`,
    });
  }

  apiLogger.debug(
    { documents: documents.length, contentType: payload.contentType },
    "Unpacked ZIP archive"
  );

  return documents;
}
