/**
 * XML helpers shared by the transport and the document parser
 *
 * Namespaces are stripped and attributes ignored, so elements are
 * addressed by local name only. Text is kept as strings; numbers are
 * parsed by the caller.
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";

export type XmlNode = Record<string, unknown>;

const REPEATED_ELEMENTS = new Set(["TimeSeries", "Period", "Point", "Reason"]);

const parser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  removeNSPrefix: true,
  parseTagValue: false,
  trimValues: true,
  isArray: (name) => REPEATED_ELEMENTS.has(name),
});

export interface XmlDocument {
  rootName: string;
  root: XmlNode;
}

/**
 * Parse XML text; returns null when the text is not well-formed
 */
export function parseXml(text: string): XmlDocument | null {
  if (XMLValidator.validate(text) !== true) {
    return null;
  }

  const parsed: unknown = parser.parse(text);
  const top = asNode(parsed);
  if (top === undefined) {
    return null;
  }

  const first = Object.entries(top)[0];
  if (first === undefined) {
    return null;
  }

  // Empty root elements parse to ""
  const [rootName, value] = first;
  return { rootName, root: asNode(value) ?? {} };
}

export function looksLikeXml(text: string): boolean {
  return text.replace(/^\uFEFF/, "").trimStart().startsWith("<");
}

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asNode(value: unknown): XmlNode | undefined {
  return isNode(value) ? value : undefined;
}

export function child(node: XmlNode, name: string): XmlNode | undefined {
  const value = node[name];
  return asNode(Array.isArray(value) ? value[0] : value);
}

export function children(node: XmlNode, name: string): XmlNode[] {
  const value = node[name];
  const list: unknown[] = Array.isArray(value) ? value : [value];
  return list.flatMap((item) => {
    const itemNode = asNode(item);
    return itemNode === undefined ? [] : [itemNode];
  });
}

/**
 * Text of a direct child element, or undefined when absent or empty
 */
export function childText(node: XmlNode, name: string): string | undefined {
  const value = node[name];
  const first: unknown = Array.isArray(value) ? value[0] : value;
  if (typeof first === "string" || typeof first === "number") {
    const text = String(first).trim();
    return text === "" ? undefined : text;
  }
  return undefined;
}

// ============================================================================
// Acknowledgement documents
// ============================================================================

/** Reason code the API uses for "no matching data found" */
export const NO_DATA_REASON_CODE = "999";

export interface Acknowledgement {
  code: string;
  text: string;
  noData: boolean;
}

/**
 * Recognize an Acknowledgement_MarketDocument and extract its reason
 */
export function readAcknowledgement(
  doc: XmlDocument | string
): Acknowledgement | null {
  const parsed = typeof doc === "string" ? parseXml(doc) : doc;
  if (parsed === null || parsed.rootName !== "Acknowledgement_MarketDocument") {
    return null;
  }

  const reasons = children(parsed.root, "Reason");
  const reason = reasons[0];
  const code = reason !== undefined ? childText(reason, "code") : undefined;
  const text = reasons
    .map((r) => childText(r, "text"))
    .filter((t): t is string => t !== undefined)
    .join(" ");

  return {
    code: code ?? "UNKNOWN",
    text: text !== "" ? text : "No reason given.",
    noData: code === NO_DATA_REASON_CODE,
  };
}
