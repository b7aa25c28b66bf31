/**
 * Document Parser - one XML document to timestamped points
 *
 * All market documents share the TimeSeries > Period > Point layout.
 * Position N of a period is stamped period start + (N - 1) × resolution;
 * positions are 1-indexed.
 */

import { APIResponseError } from "../errors.js";
import { advance, parseDuration } from "../utils/time.js";
import { child, childText, children, parseXml, type XmlNode } from "./xml.js";

import type { DocumentFamily } from "./families.js";
import type { ParsedPoint, SeriesMetadata } from "../types/index.js";

/**
 * Parse a number, or null for empty and non-numeric text
 */
export function parseNumber(text: string | undefined): number | null {
  if (text === undefined || text.trim() === "") {
    return null;
  }
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

/**
 * First present value field of a Point, in the family's order
 */
export function extractPointValue(
  point: XmlNode,
  valueFields: readonly string[]
): number | null {
  for (const field of valueFields) {
    const text = childText(point, field);
    if (text !== undefined) {
      return parseNumber(text);
    }
  }
  return null;
}

function readSeriesMetadata(series: XmlNode): SeriesMetadata {
  const psr = child(series, "MktPSRType");
  const resource = psr !== undefined ? child(psr, "PowerSystemResources") : undefined;

  const fields: [keyof SeriesMetadata, string | undefined][] = [
    ["psrCode", psr !== undefined ? childText(psr, "psrType") : undefined],
    ["unitEic", resource !== undefined ? childText(resource, "mRID") : undefined],
    ["unitName", resource !== undefined ? childText(resource, "name") : undefined],
    ["inDomain", childText(series, "in_Domain.mRID")],
    ["outDomain", childText(series, "out_Domain.mRID")],
    ["currency", childText(series, "currency_Unit.name")],
    [
      "unit",
      childText(series, "price_Measure_Unit.name") ??
        childText(series, "quantity_Measure_Unit.name"),
    ],
  ];

  // Absent keys are left out so points compare cleanly
  const metadata: SeriesMetadata = {};
  for (const [key, value] of fields) {
    if (value !== undefined) {
      metadata[key] = value;
    }
  }
  return metadata;
}

function parsePeriod(
  period: XmlNode,
  metadata: SeriesMetadata,
  seriesCategory: string | undefined,
  family: DocumentFamily
): ParsedPoint[] {
  const interval = child(period, "timeInterval");
  const startText = interval !== undefined ? childText(interval, "start") : undefined;
  const resolutionText = childText(period, "resolution");
  if (startText === undefined || resolutionText === undefined) {
    return [];
  }

  const periodStart = new Date(startText);
  if (Number.isNaN(periodStart.getTime())) {
    throw new APIResponseError(`Cannot parse period start: ${startText}`, {
      snippet: startText,
    });
  }

  const resolution = parseDuration(resolutionText);
  if (resolution === null) {
    throw new APIResponseError(`Cannot parse resolution: ${resolutionText}`, {
      snippet: resolutionText,
    });
  }

  const points: ParsedPoint[] = [];
  for (const point of children(period, "Point")) {
    const position = Number(childText(point, "position"));
    if (!Number.isInteger(position) || position < 1) {
      continue;
    }

    const parsed: ParsedPoint = {
      timestamp: advance(periodStart, resolution, position - 1),
      value: extractPointValue(point, family.valueFields),
      ...metadata,
    };

    const categoryCode =
      (family.pointCategoryField !== undefined
        ? childText(point, family.pointCategoryField)
        : undefined) ?? seriesCategory;
    if (categoryCode !== undefined) {
      parsed.categoryCode = categoryCode;
    }

    points.push(parsed);
  }

  return points;
}

/**
 * Parse one market document into points ordered as they appear.
 *
 * Points without a recognized value field get a null value; a document in
 * which no point carries a value at all is rejected.
 */
export function parseDocument(xml: string, family: DocumentFamily): ParsedPoint[] {
  const doc = parseXml(xml);
  if (doc === null) {
    throw new APIResponseError("Response is not well-formed XML.", {
      snippet: xml,
    });
  }

  const points: ParsedPoint[] = [];
  for (const series of children(doc.root, "TimeSeries")) {
    const metadata = readSeriesMetadata(series);
    const seriesCategory =
      family.seriesCategoryField !== undefined
        ? childText(series, family.seriesCategoryField)
        : undefined;

    for (const period of children(series, "Period")) {
      points.push(...parsePeriod(period, metadata, seriesCategory, family));
    }
  }

  if (!points.some((point) => point.value !== null)) {
    throw new APIResponseError(
      `${doc.rootName} contains no point with a value.`,
      { snippet: xml }
    );
  }

  return points;
}
