/**
 * Market document fixtures for testing
 */

import { strToU8, zipSync } from "fflate";

export interface PointFixture {
  position: number;
  /** Point child elements, e.g. { quantity: "42" } */
  fields: Record<string, string>;
}

export interface PeriodFixture {
  start: string;
  end?: string;
  resolution: string;
  points: PointFixture[];
}

export interface SeriesFixture {
  periods: PeriodFixture[];
  psrType?: string;
  unitEic?: string;
  unitName?: string;
  inDomain?: string;
  outDomain?: string;
  currency?: string;
  priceUnit?: string;
  quantityUnit?: string;
  flowDirection?: string;
}

function element(name: string, value: string | undefined): string {
  return value === undefined ? "" : `<${name}>${value}</${name}>`;
}

function renderPoint(point: PointFixture): string {
  const fields = Object.entries(point.fields)
    .map(([name, value]) => element(name, value))
    .join("");
  return `<Point><position>${String(point.position)}</position>${fields}</Point>`;
}

function renderPeriod(period: PeriodFixture): string {
  return (
    "<Period>" +
    `<timeInterval><start>${period.start}</start>${element("end", period.end)}</timeInterval>` +
    `<resolution>${period.resolution}</resolution>` +
    period.points.map(renderPoint).join("") +
    "</Period>"
  );
}

function renderSeries(series: SeriesFixture, index: number): string {
  const psr =
    series.psrType === undefined && series.unitEic === undefined
      ? ""
      : "<MktPSRType>" +
        element("psrType", series.psrType) +
        (series.unitEic === undefined
          ? ""
          : "<PowerSystemResources>" +
            element("mRID", series.unitEic) +
            element("name", series.unitName) +
            "</PowerSystemResources>") +
        "</MktPSRType>";

  return (
    "<TimeSeries>" +
    `<mRID>${String(index + 1)}</mRID>` +
    element("in_Domain.mRID", series.inDomain) +
    element("out_Domain.mRID", series.outDomain) +
    element("currency_Unit.name", series.currency) +
    element("price_Measure_Unit.name", series.priceUnit) +
    element("quantity_Measure_Unit.name", series.quantityUnit) +
    element("flowDirection.direction", series.flowDirection) +
    psr +
    series.periods.map(renderPeriod).join("") +
    "</TimeSeries>"
  );
}

/**
 * Build a namespaced market document
 */
export function marketDocument(
  series: SeriesFixture[],
  root = "GL_MarketDocument"
): string {
  return (
    '<?xml version="1.0" encoding="UTF-8"?>' +
    `<${root} xmlns="urn:iec62325.351:tc57wg16:451-6:generationloaddocument:3:0">` +
    "<mRID>fixture</mRID>" +
    series.map(renderSeries).join("") +
    `</${root}>`
  );
}

/**
 * One series, one period, one value field
 */
export function simpleDocument(
  start: string,
  values: (number | null)[],
  options: { field?: string; resolution?: string; root?: string } & Omit<
    SeriesFixture,
    "periods"
  > = {}
): string {
  const { field = "quantity", resolution = "PT60M", root, ...series } = options;
  return marketDocument(
    [
      {
        ...series,
        periods: [
          {
            start,
            resolution,
            points: values.map((value, i) => ({
              position: i + 1,
              fields: value === null ? {} : { [field]: String(value) },
            })),
          },
        ],
      },
    ],
    root
  );
}

export function acknowledgement(code: string, text: string): string {
  return (
    '<?xml version="1.0" encoding="UTF-8"?>' +
    '<Acknowledgement_MarketDocument xmlns="urn:iec62325.351:tc57wg16:451-1:acknowledgementdocument:7:0">' +
    "<mRID>ack</mRID>" +
    `<Reason><code>${code}</code><text>${text}</text></Reason>` +
    "</Acknowledgement_MarketDocument>"
  );
}

export const NO_DATA_ACK = acknowledgement(
  "999",
  "No matching data found for Data item"
);

/**
 * Zip documents in-process, one entry per name
 */
export function zipDocuments(documents: Record<string, string>): Uint8Array {
  const entries: Record<string, Uint8Array> = {};
  for (const [name, text] of Object.entries(documents)) {
    entries[name] = strToU8(text);
  }
  return zipSync(entries);
}
