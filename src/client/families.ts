/**
 * Document families - one entry per kind of remote query
 *
 * A family fixes the request parameters (document/process type, which
 * domain parameters carry the area) and the parsing rules (which Point
 * fields hold the value and the category).
 */

import type { DocumentFamilyName, LabelColumn } from "../types/index.js";

export type DimensionKind = "area" | "border";

export interface DocumentFamily {
  name: DocumentFamilyName;
  description: string;
  documentType: string;
  processType?: string;
  extraParams?: Readonly<Record<string, string>>;
  dimensionKind: DimensionKind;
  /** Domain parameters set to the area's EIC code (area families only) */
  areaParams: readonly string[];
  /** Point fields holding the value, tried in order */
  valueFields: readonly string[];
  /** Point-level category field, e.g. imbalance direction */
  pointCategoryField?: string;
  /** TimeSeries-level category field */
  seriesCategoryField?: string;
  acceptsPsrType: boolean;
  labelColumn: LabelColumn;
}

const QUANTITY_FIRST = ["quantity", "price.amount", "imbalance_Price.amount"];
const PRICE_FIRST = ["price.amount", "quantity", "imbalance_Price.amount"];
const IMBALANCE_PRICE_FIRST = [
  "imbalance_Price.amount",
  "price.amount",
  "quantity",
];

function areaFamily(
  family: Omit<
    DocumentFamily,
    "dimensionKind" | "labelColumn" | "valueFields" | "acceptsPsrType"
  > &
    Partial<Pick<DocumentFamily, "valueFields" | "acceptsPsrType">>
): DocumentFamily {
  return {
    valueFields: QUANTITY_FIRST,
    acceptsPsrType: false,
    ...family,
    dimensionKind: "area",
    labelColumn: "country",
  };
}

function borderFamily(
  family: Pick<
    DocumentFamily,
    "name" | "description" | "documentType" | "extraParams"
  >
): DocumentFamily {
  return {
    ...family,
    dimensionKind: "border",
    areaParams: [],
    valueFields: QUANTITY_FIRST,
    acceptsPsrType: false,
    labelColumn: "border",
  };
}

export const DOCUMENT_FAMILIES: Readonly<
  Record<DocumentFamilyName, DocumentFamily>
> = {
  "day-ahead-prices": areaFamily({
    name: "day-ahead-prices",
    description: "Day-ahead market prices (EUR/MWh)",
    documentType: "A44",
    areaParams: ["in_Domain", "out_Domain"],
    valueFields: PRICE_FIRST,
  }),
  "actual-load": areaFamily({
    name: "actual-load",
    description: "Actual total system load (MW)",
    documentType: "A65",
    processType: "A16",
    areaParams: ["outBiddingZone_Domain"],
  }),
  "load-forecast": areaFamily({
    name: "load-forecast",
    description: "Day-ahead total load forecast (MW)",
    documentType: "A65",
    processType: "A01",
    areaParams: ["outBiddingZone_Domain"],
  }),
  "actual-generation": areaFamily({
    name: "actual-generation",
    description: "Actual generation output per production type (MW)",
    documentType: "A75",
    processType: "A16",
    areaParams: ["in_Domain"],
    acceptsPsrType: true,
  }),
  "generation-forecast": areaFamily({
    name: "generation-forecast",
    description: "Day-ahead wind and solar generation forecast (MW)",
    documentType: "A69",
    processType: "A01",
    areaParams: ["in_Domain"],
    acceptsPsrType: true,
  }),
  "installed-capacity": areaFamily({
    name: "installed-capacity",
    description: "Installed generation capacity per production type (MW)",
    documentType: "A68",
    processType: "A33",
    areaParams: ["in_Domain"],
    acceptsPsrType: true,
  }),
  "generation-per-plant": areaFamily({
    name: "generation-per-plant",
    description: "Actual generation per production unit (MW)",
    documentType: "A73",
    processType: "A16",
    areaParams: ["in_Domain"],
    acceptsPsrType: true,
  }),
  "crossborder-flows": borderFamily({
    name: "crossborder-flows",
    description: "Physical cross-border flows (MW)",
    documentType: "A11",
  }),
  "scheduled-exchanges": borderFamily({
    name: "scheduled-exchanges",
    description: "Scheduled commercial exchanges (MW)",
    documentType: "A09",
  }),
  "net-transfer-capacity": borderFamily({
    name: "net-transfer-capacity",
    description: "Day-ahead net transfer capacity (MW)",
    documentType: "A61",
    extraParams: { "contract_MarketAgreement.Type": "A01" },
  }),
  "imbalance-prices": areaFamily({
    name: "imbalance-prices",
    description: "System imbalance prices (EUR/MWh)",
    documentType: "A85",
    areaParams: ["controlArea_Domain"],
    valueFields: IMBALANCE_PRICE_FIRST,
    pointCategoryField: "imbalance_Price.category",
  }),
  "imbalance-volumes": areaFamily({
    name: "imbalance-volumes",
    description: "System imbalance volumes (MWh)",
    documentType: "A86",
    areaParams: ["controlArea_Domain"],
    seriesCategoryField: "flowDirection.direction",
  }),
};

export function isDocumentFamilyName(
  value: string
): value is DocumentFamilyName {
  return Object.hasOwn(DOCUMENT_FAMILIES, value);
}

export function getDocumentFamily(name: DocumentFamilyName): DocumentFamily {
  return DOCUMENT_FAMILIES[name];
}
