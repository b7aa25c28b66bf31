// ENTSO-E Transparency Platform types
// Queries, sub-requests, decoded points and the assembled result table

// =====================
// Query Types
// =====================

export type DocumentFamilyName =
  | "day-ahead-prices"
  | "actual-load"
  | "load-forecast"
  | "actual-generation"
  | "generation-forecast"
  | "installed-capacity"
  | "generation-per-plant"
  | "crossborder-flows"
  | "scheduled-exchanges"
  | "net-transfer-capacity"
  | "imbalance-prices"
  | "imbalance-volumes";

/**
 * Ordered cross-border pair; flows go from `from` into `to`
 */
export interface BorderPair {
  from: string;
  to: string;
}

/** An area code (ISO code, EIC code or name) or a border pair */
export type DimensionValue = string | BorderPair;

/**
 * Accepted instant input. Strings must carry an explicit offset
 * ("2024-01-01T00:00:00Z", "2024-01-01T00:00+01:00").
 */
export type InstantInput = Date | string;

export type OneOrMany<T> = T | readonly T[];

/** Caller-facing query description, validated by the planner */
export interface QueryInput {
  family: DocumentFamilyName;
  start: InstantInput;
  end: InstantInput;
  dimensions: OneOrMany<DimensionValue>;
  psrTypes?: OneOrMany<string>;
}

/** Validated, immutable query */
export interface Query {
  readonly family: DocumentFamilyName;
  readonly start: Date;
  readonly end: Date;
  readonly dimensions: readonly DimensionValue[];
  readonly psrTypes: readonly string[];
}

// =====================
// Planning Types
// =====================

export interface TimeWindow {
  start: Date;
  end: Date;
}

export type LabelColumn = "country" | "border";

/**
 * A dimension value resolved against the code registry
 */
export interface ResolvedDimension {
  /** Stable key, e.g. "FR" or "FR>ES" */
  key: string;
  /** Human-readable label, e.g. "France" or "France → Spain" */
  label: string;
  /** Domain parameters sent to the API */
  params: Readonly<Record<string, string>>;
}

/**
 * One bounded (window, dimension, fuel filter) unit of work
 */
export interface SubRequest {
  /** Submission order within the query */
  index: number;
  family: DocumentFamilyName;
  window: TimeWindow;
  dimension: ResolvedDimension;
  psrType: string | null;
  params: Readonly<Record<string, string>>;
}

// =====================
// Transport Types
// =====================

export interface RawPayload {
  bytes: Uint8Array;
  /** Declared headers; never used for format detection */
  contentType: string | null;
  contentDisposition: string | null;
}

export type TransportOutcome =
  | { kind: "payload"; payload: RawPayload }
  | { kind: "no-data"; reason: string };

// =====================
// Parsed Document Types
// =====================

/**
 * Series-level metadata shared by every point of one TimeSeries
 */
export interface SeriesMetadata {
  psrCode?: string;
  unitEic?: string;
  unitName?: string;
  inDomain?: string;
  outDomain?: string;
  currency?: string;
  unit?: string;
}

/** One point of a parsed document, before enrichment */
export interface ParsedPoint extends SeriesMetadata {
  timestamp: Date;
  value: number | null;
  categoryCode?: string;
}

export type SubRequestResult =
  | { kind: "data"; points: ParsedPoint[] }
  | { kind: "no-data"; reason: string };

export interface SubRequestOutcome {
  request: SubRequest;
  result: SubRequestResult;
}

// =====================
// Result Types
// =====================

export interface Observation {
  /** Always UTC */
  timestamp: Date;
  value: number | null;
  /** Dimension label; present only when the query had several dimension values */
  dimension?: string;
  category?: string;
  categoryCode?: string;
  psrType?: string;
  psrCode?: string;
  unitEic?: string;
  unitName?: string;
  inDomain?: string;
  outDomain?: string;
  currency?: string;
  unit?: string;
}

/** Dimension value that contributed no observations */
export interface MissingDimension {
  key: string;
  label: string;
  reason: string;
}

export interface ResultTable {
  family: DocumentFamilyName;
  /** Name of the dimension column, or null for single-value queries */
  labelColumn: LabelColumn | null;
  rows: Observation[];
  missing: MissingDimension[];
}
