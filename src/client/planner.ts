/**
 * Request Planner - turns a logical query into bounded sub-requests
 *
 * The API rejects requests spanning more than one year, so the
 * [start, end) interval is cut into consecutive windows of at most one
 * calendar year, aligned to the query's own start instant. Every
 * dimension value (and fuel filter, where the family takes one) gets its
 * own set of windows.
 */

import { InvalidParameterError } from "../errors.js";
import { apiLogger } from "../logger.js";
import { formatApiTimestamp, addYearsUtc, parseInstant } from "../utils/time.js";
import { getDocumentFamily, type DocumentFamily } from "./families.js";

import type { CodeRegistry } from "../registry/codes.js";
import type {
  BorderPair,
  DimensionValue,
  InstantInput,
  OneOrMany,
  Query,
  QueryInput,
  ResolvedDimension,
  SubRequest,
  TimeWindow,
} from "../types/index.js";

// ============================================================================
// Types
// ============================================================================

export interface QueryPlan {
  query: Query;
  family: DocumentFamily;
  dimensions: ResolvedDimension[];
  windows: TimeWindow[];
  subRequests: SubRequest[];
}

// ============================================================================
// Constants
// ============================================================================

/** Maximum span of one request, in calendar years */
export const MAX_WINDOW_YEARS = 1;

// ============================================================================
// Validation
// ============================================================================

function isList<T>(value: OneOrMany<T>): value is readonly T[] {
  return Array.isArray(value);
}

function toList<T>(value: OneOrMany<T>): T[] {
  return isList(value) ? [...value] : [value];
}

function requireInstant(input: InstantInput, name: "start" | "end"): Date {
  const parsed = parseInstant(input);
  if (parsed.ok) {
    return parsed.instant;
  }

  if (parsed.reason === "naive") {
    throw new InvalidParameterError(
      `${name} timestamp must be timezone-aware. ` +
        `Example: "2024-01-01T00:00:00+01:00" or "2024-01-01T00:00:00Z"`,
      { [name]: String(input) }
    );
  }
  throw new InvalidParameterError(`${name} is not a valid timestamp.`, {
    [name]: String(input),
  });
}

/**
 * Validate caller input into an immutable Query
 */
export function createQuery(input: QueryInput): Query {
  const start = requireInstant(input.start, "start");
  const end = requireInstant(input.end, "end");

  if (start.getTime() >= end.getTime()) {
    throw new InvalidParameterError("start must be before end.", {
      start: start.toISOString(),
      end: end.toISOString(),
    });
  }

  const dimensions = toList(input.dimensions);
  if (dimensions.length === 0) {
    throw new InvalidParameterError(
      "At least one dimension value is required."
    );
  }

  const psrTypes = input.psrTypes === undefined ? [] : toList(input.psrTypes);

  return Object.freeze({
    family: input.family,
    start,
    end,
    dimensions: Object.freeze(dimensions),
    psrTypes: Object.freeze(psrTypes),
  });
}

// ============================================================================
// Windowing
// ============================================================================

/**
 * Split [start, end) into consecutive windows no longer than one calendar
 * year each. Windows share boundaries; there are no gaps.
 */
export function splitWindows(start: Date, end: Date): TimeWindow[] {
  const windows: TimeWindow[] = [];
  let current = start;

  while (current.getTime() < end.getTime()) {
    const limit = addYearsUtc(current, MAX_WINDOW_YEARS);
    const windowEnd = limit.getTime() < end.getTime() ? limit : end;
    windows.push({ start: current, end: windowEnd });
    current = windowEnd;
  }

  return windows;
}

// ============================================================================
// Dimension Resolution
// ============================================================================

function isBorderPair(value: DimensionValue): value is BorderPair {
  return typeof value !== "string";
}

function resolveDimension(
  value: DimensionValue,
  family: DocumentFamily,
  registry: CodeRegistry
): ResolvedDimension {
  if (family.dimensionKind === "area") {
    if (isBorderPair(value)) {
      throw new InvalidParameterError(
        `${family.name} takes area codes, not border pairs.`,
        { family: family.name, value }
      );
    }

    const area = registry.lookup("area", value);
    const params: Record<string, string> = {};
    for (const param of family.areaParams) {
      params[param] = area.canonicalId;
    }
    return { key: area.code, label: area.displayName, params };
  }

  if (!isBorderPair(value)) {
    throw new InvalidParameterError(
      `${family.name} takes { from, to } border pairs, not a single area.`,
      { family: family.name, value }
    );
  }

  const from = registry.lookup("area", value.from);
  const to = registry.lookup("area", value.to);
  if (from.canonicalId === to.canonicalId) {
    throw new InvalidParameterError(
      `Border pair must connect two different areas, got ${from.code} → ${to.code}.`,
      { family: family.name, value }
    );
  }

  return {
    key: `${from.code}>${to.code}`,
    label: `${from.displayName} → ${to.displayName}`,
    params: { in_Domain: to.canonicalId, out_Domain: from.canonicalId },
  };
}

function resolvePsrTypes(
  query: Query,
  family: DocumentFamily,
  registry: CodeRegistry
): (string | null)[] {
  if (query.psrTypes.length === 0) {
    return [null];
  }

  if (!family.acceptsPsrType) {
    throw new InvalidParameterError(
      `${family.name} does not accept a PSR type filter.`,
      { family: family.name, psrTypes: query.psrTypes }
    );
  }

  const codes = query.psrTypes.map((psr) => registry.lookup("psrType", psr).code);
  return [...new Set(codes)];
}

// ============================================================================
// Planning
// ============================================================================

function buildParams(
  family: DocumentFamily,
  dimension: ResolvedDimension,
  window: TimeWindow,
  psrType: string | null
): Record<string, string> {
  const params: Record<string, string> = {
    documentType: family.documentType,
  };
  if (family.processType !== undefined) {
    params.processType = family.processType;
  }
  Object.assign(params, family.extraParams, dimension.params);
  if (psrType !== null) {
    params.psrType = psrType;
  }
  params.periodStart = formatApiTimestamp(window.start);
  params.periodEnd = formatApiTimestamp(window.end);
  return params;
}

/**
 * Validate a query and derive its sub-requests. Pure: no network access.
 *
 * Sub-requests are ordered dimension first, then window, then fuel
 * filter; that order is the "first seen" order used for deduplication.
 */
export function planQuery(
  input: QueryInput,
  registry: CodeRegistry
): QueryPlan {
  const query = createQuery(input);
  const family = getDocumentFamily(query.family);

  const dimensions = query.dimensions.map((value) =>
    resolveDimension(value, family, registry)
  );
  const uniqueDimensions = dimensions.filter(
    (dim, i) => dimensions.findIndex((d) => d.key === dim.key) === i
  );

  const psrTypes = resolvePsrTypes(query, family, registry);
  const windows = splitWindows(query.start, query.end);

  const subRequests: SubRequest[] = [];
  for (const dimension of uniqueDimensions) {
    for (const window of windows) {
      for (const psrType of psrTypes) {
        subRequests.push({
          index: subRequests.length,
          family: family.name,
          window,
          dimension,
          psrType,
          params: buildParams(family, dimension, window, psrType),
        });
      }
    }
  }

  apiLogger.debug(
    {
      family: family.name,
      dimensions: uniqueDimensions.map((d) => d.key),
      windows: windows.length,
      subRequests: subRequests.length,
    },
    "Planned query"
  );

  return { query, family, dimensions: uniqueDimensions, windows, subRequests };
}
