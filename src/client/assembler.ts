/**
 * Result Assembler - merges sub-request outcomes into one table
 *
 * Overlapping windows can return the same point twice; the first one seen
 * (in sub-request order) wins. Rows are sorted by timestamp, then by
 * dimension label, and the sort is stable so repeated queries produce the
 * same table.
 */

import { NoDataError } from "../errors.js";
import { apiLogger } from "../logger.js";

import type { QueryPlan } from "./planner.js";
import type { CodeRegistry } from "../registry/codes.js";
import type {
  MissingDimension,
  Observation,
  ParsedPoint,
  ResolvedDimension,
  ResultTable,
  SubRequestOutcome,
} from "../types/index.js";

/**
 * Identity of a point within one query result
 */
export function observationKey(dimensionKey: string, point: ParsedPoint): string {
  return [
    point.timestamp.toISOString(),
    dimensionKey,
    point.categoryCode ?? "",
    point.psrCode ?? "",
    point.unitEic ?? "",
    point.inDomain ?? "",
    point.outDomain ?? "",
  ].join("|");
}

function compareRows(a: Observation, b: Observation): number {
  const byTime = a.timestamp.getTime() - b.timestamp.getTime();
  if (byTime !== 0) {
    return byTime;
  }
  const labelA = a.dimension ?? "";
  const labelB = b.dimension ?? "";
  return labelA < labelB ? -1 : labelA > labelB ? 1 : 0;
}

class LabelResolver {
  private readonly warned = new Set<string>();

  constructor(private readonly registry: CodeRegistry) {}

  psrType(code: string): string | undefined {
    return this.label("psrType", code);
  }

  category(code: string): string | undefined {
    return this.label("category", code);
  }

  private label(kind: "psrType" | "category", code: string): string | undefined {
    const entry = this.registry.resolve(kind, code);
    if (entry !== null) {
      return entry.displayName;
    }

    const key = `${kind}:${code}`;
    if (!this.warned.has(key)) {
      this.warned.add(key);
      apiLogger.warn({ kind, code }, "Unknown code in response; leaving it unlabelled");
    }
    return undefined;
  }
}

function toObservation(
  point: ParsedPoint,
  dimension: ResolvedDimension,
  labelDimension: boolean,
  labels: LabelResolver
): Observation {
  const { categoryCode, psrCode, ...rest } = point;
  const row: Observation = { ...rest };

  if (labelDimension) {
    row.dimension = dimension.label;
  }

  if (categoryCode !== undefined) {
    row.categoryCode = categoryCode;
    const category = labels.category(categoryCode);
    if (category !== undefined) {
      row.category = category;
    }
  }

  if (psrCode !== undefined) {
    row.psrCode = psrCode;
    const psrType = labels.psrType(psrCode);
    if (psrType !== undefined) {
      row.psrType = psrType;
    }
  }

  return row;
}

/**
 * Merge outcomes into a result table.
 *
 * Dimension values that produced no rows are listed in `missing`; when no
 * dimension produced any row the query fails with NoDataError.
 */
export function assembleSeries(
  plan: QueryPlan,
  outcomes: readonly SubRequestOutcome[],
  registry: CodeRegistry
): ResultTable {
  const labels = new LabelResolver(registry);
  const multiValued = plan.dimensions.length > 1;

  const ordered = [...outcomes].sort((a, b) => a.request.index - b.request.index);

  const seen = new Set<string>();
  const rows: Observation[] = [];
  const rowsPerDimension = new Map<string, number>();
  const noDataReasons = new Map<string, string>();

  for (const { request, result } of ordered) {
    const { dimension } = request;

    if (result.kind === "no-data") {
      if (!noDataReasons.has(dimension.key)) {
        noDataReasons.set(dimension.key, result.reason);
      }
      continue;
    }

    for (const point of result.points) {
      const key = observationKey(dimension.key, point);
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      rows.push(toObservation(point, dimension, multiValued, labels));
      rowsPerDimension.set(dimension.key, (rowsPerDimension.get(dimension.key) ?? 0) + 1);
    }
  }

  const missing: MissingDimension[] = plan.dimensions
    .filter((dimension) => !rowsPerDimension.has(dimension.key))
    .map((dimension) => ({
      key: dimension.key,
      label: dimension.label,
      reason: noDataReasons.get(dimension.key) ?? "No points returned.",
    }));

  if (rows.length === 0) {
    throw new NoDataError(undefined, {
      family: plan.family.name,
      dimensions: missing.map((m) => m.key),
      reasons: missing.map((m) => m.reason),
    });
  }

  if (missing.length > 0) {
    apiLogger.warn(
      { family: plan.family.name, missing: missing.map((m) => m.key) },
      "Some dimension values returned no data"
    );
  }

  rows.sort(compareRows);

  return {
    family: plan.family.name,
    labelColumn: multiValued ? plan.family.labelColumn : null,
    rows,
    missing,
  };
}
