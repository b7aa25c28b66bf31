/**
 * Code Registry - static lookup from short codes to canonical identifiers
 *
 * Tables live in data/registry/*.json and are loaded once per process.
 * Each identifier may be given as its short code (e.g. "FR", "B16"), its
 * canonical id (EIC area code), its slug ("wind_onshore") or its display
 * name ("Wind Onshore"); matching ignores case.
 */

import { readFileSync } from "node:fs";

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { InvalidParameterError } from "../errors.js";

// ============================================================================
// Types
// ============================================================================

export type RegistryKind = "area" | "psrType" | "processType" | "category";

const RegistryEntrySchema = Type.Object({
  code: Type.String({ minLength: 1 }),
  canonicalId: Type.String({ minLength: 1 }),
  displayName: Type.String({ minLength: 1 }),
  slug: Type.String({ minLength: 1 }),
});

const RegistryFileSchema = Type.Array(RegistryEntrySchema);

export type RegistryEntry = Readonly<Static<typeof RegistryEntrySchema>>;

export type RegistryTables = Record<RegistryKind, readonly RegistryEntry[]>;

// ============================================================================
// Constants
// ============================================================================

const DATA_DIR = new URL("../../data/registry/", import.meta.url);

const TABLE_FILES: Record<RegistryKind, string> = {
  area: "areas.json",
  psrType: "psr-types.json",
  processType: "process-types.json",
  category: "categories.json",
};

const KIND_LABELS: Record<RegistryKind, string> = {
  area: "country",
  psrType: "PSR type",
  processType: "process type",
  category: "category",
};

function mapKinds<T>(fn: (kind: RegistryKind) => T): Record<RegistryKind, T> {
  return {
    area: fn("area"),
    psrType: fn("psrType"),
    processType: fn("processType"),
    category: fn("category"),
  };
}

// ============================================================================
// Registry
// ============================================================================

function normalize(identifier: string): string {
  return identifier.trim().toLowerCase().replace(/\s+/g, "_");
}

export class CodeRegistry {
  private readonly tables: RegistryTables;
  private readonly indexes: Record<RegistryKind, Map<string, RegistryEntry>>;

  constructor(tables: RegistryTables) {
    this.tables = Object.freeze(
      mapKinds((kind) =>
        Object.freeze(tables[kind].map((entry) => Object.freeze({ ...entry })))
      )
    );
    this.indexes = mapKinds((kind) => buildIndex(this.tables[kind]));
  }

  /**
   * Resolve an identifier, or null when the table has no such entry
   */
  resolve(kind: RegistryKind, identifier: string): RegistryEntry | null {
    return this.indexes[kind].get(normalize(identifier)) ?? null;
  }

  /**
   * Resolve an identifier or fail with InvalidParameterError
   */
  lookup(kind: RegistryKind, identifier: string): RegistryEntry {
    const entry = this.resolve(kind, identifier);
    if (entry === null) {
      const available = this.tables[kind]
        .map((e) => e.code)
        .sort()
        .join(", ");
      throw new InvalidParameterError(
        `Unknown ${KIND_LABELS[kind]}: '${identifier}'. Available: ${available}`,
        { kind, identifier }
      );
    }
    return entry;
  }

  list(kind: RegistryKind): readonly RegistryEntry[] {
    return this.tables[kind];
  }
}

// Codes win over canonical ids, slugs and names when keys collide
function buildIndex(
  entries: readonly RegistryEntry[]
): Map<string, RegistryEntry> {
  const index = new Map<string, RegistryEntry>();
  const keyFns: ((entry: RegistryEntry) => string)[] = [
    (e) => e.code,
    (e) => e.canonicalId,
    (e) => e.slug,
    (e) => e.displayName,
  ];

  for (const keyFn of keyFns) {
    for (const entry of entries) {
      const key = normalize(keyFn(entry));
      if (!index.has(key)) {
        index.set(key, entry);
      }
    }
  }

  return index;
}

// ============================================================================
// Loading
// ============================================================================

export function readRegistryTable(file: URL): RegistryEntry[] {
  const data: unknown = JSON.parse(readFileSync(file, "utf-8"));

  if (!Value.Check(RegistryFileSchema, data)) {
    const first = Value.Errors(RegistryFileSchema, data).First();
    throw new Error(
      `Invalid registry table ${file.pathname}: ${first?.path ?? ""} ${first?.message ?? ""}`.trim()
    );
  }

  return data;
}

export function loadRegistry(dir: URL = DATA_DIR): CodeRegistry {
  return new CodeRegistry(
    mapKinds((kind) => readRegistryTable(new URL(TABLE_FILES[kind], dir)))
  );
}

let defaultRegistry: CodeRegistry | undefined;

/**
 * Process-wide registry, read from disk on first use
 */
export function getDefaultRegistry(): CodeRegistry {
  defaultRegistry ??= loadRegistry();
  return defaultRegistry;
}
