/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type { Observation, ResultTable } from "../../types/index.js";

export type OutputFormat = "table" | "csv" | "json";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["table", "csv", "json"];

interface Column {
  header: string;
  cell: (row: Observation) => string;
}

type TextField = Exclude<keyof Observation, "timestamp" | "value" | "dimension">;

// Shown only when at least one row carries them
const OPTIONAL_FIELDS: readonly { field: TextField; header: string }[] = [
  { field: "psrType", header: "psr_type" },
  { field: "psrCode", header: "psr_code" },
  { field: "category", header: "category" },
  { field: "categoryCode", header: "category_code" },
  { field: "unitName", header: "unit_name" },
  { field: "unitEic", header: "unit_eic" },
  { field: "inDomain", header: "in_domain" },
  { field: "outDomain", header: "out_domain" },
  { field: "currency", header: "currency" },
  { field: "unit", header: "unit" },
];

/**
 * Columns for a result table, in output order
 */
export function resultColumns(table: ResultTable): Column[] {
  const columns: Column[] = [
    { header: "timestamp", cell: (row) => row.timestamp.toISOString() },
  ];

  if (table.labelColumn !== null) {
    columns.push({ header: table.labelColumn, cell: (row) => row.dimension ?? "" });
  }

  columns.push({
    header: "value",
    cell: (row) => (row.value === null ? "" : String(row.value)),
  });

  for (const { field, header } of OPTIONAL_FIELDS) {
    if (table.rows.some((row) => row[field] !== undefined)) {
      columns.push({ header, cell: (row) => row[field] ?? "" });
    }
  }

  return columns;
}

function escapeCsv(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatCsv(table: ResultTable): string {
  const columns = resultColumns(table);
  const lines = [columns.map((c) => escapeCsv(c.header)).join(",")];
  for (const row of table.rows) {
    lines.push(columns.map((c) => escapeCsv(c.cell(row))).join(","));
  }
  return lines.join("\n");
}

export function formatJson(table: ResultTable): string {
  return JSON.stringify(table, null, 2);
}

/**
 * Display a result table with cli-table3
 */
export function displayResultTable(table: ResultTable): void {
  const columns = resultColumns(table);

  const output = new CliTable3({
    head: columns.map((c) => chalk.cyan(c.header)),
  });

  for (const row of table.rows) {
    output.push(
      columns.map((c) => {
        const text = c.cell(row);
        return c.header === "value" && text === "" ? chalk.gray("null") : text;
      })
    );
  }

  console.log(output.toString());
  console.log(chalk.gray(`\n${String(table.rows.length)} row(s) returned\n`));
}

export function printResult(table: ResultTable, format: OutputFormat): void {
  switch (format) {
    case "csv":
      console.log(formatCsv(table));
      break;
    case "json":
      console.log(formatJson(table));
      break;
    case "table":
      displayResultTable(table);
      break;
  }

  for (const missing of table.missing) {
    printWarning(`No data for ${missing.label}: ${missing.reason}`);
  }
}

/**
 * Print error message
 */
export function printError(message: string): void {
  console.error(chalk.red("Error:"), message);
}

/**
 * Print warning message
 */
export function printWarning(message: string): void {
  console.error(chalk.yellow("Warning:"), message);
}
