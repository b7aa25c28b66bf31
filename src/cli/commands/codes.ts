/**
 * Codes command - list known area, production type and category codes
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import { getDefaultRegistry, type RegistryKind } from "../../registry/codes.js";
import { printError } from "../utils/display.js";

import type { Command } from "commander";

const CODE_LISTS: Readonly<Record<string, RegistryKind>> = {
  areas: "area",
  psr: "psrType",
  processes: "processType",
  categories: "category",
};

export function registerCodesCommand(program: Command): void {
  program
    .command("codes [list]")
    .description("List known codes: areas (default), psr, processes, categories")
    .action((list: string = "areas") => {
      const kind = Object.hasOwn(CODE_LISTS, list) ? CODE_LISTS[list] : undefined;
      if (kind === undefined) {
        printError(
          `Unknown code list: ${list}. Use one of ${Object.keys(CODE_LISTS).join(", ")}`
        );
        process.exitCode = 1;
        return;
      }

      const table = new CliTable3({
        head: [chalk.cyan("Code"), chalk.cyan("Identifier"), chalk.cyan("Name")],
      });
      for (const entry of getDefaultRegistry().list(kind)) {
        table.push([chalk.green(entry.code), entry.canonicalId, entry.displayName]);
      }
      console.log(table.toString());
    });
}
