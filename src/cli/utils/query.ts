/**
 * Shared option handling and execution for data commands
 */

import { Option, type Command } from "commander";
import ora from "ora";

import { EntsoeClient } from "../../client/client.js";
import { isValidTimeZone, loadConfig } from "../../config.js";
import { EntsoeError, InvalidParameterError, isRetryable } from "../../errors.js";
import { cliLogger } from "../../logger.js";
import { parseCliInstant } from "./dates.js";
import {
  OUTPUT_FORMATS,
  printError,
  printResult,
  type OutputFormat,
} from "./display.js";

import type { ResultTable } from "../../types/index.js";

export interface CommonOptions {
  start: string;
  end: string;
  tz?: string;
  format: OutputFormat;
  apiKey?: string;
}

export interface QueryContext {
  client: EntsoeClient;
  start: Date;
  end: Date;
  signal: AbortSignal;
}

export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Options every data command takes
 */
export function withCommonOptions(command: Command): Command {
  return command
    .requiredOption(
      "-s, --start <date>",
      "Start date (YYYY-MM-DD) or ISO timestamp with offset"
    )
    .requiredOption(
      "-e, --end <date>",
      "End date (YYYY-MM-DD, exclusive) or ISO timestamp with offset"
    )
    .option(
      "--tz <zone>",
      "Time zone for date-only --start/--end (default: ENTSOE_TIMEZONE)"
    )
    .addOption(
      new Option("-f, --format <format>", "Output format")
        .choices(OUTPUT_FORMATS)
        .default("table")
    )
    .option("--api-key <key>", "Security token (default: ENTSOE_API_KEY)");
}

export function withCountryOption(command: Command): Command {
  return command.option(
    "-c, --country <code>",
    "Area ISO code, EIC code or name (repeatable)",
    collect,
    []
  );
}

export function withPsrOption(command: Command): Command {
  return command.option(
    "-p, --psr <type>",
    "Production type code or name, e.g. B16 or solar (repeatable)",
    collect,
    []
  );
}

export function withBorderOptions(command: Command): Command {
  return command
    .option("--from <code>", "Exporting area (repeatable)", collect, [])
    .option("--to <code>", "Importing area (repeatable)", collect, []);
}

export function requireValues(values: string[] | undefined, flag: string): string[] {
  if (values === undefined || values.length === 0) {
    throw new InvalidParameterError(`At least one ${flag} is required.`);
  }
  return values;
}

/**
 * Resolve options, run the query behind a spinner and print the result.
 * Failures are printed and set a non-zero exit code.
 */
export async function runQuery(
  description: string,
  options: CommonOptions,
  fetcher: (context: QueryContext) => Promise<ResultTable>
): Promise<void> {
  const controller = new AbortController();
  const onSigint = (): void => {
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  const spinner = ora(`Fetching ${description}...`);

  try {
    const config = loadConfig();
    const timeZone = options.tz ?? config.timezone;
    if (!isValidTimeZone(timeZone)) {
      throw new InvalidParameterError(`Unknown time zone: ${timeZone}`);
    }
    const start = parseCliInstant(options.start, timeZone, "start");
    const end = parseCliInstant(options.end, timeZone, "end");
    const client = new EntsoeClient({ apiKey: options.apiKey, config });

    cliLogger.debug(
      { description, start: start.toISOString(), end: end.toISOString(), timeZone },
      "Running query"
    );

    spinner.start();
    const table = await fetcher({ client, start, end, signal: controller.signal });
    spinner.succeed(`Fetched ${String(table.rows.length)} row(s) of ${description}`);

    printResult(table, options.format);
  } catch (error) {
    spinner.stop();
    printError(error instanceof Error ? error.message : String(error));
    if (isRetryable(error)) {
      printError("This failure is temporary; try again later.");
    }
    cliLogger.debug(
      { err: error, code: error instanceof EntsoeError ? error.code : undefined },
      "Query failed"
    );
    process.exitCode = 1;
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}
