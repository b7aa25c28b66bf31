/**
 * Load command - actual and forecast system load
 */

import {
  requireValues,
  runQuery,
  withCommonOptions,
  withCountryOption,
  type CommonOptions,
} from "../utils/query.js";

import type { Command } from "commander";

interface LoadOptions extends CommonOptions {
  country: string[];
}

export function registerLoadCommand(program: Command): void {
  const load = program.command("load").description("Total system load");

  withCountryOption(withCommonOptions(load.command("actual")))
    .description("Actual total load")
    .action(async (options: LoadOptions) => {
      await runQuery("actual load", options, ({ client, start, end, signal }) =>
        client.load.actual(start, end, requireValues(options.country, "--country"), {
          signal,
        })
      );
    });

  withCountryOption(withCommonOptions(load.command("forecast")))
    .description("Day-ahead total load forecast")
    .action(async (options: LoadOptions) => {
      await runQuery("load forecast", options, ({ client, start, end, signal }) =>
        client.load.forecast(start, end, requireValues(options.country, "--country"), {
          signal,
        })
      );
    });
}
