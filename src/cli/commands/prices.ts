/**
 * Prices command - day-ahead market prices
 */

import {
  requireValues,
  runQuery,
  withCommonOptions,
  withCountryOption,
  type CommonOptions,
} from "../utils/query.js";

import type { Command } from "commander";

interface PricesOptions extends CommonOptions {
  country: string[];
}

export function registerPricesCommand(program: Command): void {
  const prices = program.command("prices").description("Market prices");

  withCountryOption(withCommonOptions(prices.command("day-ahead")))
    .description("Day-ahead prices per bidding zone")
    .action(async (options: PricesOptions) => {
      await runQuery("day-ahead prices", options, ({ client, start, end, signal }) =>
        client.prices.dayAhead(start, end, requireValues(options.country, "--country"), {
          signal,
        })
      );
    });
}
