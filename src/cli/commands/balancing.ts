/**
 * Balancing command - imbalance prices and volumes
 */

import {
  requireValues,
  runQuery,
  withCommonOptions,
  withCountryOption,
  type CommonOptions,
} from "../utils/query.js";

import type { Command } from "commander";

interface BalancingOptions extends CommonOptions {
  country: string[];
}

export function registerBalancingCommand(program: Command): void {
  const balancing = program.command("balancing").description("System balancing");

  withCountryOption(withCommonOptions(balancing.command("prices")))
    .description("Imbalance prices")
    .action(async (options: BalancingOptions) => {
      await runQuery("imbalance prices", options, ({ client, start, end, signal }) =>
        client.balancing.imbalancePrices(
          start,
          end,
          requireValues(options.country, "--country"),
          { signal }
        )
      );
    });

  withCountryOption(withCommonOptions(balancing.command("volumes")))
    .description("Imbalance volumes")
    .action(async (options: BalancingOptions) => {
      await runQuery("imbalance volumes", options, ({ client, start, end, signal }) =>
        client.balancing.imbalanceVolumes(
          start,
          end,
          requireValues(options.country, "--country"),
          { signal }
        )
      );
    });
}
