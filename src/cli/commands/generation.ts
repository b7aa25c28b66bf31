/**
 * Generation command - output, forecasts and capacity per production type
 */

import {
  requireValues,
  runQuery,
  withCommonOptions,
  withCountryOption,
  withPsrOption,
  type CommonOptions,
} from "../utils/query.js";

import type { GenerationApi, PsrFetchOptions } from "../../client/client.js";
import type { Command } from "commander";
import type { ResultTable } from "../../types/index.js";

interface GenerationOptions extends CommonOptions {
  country: string[];
  psr: string[];
}

type GenerationFetcher = (
  api: GenerationApi,
  start: Date,
  end: Date,
  countries: string[],
  options: PsrFetchOptions
) => Promise<ResultTable>;

const SUBCOMMANDS: readonly {
  name: string;
  description: string;
  fetch: GenerationFetcher;
}[] = [
  {
    name: "actual",
    description: "Actual generation per production type",
    fetch: (api, ...args) => api.actual(...args),
  },
  {
    name: "forecast",
    description: "Day-ahead wind and solar generation forecast",
    fetch: (api, ...args) => api.forecast(...args),
  },
  {
    name: "capacity",
    description: "Installed capacity per production type",
    fetch: (api, ...args) => api.installedCapacity(...args),
  },
  {
    name: "per-plant",
    description: "Actual generation per production unit",
    fetch: (api, ...args) => api.perPlant(...args),
  },
];

export function registerGenerationCommand(program: Command): void {
  const generation = program
    .command("generation")
    .description("Electricity generation");

  for (const { name, description, fetch } of SUBCOMMANDS) {
    withPsrOption(withCountryOption(withCommonOptions(generation.command(name))))
      .description(description)
      .action(async (options: GenerationOptions) => {
        await runQuery(
          `generation (${name})`,
          options,
          ({ client, start, end, signal }) =>
            fetch(
              client.generation,
              start,
              end,
              requireValues(options.country, "--country"),
              {
                psrType: options.psr.length > 0 ? options.psr : undefined,
                signal,
              }
            )
        );
      });
  }
}
