/**
 * Transmission command - cross-border flows, exchanges and capacity
 */

import {
  requireValues,
  runQuery,
  withBorderOptions,
  withCommonOptions,
  type CommonOptions,
  type QueryContext,
} from "../utils/query.js";

import type { Command } from "commander";
import type { ResultTable } from "../../types/index.js";

interface TransmissionOptions extends CommonOptions {
  from: string[];
  to: string[];
}

type BorderFetcher = (
  context: QueryContext,
  from: string[],
  to: string[]
) => Promise<ResultTable>;

const SUBCOMMANDS: readonly {
  name: string;
  description: string;
  fetch: BorderFetcher;
}[] = [
  {
    name: "flows",
    description: "Physical cross-border flows",
    fetch: ({ client, start, end, signal }, from, to) =>
      client.transmission.crossborderFlows(start, end, from, to, { signal }),
  },
  {
    name: "exchanges",
    description: "Scheduled commercial exchanges",
    fetch: ({ client, start, end, signal }, from, to) =>
      client.transmission.scheduledExchanges(start, end, from, to, { signal }),
  },
  {
    name: "capacity",
    description: "Day-ahead net transfer capacity",
    fetch: ({ client, start, end, signal }, from, to) =>
      client.transmission.netTransferCapacity(start, end, from, to, { signal }),
  },
];

export function registerTransmissionCommand(program: Command): void {
  const transmission = program
    .command("transmission")
    .description("Cross-border transmission");

  for (const { name, description, fetch } of SUBCOMMANDS) {
    withBorderOptions(withCommonOptions(transmission.command(name)))
      .description(description)
      .action(async (options: TransmissionOptions) => {
        await runQuery(`transmission (${name})`, options, (context) =>
          fetch(
            context,
            requireValues(options.from, "--from"),
            requireValues(options.to, "--to")
          )
        );
      });
  }
}
