#!/usr/bin/env node

/**
 * ENTSO-E Transparency Platform CLI
 *
 * Fetches prices, load, generation, transmission and balancing series.
 */

import { Command } from "commander";

import { registerBalancingCommand } from "./commands/balancing.js";
import { registerCodesCommand } from "./commands/codes.js";
import { registerGenerationCommand } from "./commands/generation.js";
import { registerLoadCommand } from "./commands/load.js";
import { registerPricesCommand } from "./commands/prices.js";
import { registerTransmissionCommand } from "./commands/transmission.js";

const program = new Command();

program
  .name("entsoe")
  .description("ENTSO-E Transparency Platform market data CLI")
  .version("0.1.0");

// Register all commands
registerPricesCommand(program);
registerLoadCommand(program);
registerGenerationCommand(program);
registerTransmissionCommand(program);
registerBalancingCommand(program);
registerCodesCommand(program);

await program.parseAsync(process.argv);
