#!/usr/bin/env node
/**
 * @annuitas/cli — Entry point.
 *
 * Loads config, builds the calculation context and runs one command.
 */

import chalk from "chalk";
import { ZodError } from "zod";
import { CalculationContext } from "@annuitas/calc";
import { runCli } from "./cli.js";
import { formatConfigErrors, loadConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { createLogger } from "./logger.js";
import type { ExitCode } from "./run.js";

function main(): ExitCode {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ZodError) {
      for (const line of formatConfigErrors(error)) {
        console.error(`Invalid configuration: ${line}`);
      }
      return 2;
    }
    throw error;
  }

  const logger = createLogger(config);

  return CalculationContext.of({
    precision: config.CALC_PRECISION,
    rounding: config.CALC_ROUNDING,
  }).match(
    (context) => {
      logger.debug({ context: context.toString() }, "Numeric context loaded");

      const outcome = runCli(process.argv.slice(2), {
        context,
        logger,
        chalk,
        defaults: { currency: config.DEFAULT_CURRENCY, decimals: config.DEFAULT_DECIMALS },
      });

      for (const line of outcome.stdout) console.log(line);
      for (const line of outcome.stderr) console.error(line);
      return outcome.exitCode;
    },
    (error): ExitCode => {
      logger.fatal({ code: error.code }, error.message);
      return 2;
    },
  );
}

process.exitCode = main();
