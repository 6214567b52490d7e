/**
 * @annuitas/cli — Argument handling around runCommand.
 */

import { CliUsageError, USAGE, parseCliArgs } from "./args.js";
import type { AmountDefaults } from "./args.js";
import { runCommand } from "./run.js";
import type { RunDeps, RunOutcome } from "./run.js";

export interface CliDeps extends RunDeps {
  readonly defaults: AmountDefaults;
}

export function runCli(argv: readonly string[], deps: CliDeps): RunOutcome {
  try {
    return runCommand(parseCliArgs(argv, deps.defaults), deps);
  } catch (error) {
    if (error instanceof CliUsageError) {
      deps.logger.debug({ argv }, "usage error");
      return {
        exitCode: 2,
        stdout: [],
        stderr: [deps.chalk.red(`error: ${error.message}`), "", ...USAGE],
      };
    }
    throw error;
  }
}
