/**
 * @annuitas/cli — Public API.
 */

export { ConfigSchema, loadConfig, formatConfigErrors } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { parseCliArgs, CliUsageError, USAGE } from "./args.js";
export type {
  AmountDefaults,
  CalculateCommand,
  CliCommand,
  HelpCommand,
  ListCommand,
} from "./args.js";
export { runCommand } from "./run.js";
export type { ExitCode, RunDeps, RunOutcome } from "./run.js";
export { runCli } from "./cli.js";
export type { CliDeps } from "./cli.js";
