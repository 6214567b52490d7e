/**
 * @annuitas/cli — Command execution.
 *
 * Pure with respect to I/O: returns the lines to print and the exit code,
 * and leaves writing them to the entry point.
 */

import { FORMULA_KINDS, RateAndPeriods, getFormula } from "@annuitas/calc";
import type { CalcError, CalculationContext } from "@annuitas/calc";
import type { Money } from "@annuitas/types";
import type { ChalkInstance } from "chalk";
import type { CalculateCommand, CliCommand, ListCommand } from "./args.js";
import { USAGE } from "./args.js";
import type { Logger } from "./logger.js";

export interface RunDeps {
  readonly context: CalculationContext;
  readonly logger: Logger;
  readonly chalk: ChalkInstance;
}

/** 0 success, 1 calculation error, 2 usage error. */
export type ExitCode = 0 | 1 | 2;

export interface RunOutcome {
  readonly exitCode: ExitCode;
  readonly stdout: readonly string[];
  readonly stderr: readonly string[];
}

function formatMoney(money: Money): string {
  return `${money.amount} ${money.currency}`;
}

function toJsonMoney(money: Money): Money {
  return { amount: money.amount, currency: money.currency, decimals: money.decimals };
}

// =============================================================================
// Commands
// =============================================================================

function runList(command: ListCommand, deps: RunDeps): RunOutcome {
  const formulas = FORMULA_KINDS.map((kind) => getFormula(kind));

  if (command.json) {
    const rows = formulas.map(({ kind, name, description }) => ({ kind, name, description }));
    return { exitCode: 0, stdout: [JSON.stringify(rows)], stderr: [] };
  }

  const width = Math.max(...FORMULA_KINDS.map((kind) => kind.length));
  return {
    exitCode: 0,
    stdout: formulas.map(
      (formula) => `${deps.chalk.cyan(formula.kind.padEnd(width))}  ${formula.description}`,
    ),
    stderr: [],
  };
}

function failure(command: CalculateCommand, error: CalcError, deps: RunDeps): RunOutcome {
  deps.logger.error({ formula: command.formula, code: error.code }, error.message);

  if (command.json) {
    return {
      exitCode: 1,
      stdout: [JSON.stringify({ formula: command.formula, error: { code: error.code, message: error.message } })],
      stderr: [],
    };
  }

  return {
    exitCode: 1,
    stdout: [],
    stderr: [deps.chalk.red(`error [${error.code}] ${error.message}`)],
  };
}

function runCalculate(command: CalculateCommand, deps: RunDeps): RunOutcome {
  const { context, logger, chalk } = deps;
  const formula = getFormula(command.formula);

  return RateAndPeriods.from(command.rate, command.periods)
    .andThen((rateAndPeriods) => formula.calculate(command.amount, rateAndPeriods, context))
    .match(
      (result): RunOutcome => {
        logger.info(
          { formula: command.formula, currency: result.currency, periods: command.periods },
          "calculated",
        );

        if (command.json) {
          const row = {
            formula: command.formula,
            amount: toJsonMoney(command.amount),
            rate: command.rate,
            periods: command.periods,
            result: toJsonMoney(result),
          };
          return { exitCode: 0, stdout: [JSON.stringify(row)], stderr: [] };
        }

        return {
          exitCode: 0,
          stdout: [
            chalk.bold(formula.name),
            `  amount   ${formatMoney(command.amount)}`,
            `  rate     ${command.rate} x ${String(command.periods)} periods`,
            `  context  ${context.toString()}`,
            `  result   ${chalk.green(formatMoney(result))}`,
          ],
          stderr: [],
        };
      },
      (error) => failure(command, error, deps),
    );
}

/**
 * Execute a parsed command.
 */
export function runCommand(command: CliCommand, deps: RunDeps): RunOutcome {
  switch (command.type) {
    case "help":
      return { exitCode: 0, stdout: [...USAGE], stderr: [] };
    case "list":
      return runList(command, deps);
    case "calculate":
      return runCalculate(command, deps);
  }
}
