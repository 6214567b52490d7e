/**
 * @annuitas/cli — Argument parsing.
 *
 *   annuitas <formula> --amount <decimal> --rate <decimal> --periods <int>
 *            [--currency <code>] [--decimals <int>] [--json]
 *   annuitas list [--json]
 *   annuitas help
 */

import { parseArgs } from "node:util";
import { z } from "zod";
import { FORMULA_KINDS, isFormulaKind } from "@annuitas/calc";
import type { FormulaKind } from "@annuitas/calc";
import type { Money } from "@annuitas/types";

// =============================================================================
// Commands
// =============================================================================

export interface HelpCommand {
  readonly type: "help";
}

export interface ListCommand {
  readonly type: "list";
  readonly json: boolean;
}

export interface CalculateCommand {
  readonly type: "calculate";
  readonly formula: FormulaKind;
  readonly amount: Money;
  readonly rate: string;
  readonly periods: number;
  readonly json: boolean;
}

export type CliCommand = HelpCommand | ListCommand | CalculateCommand;

export interface AmountDefaults {
  readonly currency: string;
  readonly decimals: number;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export const USAGE: readonly string[] = [
  "Usage:",
  "  annuitas <formula> --amount <decimal> --rate <decimal> --periods <int>",
  "           [--currency <code>] [--decimals <int>] [--json]",
  "  annuitas list [--json]",
  "  annuitas help",
  "",
  `Formulas: ${FORMULA_KINDS.join(", ")}`,
];

// =============================================================================
// Validation
// =============================================================================

const CalculateOptionsSchema = z.object({
  amount: z
    .string({ required_error: "is required" })
    .regex(/^-?\d+(\.\d+)?$/, "must be a decimal number"),
  rate: z
    .string({ required_error: "is required" })
    .regex(/^-?\d+(\.\d+)?$/, "must be a decimal number"),
  periods: z
    .string({ required_error: "is required" })
    .regex(/^\d+$/, "must be a positive integer")
    .transform(Number)
    .pipe(z.number().int().min(1, "must be at least 1")),
  currency: z.string().trim().min(1, "must not be empty"),
  decimals: z
    .string()
    .regex(/^\d+$/, "must be a non-negative integer")
    .transform(Number)
    .pipe(z.number().int().max(18, "must be at most 18")),
});

// =============================================================================
// Parser
// =============================================================================

function parseRaw(argv: readonly string[]): ReturnType<typeof parseWithNode> {
  try {
    return parseWithNode(argv);
  } catch (error) {
    // node:util throws TypeError with an ERR_PARSE_ARGS_* code for bad input
    if (error instanceof TypeError && "code" in error && String(error.code).startsWith("ERR_PARSE_ARGS")) {
      throw new CliUsageError(error.message);
    }
    throw error;
  }
}

function parseWithNode(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      amount: { type: "string" },
      rate: { type: "string" },
      periods: { type: "string" },
      currency: { type: "string" },
      decimals: { type: "string" },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
}

/**
 * Turn command-line arguments into a validated command.
 *
 * @throws {CliUsageError} for an unknown formula, a missing or malformed
 * option, or an unexpected argument
 */
export function parseCliArgs(argv: readonly string[], defaults: AmountDefaults): CliCommand {
  const { values, positionals } = parseRaw(argv);
  const json = values.json === true;
  const [command, ...rest] = positionals;

  if (values.help === true || command === undefined || command === "help") {
    return { type: "help" };
  }

  if (rest.length > 0) {
    throw new CliUsageError(`Unexpected argument: "${rest.join(" ")}"`);
  }

  if (command === "list") {
    return { type: "list", json };
  }

  if (!isFormulaKind(command)) {
    throw new CliUsageError(`Unknown formula: "${command}"`);
  }

  const parsed = CalculateOptionsSchema.safeParse({
    amount: values.amount,
    rate: values.rate,
    periods: values.periods,
    currency: values.currency ?? defaults.currency,
    decimals: values.decimals ?? String(defaults.decimals),
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `--${issue.path.join(".")} ${issue.message}`);
    throw new CliUsageError(issues.join("; "));
  }

  const { amount, rate, periods, currency, decimals } = parsed.data;

  return {
    type: "calculate",
    formula: command,
    amount: { amount, currency, decimals },
    rate,
    periods,
    json,
  };
}
