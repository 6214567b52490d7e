/**
 * Shared operator plumbing for the formula catalog.
 *
 * Every formula is a FormulaDefinition built by `defineFormula`: the
 * definition owns argument validation, the conversion of arithmetic
 * failures into CalcError results, and the construction of frozen
 * operators. A formula module only supplies its evaluator.
 *
 * Rate domain: rates must be greater than -1 so that 1 + rate stays
 * positive. Zero rates are allowed; each evaluator returns the limit of
 * its formula as the rate tends to zero.
 */

import { err, ok } from "neverthrow";
import type { Result } from "neverthrow";
import { MoneyError } from "@annuitas/money";
import type { Money } from "@annuitas/types";
import { DEFAULT_CALCULATION_CONTEXT } from "./calculation-context.js";
import type { CalculationContext } from "./calculation-context.js";
import type { RateAndPeriods } from "./rate-and-periods.js";
import { CalcError } from "./types.js";
import type {
  FormulaDefinition,
  FormulaEvaluator,
  FormulaKind,
  RateAndPeriodsOperator,
} from "./types.js";

export interface FormulaOptions<K extends FormulaKind> {
  readonly kind: K;
  readonly name: string;
  readonly description: string;
  readonly evaluate: FormulaEvaluator;
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Check the parameter bundle shared by every formula.
 */
export function checkRateAndPeriods(
  rateAndPeriods: RateAndPeriods | null | undefined,
  formula: string,
): Result<RateAndPeriods, CalcError> {
  if (rateAndPeriods === null || rateAndPeriods === undefined) {
    return err(new CalcError("INVALID_ARGUMENT", `${formula}: rateAndPeriods is required`));
  }

  const rate = rateAndPeriods.getRate().get();
  if (rate.lte(-1)) {
    return err(
      new CalcError("INVALID_ARGUMENT", `${formula}: rate must be greater than -1, got: ${rate.toString()}`),
    );
  }

  return ok(rateAndPeriods);
}

function checkAmount(amount: Money | null | undefined, formula: string): Result<Money, CalcError> {
  if (amount === null || amount === undefined) {
    return err(new CalcError("INVALID_ARGUMENT", `${formula}: amount is required`));
  }
  return ok(amount);
}

/**
 * Convert a MoneyError raised by the arithmetic.
 *
 * Malformed amounts are the caller's fault (INVALID_ARGUMENT); everything
 * else is an arithmetic failure.
 */
export function fromMoneyError(error: MoneyError, formula: string): CalcError {
  const code =
    error.code === "INVALID_AMOUNT" || error.code === "INVALID_MONEY"
      ? "INVALID_ARGUMENT"
      : "ARITHMETIC_ERROR";
  return new CalcError(code, `${formula}: ${error.message}`, { cause: error });
}

// =============================================================================
// Definition
// =============================================================================

export function defineFormula<K extends FormulaKind>(
  options: FormulaOptions<K>,
): FormulaDefinition<K> {
  const { kind, name, description, evaluate } = options;

  function run(amount: Money, rateAndPeriods: RateAndPeriods, context: CalculationContext): Result<Money, CalcError> {
    try {
      return ok(
        evaluate({
          amount,
          rate: context.decimal(rateAndPeriods.getRate().get()),
          periods: rateAndPeriods.getPeriods(),
          context,
        }),
      );
    } catch (error) {
      if (error instanceof MoneyError) {
        return err(fromMoneyError(error, name));
      }
      throw error;
    }
  }

  function calculate(
    amount: Money | null | undefined,
    rateAndPeriods: RateAndPeriods | null | undefined,
    context: CalculationContext = DEFAULT_CALCULATION_CONTEXT,
  ): Result<Money, CalcError> {
    return checkRateAndPeriods(rateAndPeriods, name).andThen((checked) =>
      checkAmount(amount, name).andThen((money) => run(money, checked, context)),
    );
  }

  function of(
    rateAndPeriods: RateAndPeriods | null | undefined,
    context: CalculationContext = DEFAULT_CALCULATION_CONTEXT,
  ): Result<RateAndPeriodsOperator<K>, CalcError> {
    return checkRateAndPeriods(rateAndPeriods, name).map((checked) =>
      Object.freeze({
        kind,
        rateAndPeriods: checked,
        context,
        apply: (amount: Money) => calculate(amount, checked, context),
        toString: () => `${name}{ ${checked.toString()} }`,
      }),
    );
  }

  return Object.freeze({ kind, name, description, of, calculate });
}
