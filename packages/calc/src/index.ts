/**
 * @annuitas/calc — Rate and period based financial formulas.
 *
 * Each formula is a pure transform of one monetary amount, configured by a
 * RateAndPeriods and evaluated under an explicit CalculationContext:
 * - `Formula.of(rateAndPeriods, context?)` builds a frozen operator
 * - `Formula.calculate(amount, rateAndPeriods, context?)` evaluates directly
 *
 * Design rules:
 * - All values are immutable
 * - No global numeric configuration
 * - Failures come back as `err(CalcError)`; nothing is thrown for bad input
 */

// Value types
export { Rate } from "./rate.js";
export { RateAndPeriods } from "./rate-and-periods.js";
export {
  CalculationContext,
  DEFAULT_CALCULATION_CONTEXT,
} from "./calculation-context.js";
export type { CalculationContextOptions } from "./calculation-context.js";

// Formulas
export { FutureValue } from "./formulas/future-value.js";
export { PresentValue } from "./formulas/present-value.js";
export { FutureValueOfAnnuity } from "./formulas/future-value-of-annuity.js";
export { FutureValueOfAnnuityDue } from "./formulas/future-value-of-annuity-due.js";
export { PresentValueOfAnnuity } from "./formulas/present-value-of-annuity.js";
export { PresentValueOfAnnuityDue } from "./formulas/present-value-of-annuity-due.js";
export { AnnuityPayment } from "./formulas/annuity-payment.js";

// Catalog
export { FORMULAS, FORMULA_KINDS, isFormulaKind, getFormula } from "./catalog.js";

// Operator plumbing
export { defineFormula, checkRateAndPeriods, fromMoneyError } from "./operator.js";
export type { FormulaOptions } from "./operator.js";

// Types
export type {
  CalcErrorCode,
  FormulaKind,
  MonetaryOperator,
  RateAndPeriodsOperator,
  FormulaInput,
  FormulaEvaluator,
  FormulaDefinition,
} from "./types.js";

export { CalcError } from "./types.js";
