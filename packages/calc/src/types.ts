/**
 * @annuitas/calc — Types for the formula catalog.
 *
 * Rules:
 * - All types are readonly
 * - Operators are configured once and never change
 * - Failures are returned as `err(CalcError)`, never thrown
 */

import type { Decimal } from "decimal.js";
import type { Result } from "neverthrow";
import type { Money } from "@annuitas/types";
import type { CalculationContext } from "./calculation-context.js";
import type { RateAndPeriods } from "./rate-and-periods.js";

// ─── Error Types ─────────────────────────────────────────────────────────

/**
 * Error codes for calculations.
 *
 * - INVALID_ARGUMENT: missing or out-of-domain input
 * - ARITHMETIC_ERROR: the underlying arithmetic could not produce a value
 */
export type CalcErrorCode = "INVALID_ARGUMENT" | "ARITHMETIC_ERROR";

/**
 * Structured error from the formula catalog.
 * Carried in `err(...)` results; never swallowed.
 */
export class CalcError extends Error {
  public readonly code: CalcErrorCode;

  constructor(code: CalcErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CalcError";
    this.code = code;
  }
}

// ─── Operators ───────────────────────────────────────────────────────────

/** Identifies one closed-form formula of the catalog. */
export type FormulaKind =
  | "future-value"
  | "present-value"
  | "future-value-of-annuity"
  | "future-value-of-annuity-due"
  | "present-value-of-annuity"
  | "present-value-of-annuity-due"
  | "annuity-payment";

/** Capability: transform one monetary amount into another. */
export interface MonetaryOperator {
  apply(amount: Money): Result<Money, CalcError>;
}

/**
 * An operator fixed to one RateAndPeriods and one CalculationContext.
 * `kind` tags the formula variant.
 */
export interface RateAndPeriodsOperator<K extends FormulaKind = FormulaKind>
  extends MonetaryOperator {
  readonly kind: K;
  readonly rateAndPeriods: RateAndPeriods;
  readonly context: CalculationContext;
  toString(): string;
}

/**
 * Validated operands handed to a formula's evaluator.
 * `rate` is already a decimal of the calculation context.
 */
export interface FormulaInput {
  readonly amount: Money;
  readonly rate: Decimal;
  readonly periods: number;
  readonly context: CalculationContext;
}

/**
 * Evaluates one formula. May throw MoneyError from the arithmetic;
 * the catalog converts it into a CalcError result.
 */
export type FormulaEvaluator = (input: FormulaInput) => Money;

/**
 * Public face of a formula: a named factory plus a static entry point.
 * `of(rp, ctx).apply(a)` and `calculate(a, rp, ctx)` are equivalent.
 */
export interface FormulaDefinition<K extends FormulaKind = FormulaKind> {
  readonly kind: K;
  /** Display name, e.g. "FutureValueOfAnnuity". */
  readonly name: string;
  readonly description: string;

  of(
    rateAndPeriods: RateAndPeriods | null | undefined,
    context?: CalculationContext,
  ): Result<RateAndPeriodsOperator<K>, CalcError>;

  calculate(
    amount: Money | null | undefined,
    rateAndPeriods: RateAndPeriods | null | undefined,
    context?: CalculationContext,
  ): Result<Money, CalcError>;
}
