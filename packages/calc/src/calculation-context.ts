/**
 * CalculationContext — the numeric policy every formula runs under.
 *
 * Divisions and products inside a formula go through the context's
 * decimal constructor, so every formula in the catalog rounds the same
 * way. Growth terms are carried wider (see `compound`). Contexts are frozen and passed explicitly; reconfiguring means
 * creating a new context, which cannot affect a calculation in flight.
 */

import type { Decimal } from "decimal.js";
import { err, ok } from "neverthrow";
import type { Result } from "neverthrow";
import {
  createNumericContext,
  DEFAULT_NUMERIC_CONTEXT,
  MAX_PRECISION,
  MoneyError,
} from "@annuitas/money";
import type { NumericContext } from "@annuitas/money";
import type { RoundingMode } from "@annuitas/types";
import { CalcError } from "./types.js";

/** Extra digits on top of those that hold 1 + rate exactly. */
const GUARD_DIGITS = 6;

export interface CalculationContextOptions {
  /** Significant digits; defaults to 16. */
  readonly precision?: number | undefined;
  /** Defaults to HALF_EVEN. */
  readonly rounding?: RoundingMode | undefined;
}

export class CalculationContext {
  private readonly unit: Decimal;

  private constructor(private readonly numeric: NumericContext) {
    this.unit = new numeric.Decimal(1);
    Object.freeze(this);
  }

  /**
   * Fails with INVALID_ARGUMENT for a precision outside 1..1e9 or an
   * unknown rounding mode.
   */
  static of(options: CalculationContextOptions = {}): Result<CalculationContext, CalcError> {
    let numeric: NumericContext;
    try {
      numeric = createNumericContext({
        precision: options.precision ?? DEFAULT_NUMERIC_CONTEXT.precision,
        rounding: options.rounding ?? DEFAULT_NUMERIC_CONTEXT.rounding,
      });
    } catch (error) {
      if (error instanceof MoneyError) {
        return err(new CalcError("INVALID_ARGUMENT", error.message, { cause: error }));
      }
      throw error;
    }
    return ok(new CalculationContext(numeric));
  }

  /** Wrap a numeric context that has already been validated. */
  static fromNumericContext(numeric: NumericContext): CalculationContext {
    return new CalculationContext(numeric);
  }

  mathContext(): NumericContext {
    return this.numeric;
  }

  /** The constant 1 under this context. */
  one(): Decimal {
    return this.unit;
  }

  /** Read a value as a decimal of this context (exact; rounds on the next operation). */
  decimal(value: Decimal.Value): Decimal {
    return new this.numeric.Decimal(value);
  }

  /**
   * (1 + rate)^periods, carried with enough extra digits that subtracting 1
   * from it still leaves this context's precision. The value is not rounded
   * to this context; the division or product that consumes it is.
   *
   * With 1 + rate rounded to this precision, a rate below one unit in the
   * last place would vanish and (1 + rate)^n − 1 would cancel to zero.
   */
  compound(rate: Decimal, periods: number): Decimal {
    const exactDigits = Math.max(rate.e, 0) + rate.decimalPlaces() + 2;
    const precision = Math.min(
      MAX_PRECISION,
      this.numeric.precision + exactDigits + String(Math.abs(periods)).length + GUARD_DIGITS,
    );
    const working = createNumericContext({ precision, rounding: this.numeric.rounding });
    return new working.Decimal(1).plus(rate).pow(periods);
  }

  toString(): string {
    return `CalculationContext(precision=${String(this.numeric.precision)}, rounding=${this.numeric.rounding})`;
  }
}

export const DEFAULT_CALCULATION_CONTEXT: CalculationContext =
  CalculationContext.fromNumericContext(DEFAULT_NUMERIC_CONTEXT);
