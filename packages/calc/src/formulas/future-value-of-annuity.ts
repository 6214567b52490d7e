/**
 * Future value of an ordinary annuity: a series of equal payments, the
 * first one period from now, compounded at a fixed rate.
 *
 *   FVA = payment × ((1 + rate)^periods − 1) ÷ rate
 *
 * Assumes the rate and the payment do not change. When the first payment
 * is made immediately, use FutureValueOfAnnuityDue.
 *
 * A zero rate returns payment × periods, the limit of the expression.
 */

import { multiplyMoney } from "@annuitas/money";
import type { Decimal } from "decimal.js";
import type { CalculationContext } from "../calculation-context.js";
import { defineFormula } from "../operator.js";

/**
 * ((1 + rate)^periods − 1) ÷ rate, for a non-zero rate. Only the division
 * rounds to the context.
 */
export function accumulationFactor(rate: Decimal, periods: number, context: CalculationContext): Decimal {
  const growth = context.compound(rate, periods).minus(1);
  return context.decimal(growth).div(rate);
}

export const FutureValueOfAnnuity = defineFormula({
  kind: "future-value-of-annuity",
  name: "FutureValueOfAnnuity",
  description: "Value at the last payment date of equal payments made at the end of each period",
  evaluate: ({ amount, rate, periods, context }) => {
    const factor = rate.isZero() ? periods : accumulationFactor(rate, periods, context);
    return multiplyMoney(amount, factor, context.mathContext());
  },
});
