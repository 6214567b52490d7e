/**
 * Present value of an ordinary annuity.
 *
 *   PVA = payment × (1 − (1 + rate)^−periods) ÷ rate
 *
 * A zero rate returns payment × periods.
 */

import { multiplyMoney } from "@annuitas/money";
import type { Decimal } from "decimal.js";
import type { CalculationContext } from "../calculation-context.js";
import { defineFormula } from "../operator.js";

/**
 * (1 − (1 + rate)^−periods) ÷ rate, for a non-zero rate. Only the division
 * rounds to the context.
 */
export function discountFactor(rate: Decimal, periods: number, context: CalculationContext): Decimal {
  const discount = context.compound(rate, -periods).negated().plus(1);
  return context.decimal(discount).div(rate);
}

export const PresentValueOfAnnuity = defineFormula({
  kind: "present-value-of-annuity",
  name: "PresentValueOfAnnuity",
  description: "Today's value of equal payments made at the end of each period",
  evaluate: ({ amount, rate, periods, context }) => {
    const factor = rate.isZero() ? periods : discountFactor(rate, periods, context);
    return multiplyMoney(amount, factor, context.mathContext());
  },
});
