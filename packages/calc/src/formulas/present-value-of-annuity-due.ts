/**
 * Present value of an annuity due (payments at the start of each period).
 *
 *   PVAD = payment × (1 − (1 + rate)^−periods) ÷ rate × (1 + rate)
 */

import { multiplyMoney } from "@annuitas/money";
import { defineFormula } from "../operator.js";
import { discountFactor } from "./present-value-of-annuity.js";

export const PresentValueOfAnnuityDue = defineFormula({
  kind: "present-value-of-annuity-due",
  name: "PresentValueOfAnnuityDue",
  description: "Today's value of equal payments made at the start of each period",
  evaluate: ({ amount, rate, periods, context }) => {
    const factor = rate.isZero()
      ? periods
      : discountFactor(rate, periods, context).times(context.compound(rate, 1));
    return multiplyMoney(amount, factor, context.mathContext());
  },
});
