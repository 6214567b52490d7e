/**
 * Future value of an annuity due: equal payments made at the start of each
 * period, so every payment compounds one period longer than in an
 * ordinary annuity.
 *
 *   FVAD = payment × ((1 + rate)^periods − 1) ÷ rate × (1 + rate)
 */

import { multiplyMoney } from "@annuitas/money";
import { defineFormula } from "../operator.js";
import { accumulationFactor } from "./future-value-of-annuity.js";

export const FutureValueOfAnnuityDue = defineFormula({
  kind: "future-value-of-annuity-due",
  name: "FutureValueOfAnnuityDue",
  description: "Value one period after the last payment of equal payments made at the start of each period",
  evaluate: ({ amount, rate, periods, context }) => {
    const factor = rate.isZero()
      ? periods
      : accumulationFactor(rate, periods, context).times(context.compound(rate, 1));
    return multiplyMoney(amount, factor, context.mathContext());
  },
});
