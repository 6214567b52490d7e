/**
 * Periodic payment that amortizes a present value over `periods` periods.
 *
 *   P = presentValue × rate ÷ (1 − (1 + rate)^−periods)
 *
 * evaluated as presentValue ÷ discountFactor. A zero rate spreads the
 * amount evenly: presentValue ÷ periods.
 */

import { divideMoney } from "@annuitas/money";
import { defineFormula } from "../operator.js";
import { discountFactor } from "./present-value-of-annuity.js";

export const AnnuityPayment = defineFormula({
  kind: "annuity-payment",
  name: "AnnuityPayment",
  description: "Equal end-of-period payment that repays a present value",
  evaluate: ({ amount, rate, periods, context }) => {
    const divisor = rate.isZero() ? periods : discountFactor(rate, periods, context);
    return divideMoney(amount, divisor, context.mathContext());
  },
});
