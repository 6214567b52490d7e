/**
 * Future value of a single cash flow after `periods` compounding periods.
 *
 *   FV = amount × (1 + rate)^periods
 */

import { multiplyMoney } from "@annuitas/money";
import { defineFormula } from "../operator.js";

export const FutureValue = defineFormula({
  kind: "future-value",
  name: "FutureValue",
  description: "Value of a single amount after compounding at a fixed rate",
  evaluate: ({ amount, rate, periods, context }) =>
    multiplyMoney(amount, context.compound(rate, periods), context.mathContext()),
});
