/**
 * Present value of a single cash flow received after `periods` periods.
 *
 *   PV = amount ÷ (1 + rate)^periods
 */

import { divideMoney } from "@annuitas/money";
import { defineFormula } from "../operator.js";

export const PresentValue = defineFormula({
  kind: "present-value",
  name: "PresentValue",
  description: "Today's value of a single amount discounted at a fixed rate",
  evaluate: ({ amount, rate, periods, context }) =>
    divideMoney(amount, context.compound(rate, periods), context.mathContext()),
});
