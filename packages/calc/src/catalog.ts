/**
 * The formula catalog, keyed by kind.
 */

import { AnnuityPayment } from "./formulas/annuity-payment.js";
import { FutureValue } from "./formulas/future-value.js";
import { FutureValueOfAnnuity } from "./formulas/future-value-of-annuity.js";
import { FutureValueOfAnnuityDue } from "./formulas/future-value-of-annuity-due.js";
import { PresentValue } from "./formulas/present-value.js";
import { PresentValueOfAnnuity } from "./formulas/present-value-of-annuity.js";
import { PresentValueOfAnnuityDue } from "./formulas/present-value-of-annuity-due.js";
import type { FormulaDefinition, FormulaKind } from "./types.js";

export const FORMULAS: { readonly [K in FormulaKind]: FormulaDefinition<K> } = {
  "future-value": FutureValue,
  "present-value": PresentValue,
  "future-value-of-annuity": FutureValueOfAnnuity,
  "future-value-of-annuity-due": FutureValueOfAnnuityDue,
  "present-value-of-annuity": PresentValueOfAnnuity,
  "present-value-of-annuity-due": PresentValueOfAnnuityDue,
  "annuity-payment": AnnuityPayment,
};

export const FORMULA_KINDS: readonly FormulaKind[] = [
  "future-value",
  "present-value",
  "future-value-of-annuity",
  "future-value-of-annuity-due",
  "present-value-of-annuity",
  "present-value-of-annuity-due",
  "annuity-payment",
];

const KIND_SET = new Set<string>(FORMULA_KINDS);

export function isFormulaKind(value: unknown): value is FormulaKind {
  return typeof value === "string" && KIND_SET.has(value);
}

export function getFormula<K extends FormulaKind>(kind: K): FormulaDefinition<K> {
  return FORMULAS[kind];
}
