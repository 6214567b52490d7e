/**
 * Runtime Type Guards
 *
 * Narrowing functions for shared domain types.
 * These enable safe runtime validation at system boundaries
 * (CLI input, deserialized data, callers without static types).
 */

import { ROUNDING_MODES } from "./financial.js";
import type { Money, RoundingMode } from "./financial.js";

const AMOUNT_PATTERN = /^-?\d+(\.\d+)?$/;
const ROUNDING_MODE_SET = new Set<string>(ROUNDING_MODES);

export function isMoney(value: unknown): value is Money {
  if (value === null || typeof value !== "object") return false;
  if (!("amount" in value) || !("currency" in value) || !("decimals" in value)) return false;
  return (
    typeof value.amount === "string" &&
    AMOUNT_PATTERN.test(value.amount) &&
    typeof value.currency === "string" &&
    value.currency.trim() !== "" &&
    typeof value.decimals === "number" &&
    Number.isInteger(value.decimals) &&
    value.decimals >= 0
  );
}

export function isRoundingMode(value: unknown): value is RoundingMode {
  return typeof value === "string" && ROUNDING_MODE_SET.has(value);
}
