/**
 * @annuitas/money — Numeric contexts.
 *
 * A numeric context pairs a precision with a rounding mode and hands out a
 * decimal constructor bound to both. `Decimal.clone` gives each context its
 * own constructor, so two contexts can coexist in one process.
 */

import { Decimal } from "decimal.js";
import { isRoundingMode } from "@annuitas/types";
import type { RoundingMode } from "@annuitas/types";
import { MoneyError } from "./types.js";
import type { NumericContext, NumericContextOptions } from "./types.js";

/** Upper bound accepted by decimal.js for significant digits. */
export const MAX_PRECISION = 1e9;

const DECIMAL_ROUNDING: Readonly<Record<RoundingMode, Decimal.Rounding>> = {
  UP: Decimal.ROUND_UP,
  DOWN: Decimal.ROUND_DOWN,
  CEILING: Decimal.ROUND_CEIL,
  FLOOR: Decimal.ROUND_FLOOR,
  HALF_UP: Decimal.ROUND_HALF_UP,
  HALF_DOWN: Decimal.ROUND_HALF_DOWN,
  HALF_EVEN: Decimal.ROUND_HALF_EVEN,
  HALF_CEILING: Decimal.ROUND_HALF_CEIL,
  HALF_FLOOR: Decimal.ROUND_HALF_FLOOR,
};

/**
 * Map a rounding mode to the decimal.js rounding constant.
 */
export function toDecimalRounding(mode: RoundingMode): Decimal.Rounding {
  return DECIMAL_ROUNDING[mode];
}

/**
 * Create a frozen numeric context.
 *
 * @throws {MoneyError} INVALID_CONTEXT if precision is not an integer in
 * 1..1e9 or the rounding mode is unknown
 */
export function createNumericContext(options: NumericContextOptions): NumericContext {
  const { precision, rounding } = options;

  if (!Number.isInteger(precision) || precision < 1 || precision > MAX_PRECISION) {
    throw new MoneyError(
      "INVALID_CONTEXT",
      `Precision must be an integer between 1 and ${String(MAX_PRECISION)}, got: ${String(precision)}`,
    );
  }

  if (!isRoundingMode(rounding)) {
    throw new MoneyError("INVALID_CONTEXT", `Unknown rounding mode: "${String(rounding)}"`);
  }

  return Object.freeze({
    precision,
    rounding,
    Decimal: Decimal.clone({ precision, rounding: DECIMAL_ROUNDING[rounding] }),
  });
}

/** Sixteen significant digits, ties to even: the decimal64 policy. */
export const DEFAULT_NUMERIC_CONTEXT: NumericContext = createNumericContext({
  precision: 16,
  rounding: "HALF_EVEN",
});
