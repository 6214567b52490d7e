/**
 * @annuitas/money — Precise monetary arithmetic.
 *
 * Exact bigint subtraction, plus multiplication, division and powers
 * under an explicit NumericContext (precision + rounding mode).
 *
 * Design rules:
 * - All types are readonly
 * - No mutation of Money values
 * - Fail-closed: invalid operands throw, never silently succeed
 * - No global numeric configuration; contexts are passed explicitly
 */

// Numeric contexts
export {
  createNumericContext,
  toDecimalRounding,
  DEFAULT_NUMERIC_CONTEXT,
  MAX_PRECISION,
} from "./numeric-context.js";

// Money arithmetic
export {
  parseAmount,
  formatAmount,
  validateMoney,
  assertSameCurrency,
  toDecimal,
  fromDecimal,
  subtractMoney,
  multiplyMoney,
  divideMoney,
  powMoney,
  MAX_INTEGER_DIGITS,
} from "./money-math.js";

// Types
export type {
  NumericContext,
  NumericContextOptions,
  MoneyErrorCode,
} from "./types.js";

export { MoneyError } from "./types.js";
