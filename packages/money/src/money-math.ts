/**
 * @annuitas/money — Monetary arithmetic.
 *
 * Subtraction works on bigints scaled by the currency's decimals and is
 * exact. Multiplication, division and powers go through a NumericContext
 * and are rounded once, back to the currency's decimals, with the
 * context's rounding mode.
 *
 * Rules:
 * - Amounts are decimal strings, never floats
 * - Binary operations require one currency and one scale
 * - Results keep the currency and decimals of their input
 */

import type { Decimal } from "decimal.js";
import { isMoney } from "@annuitas/types";
import type { Currency, Money } from "@annuitas/types";
import { MoneyError } from "./types.js";
import type { NumericContext } from "./types.js";
import { DEFAULT_NUMERIC_CONTEXT, toDecimalRounding } from "./numeric-context.js";

/** Results with more integer digits than this overflow. */
export const MAX_INTEGER_DIGITS = 1000;

const AMOUNT_PARTS = /^(-?)(\d+)(?:\.(\d+))?$/;

// ─── Scaling ─────────────────────────────────────────────────────────────

/**
 * Scale a decimal string to an integer count of the currency's minor units.
 *
 * "100.5" at 2 decimals → 10050n; "-7" at 3 decimals → -7000n.
 */
export function parseAmount(amount: string, decimals: number): bigint {
  const parts = AMOUNT_PARTS.exec(amount.trim());
  if (parts === null) {
    throw new MoneyError("INVALID_AMOUNT", `Invalid amount format: "${amount}"`);
  }

  const [, sign = "", whole = "0", fraction = ""] = parts;
  if (fraction.length > decimals) {
    throw new MoneyError(
      "INVALID_AMOUNT",
      `Amount "${amount.trim()}" has ${String(fraction.length)} decimal places, but currency allows ${String(decimals)}`,
    );
  }

  const units = BigInt(whole + fraction.padEnd(decimals, "0"));
  return sign === "-" ? -units : units;
}

/**
 * Inverse of parseAmount: 10050n at 2 decimals → "100.50".
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  const negative = scaled < 0n;
  const digits = (negative ? -scaled : scaled).toString().padStart(decimals + 1, "0");
  const split = digits.length - decimals;
  const body = decimals === 0 ? digits : `${digits.slice(0, split)}.${digits.slice(split)}`;
  return negative ? `-${body}` : body;
}

// ─── Validation ──────────────────────────────────────────────────────────

/**
 * Check the shape of a Money value and that its amount fits its decimals.
 */
export function validateMoney(money: unknown): asserts money is Money {
  if (!isMoney(money)) {
    throw new MoneyError("INVALID_MONEY", "Money needs a decimal string amount, a currency and integer decimals >= 0");
  }
  parseAmount(money.amount, money.decimals);
}

export function assertSameCurrency(a: Money, b: Money): void {
  if (a.currency !== b.currency || a.decimals !== b.decimals) {
    throw new MoneyError(
      "CURRENCY_MISMATCH",
      `Cannot combine ${a.currency}/${String(a.decimals)} with ${b.currency}/${String(b.decimals)}`,
    );
  }
}

// ─── Decimal Conversion ──────────────────────────────────────────────────

/**
 * Read a Money amount as a decimal of the given context.
 * The conversion is exact; rounding happens on the next operation.
 */
export function toDecimal(money: Money, context: NumericContext = DEFAULT_NUMERIC_CONTEXT): Decimal {
  validateMoney(money);
  return new context.Decimal(money.amount.trim());
}

/**
 * Round a decimal to the currency's decimals and wrap it as Money.
 *
 * @throws {MoneyError} ARITHMETIC_ERROR if the value is not finite or has
 * more than MAX_INTEGER_DIGITS integer digits
 */
export function fromDecimal(
  value: Decimal,
  currency: Currency,
  decimals: number,
  context: NumericContext = DEFAULT_NUMERIC_CONTEXT,
): Money {
  if (!value.isFinite()) {
    throw new MoneyError("ARITHMETIC_ERROR", `Result is not a finite number: ${value.toString()}`);
  }
  // `e` is the exponent of the leading digit: e + 1 integer digits
  if (value.e >= MAX_INTEGER_DIGITS) {
    throw new MoneyError(
      "ARITHMETIC_ERROR",
      `Result overflows ${String(MAX_INTEGER_DIGITS)} integer digits (exponent ${String(value.e)})`,
    );
  }

  const rounded = value.toDecimalPlaces(decimals, toDecimalRounding(context.rounding));
  // -0.004 rounds to -0; amounts never carry a signed zero
  const normalized = rounded.isZero() ? rounded.abs() : rounded;

  return { amount: normalized.toFixed(decimals), currency, decimals };
}

function toOperand(value: Decimal.Value, context: NumericContext, label: string): Decimal {
  let operand: Decimal;
  try {
    operand = new context.Decimal(value);
  } catch (cause) {
    throw new MoneyError("INVALID_AMOUNT", `Invalid ${label}: "${String(value)}"`, { cause });
  }
  if (!operand.isFinite()) {
    throw new MoneyError("ARITHMETIC_ERROR", `${label} must be finite, got: ${operand.toString()}`);
  }
  return operand;
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

/**
 * a − b, exactly. Both must share currency and decimals.
 */
export function subtractMoney(a: Money, b: Money): Money {
  validateMoney(a);
  validateMoney(b);
  assertSameCurrency(a, b);
  const difference = parseAmount(a.amount, a.decimals) - parseAmount(b.amount, b.decimals);
  return { amount: formatAmount(difference, a.decimals), currency: a.currency, decimals: a.decimals };
}

/**
 * Multiply a Money amount by a dimensionless factor.
 */
export function multiplyMoney(
  money: Money,
  factor: Decimal.Value,
  context: NumericContext = DEFAULT_NUMERIC_CONTEXT,
): Money {
  const product = toDecimal(money, context).times(toOperand(factor, context, "factor"));
  return fromDecimal(product, money.currency, money.decimals, context);
}

/**
 * Divide a Money amount by a dimensionless divisor.
 *
 * @throws {MoneyError} ARITHMETIC_ERROR on division by zero
 */
export function divideMoney(
  money: Money,
  divisor: Decimal.Value,
  context: NumericContext = DEFAULT_NUMERIC_CONTEXT,
): Money {
  const operand = toOperand(divisor, context, "divisor");
  if (operand.isZero()) {
    throw new MoneyError("ARITHMETIC_ERROR", "Division by zero");
  }
  const quotient = toDecimal(money, context).div(operand);
  return fromDecimal(quotient, money.currency, money.decimals, context);
}

/**
 * Raise a Money amount to an integer power.
 *
 * @throws {MoneyError} ARITHMETIC_ERROR for a non-integer exponent, or a
 * zero amount raised to a negative power
 */
export function powMoney(
  money: Money,
  exponent: number,
  context: NumericContext = DEFAULT_NUMERIC_CONTEXT,
): Money {
  if (!Number.isSafeInteger(exponent)) {
    throw new MoneyError("ARITHMETIC_ERROR", `Exponent must be an integer, got: ${String(exponent)}`);
  }
  const power = toDecimal(money, context).pow(exponent);
  return fromDecimal(power, money.currency, money.decimals, context);
}
