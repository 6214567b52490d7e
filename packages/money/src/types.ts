/**
 * @annuitas/money — Types for monetary arithmetic.
 *
 * Rules:
 * - All types are readonly
 * - Fail-closed: invalid operands throw, never silently succeed
 */

import type { Decimal } from "decimal.js";
import type { RoundingMode } from "@annuitas/types";

// ─── Numeric Context ─────────────────────────────────────────────────────

/**
 * Precision and rounding policy for decimal arithmetic.
 *
 * `Decimal` is an isolated constructor configured with this policy, so
 * every value created through it rounds consistently. Contexts are frozen
 * and never touch a shared global configuration.
 */
export interface NumericContext {
  /** Significant digits kept by every operation. */
  readonly precision: number;
  readonly rounding: RoundingMode;
  readonly Decimal: Decimal.Constructor;
}

export interface NumericContextOptions {
  readonly precision: number;
  readonly rounding: RoundingMode;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for money operations. */
export type MoneyErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_MONEY"
  | "CURRENCY_MISMATCH"
  | "ARITHMETIC_ERROR"
  | "INVALID_CONTEXT";

/**
 * Structured error from the money engine.
 * Always thrown, never returned as an error code.
 */
export class MoneyError extends Error {
  public readonly code: MoneyErrorCode;

  constructor(code: MoneyErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "MoneyError";
    this.code = code;
  }
}
