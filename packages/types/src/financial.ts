/**
 * Financial Types
 *
 * Core monetary primitives shared by the arithmetic and formula packages.
 *
 * Rules:
 * - All amounts are strings to avoid floating-point errors
 * - Currency is always explicit (no implicit USD)
 * - Values are never mutated; operations return new values
 */

/**
 * Supported currency identifiers.
 * ISO 4217 codes for fiat, token symbols for anything else.
 */
export type Currency = string;

/**
 * A precise monetary amount.
 * String representation to avoid IEEE 754 floating-point issues.
 * Use a bigint or decimal library for arithmetic.
 */
export interface Money {
  /** String representation of the amount (e.g., "100.50", "1000000") */
  readonly amount: string;

  /** Currency code or symbol (e.g., "USD", "EUR", "USDC") */
  readonly currency: Currency;

  /**
   * Number of decimal places for this currency.
   * USD = 2, JPY = 0, USDC = 6.
   */
  readonly decimals: number;
}

/**
 * Rounding policy applied to decimal arithmetic.
 *
 * - UP / DOWN: away from / towards zero
 * - CEILING / FLOOR: towards +Infinity / -Infinity
 * - HALF_*: to nearest neighbour, ties broken as named
 */
export type RoundingMode =
  | "UP"
  | "DOWN"
  | "CEILING"
  | "FLOOR"
  | "HALF_UP"
  | "HALF_DOWN"
  | "HALF_EVEN"
  | "HALF_CEILING"
  | "HALF_FLOOR";

export const ROUNDING_MODES: readonly RoundingMode[] = [
  "UP",
  "DOWN",
  "CEILING",
  "FLOOR",
  "HALF_UP",
  "HALF_DOWN",
  "HALF_EVEN",
  "HALF_CEILING",
  "HALF_FLOOR",
] as const;
