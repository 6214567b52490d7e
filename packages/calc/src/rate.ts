/**
 * Rate — a dimensionless per-period fraction (0.05 = 5 %).
 *
 * The value is kept exactly as given; rounding only happens inside a
 * calculation, under that calculation's context.
 */

import { Decimal } from "decimal.js";
import { err, ok } from "neverthrow";
import type { Result } from "neverthrow";
import { CalcError } from "./types.js";

export class Rate {
  private constructor(private readonly value: Decimal) {}

  /**
   * Create a rate from a decimal string, number or decimal.
   * Fails with INVALID_ARGUMENT for a missing, unparseable or non-finite value.
   */
  static of(value: Decimal.Value | null | undefined): Result<Rate, CalcError> {
    if (value === null || value === undefined) {
      return err(new CalcError("INVALID_ARGUMENT", "Rate value is required"));
    }

    let decimal: Decimal;
    try {
      decimal = new Decimal(value);
    } catch (cause) {
      return err(new CalcError("INVALID_ARGUMENT", `Invalid rate: "${String(value)}"`, { cause }));
    }

    if (!decimal.isFinite()) {
      return err(new CalcError("INVALID_ARGUMENT", `Rate must be finite, got: ${decimal.toString()}`));
    }

    return ok(new Rate(decimal));
  }

  get(): Decimal {
    return this.value;
  }

  equals(other: Rate): boolean {
    return this.value.equals(other.value);
  }

  toJSON(): string {
    return this.value.toString();
  }

  toString(): string {
    return `Rate(${this.value.toString()})`;
  }
}
