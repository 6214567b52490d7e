/**
 * RateAndPeriods — the parameter bundle every catalog formula is built on.
 */

import type { Decimal } from "decimal.js";
import { err, ok } from "neverthrow";
import type { Result } from "neverthrow";
import { Rate } from "./rate.js";
import { CalcError } from "./types.js";

export class RateAndPeriods {
  private constructor(
    private readonly rate: Rate,
    private readonly periods: number,
  ) {}

  /**
   * Fails with INVALID_ARGUMENT when the rate is missing or the period count
   * is not an integer of at least 1.
   */
  static of(rate: Rate | null | undefined, periods: number): Result<RateAndPeriods, CalcError> {
    if (rate === null || rate === undefined) {
      return err(new CalcError("INVALID_ARGUMENT", "Rate is required"));
    }

    if (!Number.isSafeInteger(periods) || periods < 1) {
      return err(
        new CalcError("INVALID_ARGUMENT", `Periods must be an integer >= 1, got: ${String(periods)}`),
      );
    }

    return ok(new RateAndPeriods(rate, periods));
  }

  /**
   * Shorthand for `Rate.of(value).andThen((r) => RateAndPeriods.of(r, periods))`.
   */
  static from(value: Decimal.Value | null | undefined, periods: number): Result<RateAndPeriods, CalcError> {
    return Rate.of(value).andThen((rate) => RateAndPeriods.of(rate, periods));
  }

  getRate(): Rate {
    return this.rate;
  }

  getPeriods(): number {
    return this.periods;
  }

  equals(other: RateAndPeriods): boolean {
    return this.periods === other.periods && this.rate.equals(other.rate);
  }

  toString(): string {
    return `RateAndPeriods(rate=${this.rate.toJSON()}, periods=${String(this.periods)})`;
  }
}
