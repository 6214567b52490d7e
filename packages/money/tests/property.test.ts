/**
 * Property-Based Tests for @annuitas/money
 *
 * Uses fast-check to verify invariants that must hold for ANY valid input:
 *
 * 1. Subtraction is exact and antisymmetric
 * 2. Multiplying by one is the identity
 * 3. Context arithmetic preserves currency and decimals
 * 4. Results are deterministic for a fixed context
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { Money } from "@annuitas/types";
import {
  subtractMoney,
  multiplyMoney,
  divideMoney,
  parseAmount,
} from "../src/money-math.js";

// =============================================================================
// Arbitraries
// =============================================================================

const arbDecimals = fc.integer({ min: 0, max: 8 });

const arbCurrency = fc.stringMatching(/^[A-Z]{3}$/);

/**
 * Signed amount string with exactly `decimals` fractional digits.
 * At most 15 significant digits, so it fits the default 16-digit context.
 */
function arbAmount(decimals: number): fc.Arbitrary<string> {
  const intPart = fc.integer({ min: -9_999_999, max: 9_999_999 });
  const fracPart =
    decimals > 0
      ? fc.integer({ min: 0, max: 10 ** decimals - 1 }).map((f) => f.toString().padStart(decimals, "0"))
      : fc.constant("");

  return fc.tuple(intPart, fracPart).map(([int, frac]) => (frac ? `${int}.${frac}` : `${int}`));
}

const arbMoneyPair: fc.Arbitrary<readonly [Money, Money]> = fc
  .tuple(arbCurrency, arbDecimals)
  .chain(([currency, decimals]) =>
    fc
      .tuple(arbAmount(decimals), arbAmount(decimals))
      .map(([a, b]) => [
        { amount: a, currency, decimals },
        { amount: b, currency, decimals },
      ] as const),
  );

const arbMoney: fc.Arbitrary<Money> = arbMoneyPair.map(([a]) => a);

const arbFactor = fc
  .integer({ min: -1_000_000, max: 1_000_000 })
  .filter((n) => n !== 0)
  .map((n) => `${n / 1000}`);

// =============================================================================
// Properties
// =============================================================================

describe("money arithmetic properties", () => {
  it("subtraction is exact", () => {
    fc.assert(
      fc.property(arbMoneyPair, ([a, b]) => {
        const difference = subtractMoney(a, b);
        expect(parseAmount(difference.amount, difference.decimals)).toBe(
          parseAmount(a.amount, a.decimals) - parseAmount(b.amount, b.decimals),
        );
      }),
    );
  });

  it("swapping the operands negates the difference", () => {
    fc.assert(
      fc.property(arbMoneyPair, ([a, b]) => {
        const forward = subtractMoney(a, b);
        const backward = subtractMoney(b, a);
        expect(parseAmount(forward.amount, forward.decimals)).toBe(
          -parseAmount(backward.amount, backward.decimals),
        );
      }),
    );
  });

  it("multiplying by one is the identity", () => {
    fc.assert(
      fc.property(arbMoney, (m) => {
        const result = multiplyMoney(m, 1);
        expect(parseAmount(result.amount, result.decimals)).toBe(parseAmount(m.amount, m.decimals));
      }),
    );
  });

  it("context arithmetic preserves currency and decimals", () => {
    fc.assert(
      fc.property(arbMoney, arbFactor, (m, factor) => {
        for (const result of [multiplyMoney(m, factor), divideMoney(m, factor)]) {
          expect(result.currency).toBe(m.currency);
          expect(result.decimals).toBe(m.decimals);
        }
      }),
    );
  });

  it("context arithmetic is deterministic", () => {
    fc.assert(
      fc.property(arbMoney, arbFactor, (m, factor) => {
        expect(divideMoney(m, factor)).toEqual(divideMoney(m, factor));
      }),
    );
  });
});
