/**
 * Runtime type guard tests for @annuitas/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import { isMoney, isRoundingMode } from "../src/guards.js";
import { ROUNDING_MODES } from "../src/financial.js";

// =============================================================================
// Money
// =============================================================================

describe("isMoney", () => {
  it("accepts valid Money", () => {
    expect(isMoney({ amount: "100.50", currency: "USD", decimals: 2 })).toBe(true);
  });

  it("accepts zero amount", () => {
    expect(isMoney({ amount: "0", currency: "EUR", decimals: 2 })).toBe(true);
  });

  it("accepts negative amount", () => {
    expect(isMoney({ amount: "-12.5", currency: "EUR", decimals: 2 })).toBe(true);
  });

  it("accepts zero decimals", () => {
    expect(isMoney({ amount: "1", currency: "JPY", decimals: 0 })).toBe(true);
  });

  it("rejects null", () => {
    expect(isMoney(null)).toBe(false);
  });

  it("rejects non-object", () => {
    expect(isMoney("100")).toBe(false);
    expect(isMoney(100)).toBe(false);
    expect(isMoney(undefined)).toBe(false);
  });

  it("rejects numeric amount (must be string)", () => {
    expect(isMoney({ amount: 100, currency: "USD", decimals: 2 })).toBe(false);
  });

  it("rejects malformed amount strings", () => {
    expect(isMoney({ amount: "1e3", currency: "USD", decimals: 2 })).toBe(false);
    expect(isMoney({ amount: "12.", currency: "USD", decimals: 2 })).toBe(false);
    expect(isMoney({ amount: "", currency: "USD", decimals: 2 })).toBe(false);
  });

  it("rejects missing currency", () => {
    expect(isMoney({ amount: "100", decimals: 2 })).toBe(false);
  });

  it("rejects blank currency", () => {
    expect(isMoney({ amount: "100", currency: "  ", decimals: 2 })).toBe(false);
  });

  it("rejects negative decimals", () => {
    expect(isMoney({ amount: "1", currency: "X", decimals: -1 })).toBe(false);
  });

  it("rejects non-integer decimals", () => {
    expect(isMoney({ amount: "1", currency: "X", decimals: 6.5 })).toBe(false);
  });
});

// =============================================================================
// Rounding modes
// =============================================================================

describe("isRoundingMode", () => {
  it("accepts every listed mode", () => {
    for (const mode of ROUNDING_MODES) {
      expect(isRoundingMode(mode)).toBe(true);
    }
  });

  it("lists nine modes", () => {
    expect(ROUNDING_MODES).toHaveLength(9);
  });

  it("rejects lowercase names", () => {
    expect(isRoundingMode("half_even")).toBe(false);
  });

  it("rejects non-strings", () => {
    expect(isRoundingMode(6)).toBe(false);
    expect(isRoundingMode(null)).toBe(false);
  });
});
