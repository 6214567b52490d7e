/**
 * Tests for environment configuration.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { formatConfigErrors, loadConfig } from "../src/config.js";

function configErrors(env: Record<string, string>): readonly string[] {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ZodError) return formatConfigErrors(error);
    throw error;
  }
  return [];
}

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    expect(loadConfig({})).toEqual({
      LOG_LEVEL: "warn",
      NODE_ENV: "development",
      CALC_PRECISION: 16,
      CALC_ROUNDING: "HALF_EVEN",
      DEFAULT_CURRENCY: "USD",
      DEFAULT_DECIMALS: 2,
    });
  });

  it("coerces numeric variables", () => {
    const config = loadConfig({ CALC_PRECISION: "34", DEFAULT_DECIMALS: "0" });
    expect(config.CALC_PRECISION).toBe(34);
    expect(config.DEFAULT_DECIMALS).toBe(0);
  });

  it("accepts every rounding mode name", () => {
    expect(loadConfig({ CALC_ROUNDING: "HALF_UP" }).CALC_ROUNDING).toBe("HALF_UP");
    expect(loadConfig({ CALC_ROUNDING: "FLOOR" }).CALC_ROUNDING).toBe("FLOOR");
  });

  it("trims the default currency", () => {
    expect(loadConfig({ DEFAULT_CURRENCY: " EUR " }).DEFAULT_CURRENCY).toBe("EUR");
  });

  it("ignores unrelated variables", () => {
    expect(loadConfig({ HOME: "/tmp" })).not.toHaveProperty("HOME");
  });

  it("throws ZodError for invalid values", () => {
    expect(() => loadConfig({ CALC_PRECISION: "0" })).toThrow(ZodError);
  });
});

describe("formatConfigErrors", () => {
  it("names the offending variable", () => {
    expect(configErrors({ CALC_PRECISION: "0" })).toEqual([
      "CALC_PRECISION: Number must be greater than or equal to 1",
    ]);
  });

  it("lists the rounding modes for an unknown one", () => {
    expect(configErrors({ CALC_ROUNDING: "NEAREST" })).toEqual([
      "CALC_ROUNDING: Must be one of UP, DOWN, CEILING, FLOOR, HALF_UP, HALF_DOWN, HALF_EVEN, HALF_CEILING, HALF_FLOOR",
    ]);
  });

  it("reports every invalid variable", () => {
    expect(configErrors({ CALC_PRECISION: "1001", DEFAULT_DECIMALS: "19" })).toHaveLength(2);
  });
});
