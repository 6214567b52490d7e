import { describe, it, expect } from "vitest";
import { Decimal } from "decimal.js";
import { Rate } from "../src/rate.js";
import { CalcError } from "../src/types.js";

describe("Rate.of", () => {
  it("accepts a decimal string", () => {
    expect(Rate.of("0.05")._unsafeUnwrap().get().toString()).toBe("0.05");
  });

  it("accepts a number", () => {
    expect(Rate.of(0.05)._unsafeUnwrap().get().toString()).toBe("0.05");
  });

  it("accepts a decimal", () => {
    expect(Rate.of(new Decimal("0.125"))._unsafeUnwrap().get().toString()).toBe("0.125");
  });

  it("keeps the value exactly", () => {
    const value = "0.0123456789012345678901234567";
    expect(Rate.of(value)._unsafeUnwrap().get().toString()).toBe(value);
  });

  it("accepts zero and negative rates", () => {
    expect(Rate.of(0).isOk()).toBe(true);
    expect(Rate.of("-0.01").isOk()).toBe(true);
  });

  it("rejects null", () => {
    const error = Rate.of(null)._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(CalcError);
    expect(error.code).toBe("INVALID_ARGUMENT");
  });

  it("rejects undefined", () => {
    expect(Rate.of(undefined)._unsafeUnwrapErr().code).toBe("INVALID_ARGUMENT");
  });

  it("rejects an unparseable string", () => {
    const error = Rate.of("five percent")._unsafeUnwrapErr();
    expect(error.code).toBe("INVALID_ARGUMENT");
    expect(error.message).toBe('Invalid rate: "five percent"');
  });

  it("rejects non-finite values", () => {
    expect(Rate.of(Infinity)._unsafeUnwrapErr().message).toBe("Rate must be finite, got: Infinity");
    expect(Rate.of(NaN)._unsafeUnwrapErr().message).toBe("Rate must be finite, got: NaN");
  });
});

describe("Rate value semantics", () => {
  it("compares by value", () => {
    const a = Rate.of("0.050")._unsafeUnwrap();
    const b = Rate.of(0.05)._unsafeUnwrap();
    const c = Rate.of("0.06")._unsafeUnwrap();
    expect(a.equals(b)).toBe(true);
    expect(a.equals(c)).toBe(false);
  });

  it("renders its value", () => {
    const rate = Rate.of("0.050")._unsafeUnwrap();
    expect(rate.toString()).toBe("Rate(0.05)");
    expect(JSON.stringify({ rate })).toBe('{"rate":"0.05"}');
  });
});
