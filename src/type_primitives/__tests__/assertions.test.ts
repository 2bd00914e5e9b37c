import { describe, expect, it } from "vitest";
import {
  is_non_negative_integer,
  is_plain_object,
  is_present,
  unsafe_cast,
  validate_and_cast,
} from "../assertions";
import { ValidationError, VALIDATION } from "../error";

describe("assertions", () => {
  //=========================================================
  // is_non_negative_integer
  //=========================================================

  it("is_non_negative_integer accepts zero and positive integers", () => {
    expect(is_non_negative_integer(0)).toBe(true);
    expect(is_non_negative_integer(42)).toBe(true);
    expect(is_non_negative_integer(999_999)).toBe(true);
  });

  it("is_non_negative_integer rejects negatives and non-integers", () => {
    expect(is_non_negative_integer(-1)).toBe(false);
    expect(is_non_negative_integer(1.5)).toBe(false);
    expect(is_non_negative_integer(NaN)).toBe(false);
    expect(is_non_negative_integer(Infinity)).toBe(false);
  });

  //=========================================================
  // is_present
  //=========================================================

  it("is_present rejects null and undefined only", () => {
    expect(is_present(null)).toBe(false);
    expect(is_present(undefined)).toBe(false);
    expect(is_present(0)).toBe(true);
    expect(is_present("")).toBe(true);
    expect(is_present(false)).toBe(true);
  });

  //=========================================================
  // is_plain_object
  //=========================================================

  it("is_plain_object accepts object literals", () => {
    expect(is_plain_object({})).toBe(true);
    expect(is_plain_object({ a: 1 })).toBe(true);
    expect(is_plain_object(Object.create(null))).toBe(true);
  });

  it("is_plain_object rejects arrays, instances and primitives", () => {
    expect(is_plain_object([])).toBe(false);
    expect(is_plain_object(new Map())).toBe(false);
    expect(is_plain_object(null)).toBe(false);
    expect(is_plain_object("text")).toBe(false);
  });

  //=========================================================
  // validate_and_cast
  //=========================================================

  it("validate_and_cast returns the value when validation passes", () => {
    expect(validate_and_cast(42, (v) => v > 0, "positive number")).toBe(42);
  });

  it("validate_and_cast throws a ValidationError when validation fails", () => {
    try {
      validate_and_cast(-1, (v) => v > 0, "positive number");
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ValidationError);
      if (!(e instanceof ValidationError)) return;
      expect(e.category).toBe(VALIDATION.VALIDATION_FAIL_CONDITION);
      expect(e.message).toBe("Expected value to meet validation: positive number");
      expect(e.is_operational).toBe(false);
    }
  });

  //=========================================================
  // unsafe_cast
  //=========================================================

  it("unsafe_cast returns the same value", () => {
    const value = { a: 1 };
    expect(unsafe_cast<{ a: number }>(value)).toBe(value);
  });
});
