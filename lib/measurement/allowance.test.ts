import { describe, it, expect } from "vitest";
import { NO_ALLOWANCE, parseAllowance } from "./allowance";

describe("parseAllowance", () => {
  it("takes the second number off the length by default", () => {
    expect(parseAllowance("-5 x 4")).toEqual({ lengthDeduction: 4, heightDeduction: 5 });
  });

  it("takes the first number off the length when swapped", () => {
    expect(parseAllowance("-5 x 4", true)).toEqual({ lengthDeduction: 5, heightDeduction: 4 });
  });

  it("reads digit runs only, so minus signs and units are ignored", () => {
    expect(parseAllowance("-10x-8 cm")).toEqual({ lengthDeduction: 8, heightDeduction: 10 });
  });

  it("applies a single number to both sides", () => {
    expect(parseAllowance("3")).toEqual({ lengthDeduction: 3, heightDeduction: 3 });
    expect(parseAllowance("3", true)).toEqual({ lengthDeduction: 3, heightDeduction: 3 });
  });

  it("means no deduction when there are no digits", () => {
    expect(parseAllowance("")).toEqual(NO_ALLOWANCE);
    expect(parseAllowance("none")).toEqual({ lengthDeduction: 0, heightDeduction: 0 });
  });

  it("ignores numbers after the second", () => {
    expect(parseAllowance("2 x 3 x 9")).toEqual({ lengthDeduction: 3, heightDeduction: 2 });
  });
});
