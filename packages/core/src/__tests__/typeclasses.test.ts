import { describe, expect, it } from "vitest";
import {
  EQ,
  GT,
  LT,
  eqBy,
  eqSameValueZero,
  eqStrict,
  naturalOrd,
  numericBigint,
  numericNumber,
  ordBy,
  ordDate,
  ordNumber,
  ordString,
  reverseOrd,
} from "../typeclasses.js";

describe("Eq instances", () => {
  it("eqStrict follows ===", () => {
    expect(eqStrict.eqv(1, 1)).toBe(true);
    expect(eqStrict.eqv(NaN, NaN)).toBe(false);
    expect(eqStrict.eqv({}, {})).toBe(false);
  });

  it("eqSameValueZero treats NaN as equal to itself", () => {
    expect(eqSameValueZero.eqv(NaN, NaN)).toBe(true);
    expect(eqSameValueZero.eqv(0, -0)).toBe(true);
    expect(eqSameValueZero.eqv("1", 1)).toBe(false);
  });

  it("eqBy compares derived keys", () => {
    const byLower = eqBy((s: string) => s.toLowerCase(), eqStrict);
    expect(byLower.eqv("Seq", "sEQ")).toBe(true);
    expect(byLower.eqv("seq", "set")).toBe(false);
  });
});

describe("Ord instances", () => {
  it("orders numbers, strings and dates", () => {
    expect(ordNumber.compare(1, 2)).toBe(LT);
    expect(ordNumber.compare(2, 2)).toBe(EQ);
    expect(ordString.compare("b", "a")).toBe(GT);
    expect(ordDate.compare(new Date(5), new Date(3))).toBe(GT);
    expect(ordDate.eqv(new Date(5), new Date(5))).toBe(true);
  });

  it("naturalOrd compares values of the same primitive kind", () => {
    const ord = naturalOrd<unknown>();
    expect(ord.compare(1, 2)).toBe(LT);
    expect(ord.compare(10n, 2n)).toBe(GT);
    expect(ord.compare("x", "x")).toBe(EQ);
    expect(ord.compare(new Date(1), new Date(2))).toBe(LT);
  });

  it("naturalOrd rejects values of different kinds", () => {
    expect(() => naturalOrd<unknown>().compare(1, "1")).toThrow(
      new TypeError("No natural ordering between number and string; pass an Ord instance")
    );
    expect(() => naturalOrd<unknown>().compare({}, null)).toThrow(
      new TypeError("No natural ordering between Object and null; pass an Ord instance")
    );
  });

  it("ordBy and reverseOrd derive new orderings", () => {
    const byLength = ordBy((s: string) => s.length, ordNumber);
    expect(byLength.compare("abc", "de")).toBe(GT);
    expect(reverseOrd(byLength).compare("abc", "de")).toBe(LT);
    expect(reverseOrd(byLength).eqv("ab", "cd")).toBe(true);
  });
});

describe("Numeric instances", () => {
  it("numericNumber and numericBigint add from zero", () => {
    expect(numericNumber.add(numericNumber.zero(), 4)).toBe(4);
    expect(numericBigint.add(numericBigint.zero(), 4n)).toBe(4n);
  });
});
