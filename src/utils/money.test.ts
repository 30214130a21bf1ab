import { describe, expect, it } from "vitest";
import {
  amountFromNumber,
  fromCents,
  parseLocaleNumber,
  sumAmounts,
  toCents,
} from "./money.js";

describe("money", () => {
  it("converts decimal strings to integer cents", () => {
    expect(toCents("12.34")).toBe(1234);
    expect(toCents("-0.50")).toBe(-50);
    expect(toCents("7")).toBe(700);
    expect(toCents("1.5")).toBe(150);
    expect(() => toCents("abc")).toThrow("Invalid amount: abc");
  });

  it("formats cents with two fractional digits", () => {
    expect(fromCents(0)).toBe("0.00");
    expect(fromCents(3000)).toBe("30.00");
    expect(fromCents(-5)).toBe("-0.05");
  });

  it("rounds numbers to cents", () => {
    expect(amountFromNumber(19.999)).toBe("20.00");
    expect(amountFromNumber(-3.456)).toBe("-3.46");
    expect(amountFromNumber(10)).toBe("10.00");
  });

  it("sums without floating point drift", () => {
    expect(sumAmounts(["0.10", "0.20"])).toBe("0.30");
    expect(sumAmounts(["10.00", "20.00"])).toBe("30.00");
    expect(sumAmounts([])).toBe("0.00");
  });

  describe("parseLocaleNumber", () => {
    it.each([
      ["1,234.50", 1234.5],
      ["1.234,50", 1234.5],
      ["12,5", 12.5],
      ["1,234", 1234],
      ["$ 1 000", 1000],
      ["1.234.567", 1234567],
      ["12.5", 12.5],
    ])("parses %s", (raw, expected) => {
      expect(parseLocaleNumber(raw)).toBe(expected);
    });

    it("returns null for text that is not a number", () => {
      expect(parseLocaleNumber("abc")).toBeNull();
      expect(parseLocaleNumber("")).toBeNull();
    });
  });
});
