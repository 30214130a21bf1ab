import { describe, expect, it } from "vitest";
import { findDeclaredAmount } from "./referenceService.js";

describe("findDeclaredAmount", () => {
  const rows = [
    ["Port", "Entry Summary Number", "Line Tariff Goods Value Amount"],
    ["LRD", "ESN-001", "1,234.50"],
    ["LRD", "esn-002", "99"],
    ["LRD", "ESN-003", "n/a"],
  ];

  it("reads the amount in the row whose key matches", () => {
    expect(findDeclaredAmount(rows, "ESN-001")).toBe("1234.50");
  });

  it("matches keys without regard to case or padding", () => {
    expect(findDeclaredAmount(rows, " ESN-002 ")).toBe("99.00");
  });

  it("returns null for unknown keys and unparseable amounts", () => {
    expect(findDeclaredAmount(rows, "ESN-404")).toBeNull();
    expect(findDeclaredAmount(rows, "ESN-003")).toBeNull();
  });

  it("falls back to loosely named columns", () => {
    const loose = [
      ["ESN", "Declared Value"],
      ["E-7", "10,5"],
    ];
    expect(findDeclaredAmount(loose, "E-7")).toBe("10.50");
  });

  it("returns null when the sheet has no usable columns", () => {
    expect(findDeclaredAmount([["Name", "Notes"], ["a", "b"]], "a")).toBeNull();
    expect(findDeclaredAmount([], "a")).toBeNull();
  });
});
