import { describe, expect, it } from "vitest";
import { HEURISTIC_ITEM_CAP, scanForLineItems } from "./heuristicScan.js";

describe("scanForLineItems", () => {
  it("pairs identifier tokens with the amounts that follow them", () => {
    const text = [
      "PACKING LIST",
      "Item AB1234 steel hinge",
      "Qty 4 Total 120.50",
      "Item XZ99-7 copper wire",
      "Qty 2 Total 30.00",
    ].join("\n");

    expect(scanForLineItems(text)).toEqual([
      {
        lineNumber: 1,
        referenceCode: "AB1234",
        description: "EXTRACTED_PRODUCT_1",
        quantity: 4,
        unit: "001",
        tariffCode: "00000000",
        unitValue: 30.125,
        lineTotal: 120.5,
      },
      {
        lineNumber: 2,
        referenceCode: "XZ99-7",
        description: "EXTRACTED_PRODUCT_2",
        quantity: 2,
        unit: "001",
        tariffCode: "00000000",
        unitValue: 15,
        lineTotal: 30,
      },
    ]);
  });

  it("ignores amounts outside the plausible range", () => {
    const text = ["Part QX500", "Qty 0 Total 2000000"].join("\n");
    expect(scanForLineItems(text)).toEqual([]);
  });

  it("ignores words without digits", () => {
    expect(scanForLineItems("TOTAL INVOICE\n12 300.00")).toEqual([]);
  });

  it("stops at the item cap", () => {
    const text = Array.from(
      { length: HEURISTIC_ITEM_CAP + 3 },
      (_, i) => `Code P${1000 + i}\nQty 1 Total ${i + 1}.00`
    ).join("\n");

    const items = scanForLineItems(text);
    expect(items).toHaveLength(HEURISTIC_ITEM_CAP);
    expect(items[9].referenceCode).toBe("P1009");
  });
});
