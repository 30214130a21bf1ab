import type { NegativeValuePolicy } from "../../config.js";
import type { LineItem } from "../../types/invoice.js";
import { amountFromNumber } from "../../utils/money.js";
import { err, ok, type Result } from "../../utils/result.js";

export interface RawLineItem {
  lineNumber: number;
  referenceCode: string;
  description: string;
  quantity: number;
  unit: string;
  tariffCode: string;
  unitValue: number;
  lineTotal: number;
}

const NUMERIC_FIELDS = ["quantity", "unitValue", "lineTotal"] as const;

/**
 * Builds a LineItem from raw extracted values. Non-finite numbers become 0.
 * Negative numbers are clamped to 0 under "clamp" and reject the whole
 * item under "reject".
 */
export const normalizeLineItem = (
  raw: RawLineItem,
  policy: NegativeValuePolicy
): Result<LineItem> => {
  const values = {
    quantity: Number.isFinite(raw.quantity) ? raw.quantity : 0,
    unitValue: Number.isFinite(raw.unitValue) ? raw.unitValue : 0,
    lineTotal: Number.isFinite(raw.lineTotal) ? raw.lineTotal : 0,
  };

  const negative = NUMERIC_FIELDS.filter((field) => values[field] < 0);
  if (negative.length > 0 && policy === "reject") {
    return err(
      `line ${raw.lineNumber} has negative ${negative.join(", ")}`
    );
  }

  return ok({
    lineNumber: raw.lineNumber,
    referenceCode: raw.referenceCode.trim(),
    description: raw.description.trim(),
    quantity: Math.max(0, values.quantity),
    unit: raw.unit.trim(),
    tariffCode: raw.tariffCode.trim(),
    unitValue: Math.max(0, values.unitValue),
    lineTotal: amountFromNumber(Math.max(0, values.lineTotal)),
  });
};

export interface NormalizedLineItems {
  items: LineItem[];
  rejected: string[];
}

// Renumbers kept items 1..n in input order.
export const normalizeLineItems = (
  raws: readonly RawLineItem[],
  policy: NegativeValuePolicy
): NormalizedLineItems => {
  const items: LineItem[] = [];
  const rejected: string[] = [];

  for (const raw of raws) {
    const result = normalizeLineItem(raw, policy);
    if (result.ok) {
      items.push({ ...result.value, lineNumber: items.length + 1 });
    } else {
      rejected.push(result.error);
    }
  }

  return { items, rejected };
};
