import { ExtractionConfidence, type LineItem } from "../../types/invoice.js";
import { toCents } from "../../utils/money.js";
import { isPlaceholderReference } from "./fieldPatterns.js";

export interface QualitySignals {
  hasRealReferences: boolean;
  hasPositiveTotal: boolean;
  hasPositiveQuantity: boolean;
}

export const evaluateSignals = (items: readonly LineItem[]): QualitySignals => ({
  hasRealReferences: items.some((item) => !isPlaceholderReference(item.referenceCode)),
  hasPositiveTotal: items.some((item) => toCents(item.lineTotal) > 0),
  hasPositiveQuantity: items.some((item) => item.quantity > 0),
});

const BY_SIGNAL_COUNT: readonly ExtractionConfidence[] = [
  ExtractionConfidence.ERROR,
  ExtractionConfidence.LOW,
  ExtractionConfidence.MEDIUM,
  ExtractionConfidence.HIGH,
];

// Fallback path only. Primary successes are always HIGH.
export const scoreConfidence = (signals: QualitySignals): ExtractionConfidence => {
  const satisfied = [
    signals.hasRealReferences,
    signals.hasPositiveTotal,
    signals.hasPositiveQuantity,
  ].filter(Boolean).length;
  return BY_SIGNAL_COUNT[satisfied];
};
