import { totalOf, isCountable, type ExtractedInvoice } from "../types/invoice.js";
import {
  ComplianceStatus,
  RiskLevel,
  type Reconciliation,
} from "../types/session.js";
import { fromCents, toCents, type Amount } from "../utils/money.js";

export interface ReconciliationThresholds {
  tolerancePercent: number;
  mediumRiskPercent: number;
  highRiskPercent: number;
}

export const DEFAULT_THRESHOLDS: ReconciliationThresholds = {
  tolerancePercent: 1.0,
  mediumRiskPercent: 2.0,
  highRiskPercent: 5.0,
};

const riskFor = (percent: number, thresholds: ReconciliationThresholds): RiskLevel => {
  if (percent <= thresholds.tolerancePercent) return RiskLevel.LOW;
  if (percent <= thresholds.mediumRiskPercent) return RiskLevel.MEDIUM;
  if (percent <= thresholds.highRiskPercent) return RiskLevel.HIGH;
  return RiskLevel.CRITICAL;
};

/**
 * Compares the extracted total of a parent group (ERROR records excluded)
 * with its declared reference total. The percentage is relative to the
 * reference; a zero reference counts as missing.
 */
export const reconcileGroup = (
  parentId: string,
  invoices: readonly ExtractedInvoice[],
  referenceTotal: Amount | null,
  thresholds: ReconciliationThresholds = DEFAULT_THRESHOLDS
): Reconciliation => {
  const extractedTotal = totalOf(invoices);
  const base = {
    parentId,
    extractedTotal,
    invoiceCount: invoices.length,
    countedInvoiceCount: invoices.filter(isCountable).length,
  };

  const referenceCents = referenceTotal === null ? 0 : toCents(referenceTotal);
  if (referenceTotal === null || referenceCents === 0) {
    return {
      ...base,
      referenceTotal: null,
      difference: null,
      percentageDifference: null,
      status: ComplianceStatus.MISSING_REFERENCE,
      riskLevel: RiskLevel.UNKNOWN,
    };
  }

  const differenceCents = toCents(extractedTotal) - referenceCents;
  const percentageDifference =
    Math.round((Math.abs(differenceCents) / Math.abs(referenceCents)) * 100 * 100) / 100;

  return {
    ...base,
    referenceTotal,
    difference: fromCents(differenceCents),
    percentageDifference,
    status:
      percentageDifference <= thresholds.tolerancePercent
        ? ComplianceStatus.COMPLIANT
        : ComplianceStatus.NON_COMPLIANT,
    riskLevel: riskFor(percentageDifference, thresholds),
  };
};
