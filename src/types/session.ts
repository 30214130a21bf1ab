import { z } from "zod";
import { AMOUNT_PATTERN } from "../utils/money.js";
import { ExtractedInvoiceSchema } from "./invoice.js";

export enum SessionStatus {
  INITIALIZING = "INITIALIZING",
  PROCESSING = "PROCESSING",
  RESUMED = "RESUMED",
  COMPLETED = "COMPLETED",
}

export enum ComplianceStatus {
  COMPLIANT = "COMPLIANT",
  NON_COMPLIANT = "NON_COMPLIANT",
  MISSING_REFERENCE = "MISSING_REFERENCE",
}

export enum RiskLevel {
  LOW = "LOW",
  MEDIUM = "MEDIUM",
  HIGH = "HIGH",
  CRITICAL = "CRITICAL",
  UNKNOWN = "UNKNOWN",
}

const AmountSchema = z.string().regex(AMOUNT_PATTERN);

export const ReconciliationSchema = z.object({
  parentId: z.string(),
  extractedTotal: AmountSchema,
  referenceTotal: AmountSchema.nullable(),
  difference: AmountSchema.nullable(),
  percentageDifference: z.number().nullable(),
  status: z.nativeEnum(ComplianceStatus),
  riskLevel: z.nativeEnum(RiskLevel),
  invoiceCount: z.number().int().nonnegative(),
  countedInvoiceCount: z.number().int().nonnegative(),
});
export type Reconciliation = z.infer<typeof ReconciliationSchema>;

export const SessionRecordSchema = z.object({
  unitId: z.string(),
  documentHandle: z.string(),
  invoice: ExtractedInvoiceSchema,
});
export type SessionRecord = z.infer<typeof SessionRecordSchema>;

export const CompletedUnitSchema = z.object({
  unitId: z.string(),
  completionTime: z.string(),
  itemCount: z.number().int().nonnegative(),
  lineItemCount: z.number().int().nonnegative(),
  durationMs: z.number().nonnegative(),
  extractedTotal: AmountSchema,
  reconciliation: ReconciliationSchema.nullable(),
});
export type CompletedUnit = z.infer<typeof CompletedUnitSchema>;

export const FailedUnitSchema = z.object({
  unitId: z.string(),
  error: z.string(),
  time: z.string(),
});
export type FailedUnit = z.infer<typeof FailedUnitSchema>;

export const SessionMetadataSchema = z.object({
  totalRecords: z.number().int().nonnegative(),
  totalLineItems: z.number().int().nonnegative(),
  successfulExtractions: z.number().int().nonnegative(),
  failedExtractions: z.number().int().nonnegative(),
  processingTimeMs: z.number().nonnegative(),
});
export type SessionMetadata = z.infer<typeof SessionMetadataSchema>;

export const SessionStateSchema = z.object({
  sessionId: z.string(),
  rootHandle: z.string(),
  startTime: z.string(),
  lastUpdated: z.string(),
  endTime: z.string().nullable(),
  status: z.nativeEnum(SessionStatus),
  unitIds: z.array(z.string()),
  completedUnits: z.array(CompletedUnitSchema),
  failedUnits: z.array(FailedUnitSchema),
  // Empty outside of startUnit..completeUnit/failUnit. Entries left here at
  // load time mean the process stopped mid-unit.
  inProgressUnits: z.array(z.string()),
  records: z.array(SessionRecordSchema),
  metadata: SessionMetadataSchema,
});
export type SessionState = z.infer<typeof SessionStateSchema>;

export interface SessionListing {
  sessionId: string;
  status: SessionStatus;
  rootHandle: string;
  startTime: string;
  lastUpdated: string;
  completedUnits: number;
  failedUnits: number;
  totalUnits: number;
  resumable: boolean;
}
