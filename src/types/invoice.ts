import { z } from "zod";
import {
  AMOUNT_PATTERN,
  type Amount,
  ZERO_AMOUNT,
  sumAmounts,
} from "../utils/money.js";

export enum ExtractionConfidence {
  HIGH = "HIGH",
  MEDIUM = "MEDIUM",
  LOW = "LOW",
  ERROR = "ERROR",
}

export const CONFIDENCE_RANK: Record<ExtractionConfidence, number> = {
  [ExtractionConfidence.HIGH]: 3,
  [ExtractionConfidence.MEDIUM]: 2,
  [ExtractionConfidence.LOW]: 1,
  [ExtractionConfidence.ERROR]: 0,
};

export const compareConfidence = (
  a: ExtractionConfidence,
  b: ExtractionConfidence
): number => CONFIDENCE_RANK[a] - CONFIDENCE_RANK[b];

export type ExtractionMethod = "primary" | "fallback" | "heuristic" | "none";

const AmountSchema = z.string().regex(AMOUNT_PATTERN);

export const LineItemSchema = z.object({
  lineNumber: z.number().int().positive(),
  referenceCode: z.string(),
  description: z.string(),
  quantity: z.number().nonnegative(),
  unit: z.string(),
  tariffCode: z.string(),
  unitValue: z.number().nonnegative(),
  lineTotal: AmountSchema,
});
export type LineItem = z.infer<typeof LineItemSchema>;

export const ExtractedInvoiceSchema = z.object({
  supplier: z.string(),
  date: z.string(),
  invoiceNumber: z.string(),
  lineItems: z.array(LineItemSchema),
  totalLineItems: z.number().int().nonnegative(),
  declaredTotal: AmountSchema,
  confidence: z.nativeEnum(ExtractionConfidence),
  method: z.enum(["primary", "fallback", "heuristic", "none"]),
  notes: z.string(),
  sourceIdentifier: z.string(),
  processingDurationMs: z.number().nonnegative(),
  cacheHit: z.boolean(),
});
export type ExtractedInvoice = z.infer<typeof ExtractedInvoiceSchema>;

// Shape requested from the structuring model (LangChain structured output)
export const StructuredLineItemSchema = z.object({
  referenceCode: z
    .string()
    .describe("Product identification number or SKU of the line"),
  description: z.string().describe("Description of the goods"),
  quantity: z.number().describe("Customs quantity, as a plain number"),
  unit: z.string().describe("Customs unit code, e.g. 001"),
  tariffCode: z.string().describe("Tariff classification code, 8 to 10 digits"),
  unitValue: z.number().describe("Customs unit value, as a plain number"),
  lineTotal: z.number().describe("Line value in dollars, as a plain number"),
});
export type StructuredLineItem = z.infer<typeof StructuredLineItemSchema>;

export const StructuredInvoiceSchema = z.object({
  supplier: z.string().describe("Seller, exporter or supplier company name"),
  invoiceNumber: z.string().describe("Invoice number as printed"),
  date: z.string().describe("Invoice date as printed"),
  lineItems: z
    .array(StructuredLineItemSchema)
    .describe("Every goods line of the invoice, in document order"),
});
export type StructuredInvoice = z.infer<typeof StructuredInvoiceSchema>;

export type InvoiceInput = Omit<
  ExtractedInvoice,
  "totalLineItems" | "declaredTotal" | "cacheHit"
> & { cacheHit?: boolean };

// totalLineItems and declaredTotal are always derived from the line items.
export const createExtractedInvoice = (input: InvoiceInput): ExtractedInvoice => ({
  ...input,
  lineItems: [...input.lineItems],
  totalLineItems: input.lineItems.length,
  declaredTotal: sumAmounts(input.lineItems.map((item) => item.lineTotal)),
  cacheHit: input.cacheHit ?? false,
});

export const createErrorInvoice = (
  sourceIdentifier: string,
  message: string,
  processingDurationMs = 0
): ExtractedInvoice => ({
  supplier: "ERROR_SUPPLIER",
  date: "ERROR_DATE",
  invoiceNumber: "ERROR_INVOICE",
  lineItems: [],
  totalLineItems: 0,
  declaredTotal: ZERO_AMOUNT,
  confidence: ExtractionConfidence.ERROR,
  method: "none",
  notes: `ERROR: ${message}`,
  sourceIdentifier,
  processingDurationMs,
  cacheHit: false,
});

export const isCountable = (invoice: ExtractedInvoice): boolean =>
  invoice.confidence !== ExtractionConfidence.ERROR;

// Sum of declared totals over records that are not ERROR.
export const totalOf = (invoices: readonly ExtractedInvoice[]): Amount =>
  sumAmounts(invoices.filter(isCountable).map((invoice) => invoice.declaredTotal));
