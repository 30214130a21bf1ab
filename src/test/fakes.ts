import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import type { DocumentParser } from "../services/extraction/parsingService.js";
import type { InvoiceStructurer } from "../services/extraction/structuringService.js";
import { RetryExecutor } from "../services/retryExecutor.js";
import type { ParseOptions } from "../types/document.js";
import {
  ExtractionConfidence,
  createExtractedInvoice,
  type ExtractedInvoice,
  type LineItem,
  type StructuredInvoice,
} from "../types/invoice.js";

export const makeTempDir = (prefix = "invoice-extract-"): Promise<string> =>
  fs.mkdtemp(path.join(os.tmpdir(), prefix));

export const removeDir = (directory: string): Promise<void> =>
  fs.rm(directory, { recursive: true, force: true });

// Retries without waiting
export const immediateRetry = (maxAttempts = 3): RetryExecutor =>
  new RetryExecutor({ maxAttempts, baseDelayMs: 0, sleep: async () => {} });

// "Parses" a fixture by reading it as UTF-8 text, one page per form feed.
export class TextFileParser implements DocumentParser {
  readonly name = "text-file";
  calls = 0;

  async parse(filePath: string, _options: ParseOptions): Promise<string[]> {
    this.calls++;
    const text = await fs.readFile(filePath, "utf8");
    return text.split("\f");
  }
}

export class FakeStructurer implements InvoiceStructurer {
  readonly name = "fake-model";
  calls = 0;
  prompts: string[] = [];

  constructor(private readonly respond: (prompt: string) => Promise<StructuredInvoice>) {}

  async structure(prompt: string): Promise<StructuredInvoice> {
    this.calls++;
    this.prompts.push(prompt);
    return this.respond(prompt);
  }
}

export const lineItem = (overrides: Partial<LineItem> = {}): LineItem => ({
  lineNumber: 1,
  referenceCode: "SKU-100",
  description: "Steel bolts",
  quantity: 10,
  unit: "006",
  tariffCode: "73181599",
  unitValue: 1.5,
  lineTotal: "15.00",
  ...overrides,
});

export const invoice = (overrides: Partial<ExtractedInvoice> = {}): ExtractedInvoice =>
  createExtractedInvoice({
    supplier: "ACME INDUSTRIAL SA",
    date: "12/03/2024",
    invoiceNumber: "F-1001",
    lineItems: overrides.lineItems ?? [lineItem()],
    confidence: ExtractionConfidence.HIGH,
    method: "primary",
    notes: "PRIMARY_EXTRACTION",
    sourceIdentifier: "docs/F-1001.pdf",
    processingDurationMs: 120,
    ...overrides,
  });

export const labelledInvoiceText = (
  lines: Array<{ reference: string; total: string; quantity?: string }>
): string =>
  [
    "FACTURA COMERCIAL",
    "EXPORTADOR: ACME INDUSTRIAL SA",
    "NUMERO DE FACTURA: F-2024-17",
    "FECHA: 12/03/2024",
    ...lines.flatMap((line, index) => [
      `Numero de identificacion: ${line.reference}`,
      `Descripcion de la mercancia: Product ${index + 1}`,
      `Cantidad aduanera: ${line.quantity ?? "2"}`,
      "Unidad aduana: 006",
      "Fraccion arancelaria: 73181599",
      "Valor unitario aduana: 5.00",
      `Valor dolares: ${line.total}`,
    ]),
  ].join("\n");
