import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  FakeStructurer,
  TextFileParser,
  immediateRetry,
  labelledInvoiceText,
  makeTempDir,
  removeDir,
} from "../../test/fakes.js";
import { ExtractionStage } from "../../types/document.js";
import { ExtractionConfidence, type StructuredInvoice } from "../../types/invoice.js";
import { ExtractionEngine, type ExtractionEngineOptions } from "./extractionEngine.js";
import type { InvoiceStructurer } from "./structuringService.js";

const structured = (overrides: Partial<StructuredInvoice> = {}): StructuredInvoice => ({
  supplier: "Acme Industrial SA",
  invoiceNumber: "",
  date: "2024-03-12",
  lineItems: [
    {
      referenceCode: "X1",
      description: "Copper wire",
      quantity: 5,
      unit: "006",
      tariffCode: "74081999",
      unitValue: 2.5,
      lineTotal: 12.5,
    },
  ],
  ...overrides,
});

describe("ExtractionEngine", () => {
  let dir: string;
  let parser: TextFileParser;

  const engine = (
    structurer: InvoiceStructurer | null,
    overrides: Partial<ExtractionEngineOptions> = {}
  ) =>
    new ExtractionEngine({
      parser,
      structurer,
      retry: immediateRetry(3),
      language: "es",
      minContentLength: 50,
      promptCharBudget: 12000,
      negativeValuePolicy: "clamp",
      parseTimeoutMs: 5000,
      structuringTimeoutMs: 5000,
      now: () => 0,
      ...overrides,
    });

  const writeDoc = async (name: string, text: string): Promise<string> => {
    const filePath = path.join(dir, name);
    await fs.writeFile(filePath, text, "utf8");
    return filePath;
  };

  beforeEach(async () => {
    dir = await makeTempDir();
    parser = new TextFileParser();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("extracts labelled line items when no primary structurer is configured", async () => {
    const file = await writeDoc(
      "a.pdf",
      labelledInvoiceText([
        { reference: "A1", total: "10.00" },
        { reference: "A2", total: "20.00" },
      ])
    );
    const stages: ExtractionStage[] = [];

    const invoice = await engine(null).extract(file, {
      sourceIdentifier: "G1/a.pdf",
      parentId: "G1",
      onStage: (stage) => stages.push(stage),
    });

    expect(invoice).toMatchObject({
      supplier: "ACME INDUSTRIAL SA",
      invoiceNumber: "F-2024-17",
      date: "12/03/2024",
      totalLineItems: 2,
      declaredTotal: "30.00",
      confidence: ExtractionConfidence.HIGH,
      method: "fallback",
      sourceIdentifier: "G1/a.pdf",
      cacheHit: false,
    });
    expect(invoice.lineItems.map((item) => [item.referenceCode, item.lineTotal])).toEqual([
      ["A1", "10.00"],
      ["A2", "20.00"],
    ]);
    expect(invoice.notes).toBe(
      "REGEX_EXTRACTION | rows=2 | padded_fields=0 | primary_failed=no primary structurer configured | parent=G1"
    );
    expect(stages).toEqual([
      ExtractionStage.PARSING,
      ExtractionStage.STRUCTURING_PRIMARY,
      ExtractionStage.STRUCTURING_FALLBACK,
      ExtractionStage.DONE,
    ]);
  });

  it("marks primary results HIGH and fills blank header fields from patterns", async () => {
    const file = await writeDoc("b.pdf", labelledInvoiceText([{ reference: "A1", total: "10.00" }]));
    const structurer = new FakeStructurer(async () => structured());

    const invoice = await engine(structurer).extract(file, { sourceIdentifier: "b.pdf" });

    expect(invoice).toMatchObject({
      supplier: "Acme Industrial SA",
      invoiceNumber: "F-2024-17",
      date: "2024-03-12",
      confidence: ExtractionConfidence.HIGH,
      method: "primary",
      declaredTotal: "12.50",
      notes: "PRIMARY_EXTRACTION | model=fake-model",
    });
    expect(invoice.lineItems[0]).toEqual({
      lineNumber: 1,
      referenceCode: "X1",
      description: "Copper wire",
      quantity: 5,
      unit: "006",
      tariffCode: "74081999",
      unitValue: 2.5,
      lineTotal: "12.50",
    });
    expect(structurer.calls).toBe(1);
  });

  it("truncates long documents before prompting", async () => {
    const file = await writeDoc("c.pdf", labelledInvoiceText([{ reference: "A1", total: "10.00" }]));
    const structurer = new FakeStructurer(async () => structured());

    const invoice = await engine(structurer, { promptCharBudget: 60 }).extract(file, {
      sourceIdentifier: "c.pdf",
    });

    expect(invoice.notes).toBe("PRIMARY_EXTRACTION | model=fake-model | truncated_to=60");
    expect(structurer.prompts[0]).not.toContain("Valor dolares");
  });

  it("falls back to patterns after the primary strategy exhausts its retries", async () => {
    const file = await writeDoc("d.pdf", labelledInvoiceText([{ reference: "A1", total: "10.00" }]));
    const structurer = new FakeStructurer(async () => {
      throw new Error("rate limited");
    });

    const invoice = await engine(structurer).extract(file, { sourceIdentifier: "d.pdf" });

    expect(structurer.calls).toBe(3);
    expect(invoice.method).toBe("fallback");
    expect(invoice.declaredTotal).toBe("10.00");
    expect(invoice.notes).toBe(
      "REGEX_EXTRACTION | rows=1 | padded_fields=0 | primary_failed=rate limited"
    );
  });

  it("falls back when the primary strategy returns no line items", async () => {
    const file = await writeDoc("e.pdf", labelledInvoiceText([{ reference: "A1", total: "10.00" }]));
    const structurer = new FakeStructurer(async () => structured({ lineItems: [] }));

    const invoice = await engine(structurer).extract(file, { sourceIdentifier: "e.pdf" });

    expect(structurer.calls).toBe(1);
    expect(invoice.method).toBe("fallback");
  });

  it("drops negative primary lines under the reject policy", async () => {
    const file = await writeDoc("f.pdf", labelledInvoiceText([{ reference: "A1", total: "10.00" }]));
    const base = structured().lineItems[0];
    const structurer = new FakeStructurer(async () =>
      structured({ lineItems: [{ ...base, quantity: -1 }, { ...base, referenceCode: "X2" }] })
    );

    const invoice = await engine(structurer, { negativeValuePolicy: "reject" }).extract(file, {
      sourceIdentifier: "f.pdf",
    });

    expect(invoice.lineItems.map((item) => [item.lineNumber, item.referenceCode])).toEqual([
      [1, "X2"],
    ]);
    expect(invoice.notes).toBe(
      "PRIMARY_EXTRACTION | model=fake-model | rejected=line 1 has negative quantity"
    );
  });

  it("returns an ERROR record for documents with too little text", async () => {
    const file = await writeDoc("g.pdf", "tiny");

    const invoice = await engine(null).extract(file, {
      sourceIdentifier: "G2/g.pdf",
      parentId: "G2",
    });

    expect(invoice).toEqual({
      supplier: "ERROR_SUPPLIER",
      date: "ERROR_DATE",
      invoiceNumber: "ERROR_INVOICE",
      lineItems: [],
      totalLineItems: 0,
      declaredTotal: "0.00",
      confidence: ExtractionConfidence.ERROR,
      method: "none",
      notes: "ERROR: Document has too little text (4 chars, need 50) | G2",
      sourceIdentifier: "G2/g.pdf",
      processingDurationMs: 0,
      cacheHit: false,
    });
    expect(parser.calls).toBe(1);
  });

  it("uses the heuristic scan when the text has no labelled fields", async () => {
    const file = await writeDoc(
      "h.pdf",
      ["PACKING LIST FOR SHIPMENT", "Item AB1234 steel hinge", "Qty 4 Total 120.50"].join("\n")
    );

    const invoice = await engine(null).extract(file, { sourceIdentifier: "h.pdf" });

    expect(invoice.method).toBe("heuristic");
    expect(invoice.lineItems[0].referenceCode).toBe("AB1234");
    expect(invoice.declaredTotal).toBe("120.50");
    expect(invoice.confidence).toBe(ExtractionConfidence.HIGH);
  });

  it("propagates cancellation instead of producing a record", async () => {
    const file = await writeDoc("i.pdf", labelledInvoiceText([{ reference: "A1", total: "10.00" }]));
    const controller = new AbortController();
    controller.abort(new Error("stopped"));

    await expect(
      engine(null).extract(file, { sourceIdentifier: "i.pdf", signal: controller.signal })
    ).rejects.toThrow("stopped");
    expect(parser.calls).toBe(0);
  });
});
