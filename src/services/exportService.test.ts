import ExcelJS from "exceljs";
import { describe, expect, it } from "vitest";
import { invoice, lineItem } from "../test/fakes.js";
import { ExtractionConfidence, createErrorInvoice } from "../types/invoice.js";
import { ComplianceStatus, RiskLevel, SessionStatus, type SessionState } from "../types/session.js";
import {
  ExcelReportExporter,
  JsonResultsExporter,
  buildSessionSummary,
} from "./exportService.js";

const state = (): SessionState => ({
  sessionId: "s1",
  rootHandle: "batches/2024-03",
  startTime: "2024-03-12T10:00:00.000Z",
  lastUpdated: "2024-03-12T10:05:00.000Z",
  endTime: null,
  status: SessionStatus.PROCESSING,
  unitIds: ["G1", "G2", "G3"],
  completedUnits: [
    {
      unitId: "G1",
      completionTime: "2024-03-12T10:04:00.000Z",
      itemCount: 2,
      lineItemCount: 2,
      durationMs: 900,
      extractedTotal: "25.00",
      reconciliation: {
        parentId: "G1",
        extractedTotal: "25.00",
        referenceTotal: "25.00",
        difference: "0.00",
        percentageDifference: 0,
        status: ComplianceStatus.COMPLIANT,
        riskLevel: RiskLevel.LOW,
        invoiceCount: 3,
        countedInvoiceCount: 2,
      },
    },
  ],
  failedUnits: [{ unitId: "G2", error: "listing failed", time: "2024-03-12T10:04:30.000Z" }],
  inProgressUnits: [],
  records: [
    {
      unitId: "G1",
      documentHandle: "G1/a.pdf",
      invoice: invoice({
        sourceIdentifier: "G1/a.pdf",
        lineItems: [lineItem(), lineItem({ lineNumber: 2, lineTotal: "10.00" }), lineItem({ lineNumber: 3, lineTotal: "0.00" })],
      }),
    },
    {
      unitId: "G1",
      documentHandle: "G1/b.pdf",
      invoice: invoice({
        sourceIdentifier: "G1/b.pdf",
        confidence: ExtractionConfidence.LOW,
        method: "fallback",
        cacheHit: true,
        lineItems: [lineItem({ lineTotal: "0.00" })],
      }),
    },
    {
      unitId: "G1",
      documentHandle: "G1/c.pdf",
      invoice: createErrorInvoice("G1/c.pdf", "unreadable"),
    },
  ],
  metadata: {
    totalRecords: 3,
    totalLineItems: 4,
    successfulExtractions: 2,
    failedExtractions: 1,
    processingTimeMs: 900,
  },
});

describe("buildSessionSummary", () => {
  it("derives counts and distributions from the session", () => {
    const summary = buildSessionSummary(state());

    expect(summary).toMatchObject({
      totalUnits: 3,
      completedUnits: 1,
      failedUnits: 1,
      pendingUnits: 1,
      totalRecords: 3,
      successRate: 66.67,
      cacheHits: 1,
      extractedTotal: "25.00",
      confidenceDistribution: { HIGH: 1, MEDIUM: 0, LOW: 1, ERROR: 1 },
      methodDistribution: { primary: 1, fallback: 1, heuristic: 0, none: 1 },
      complianceDistribution: { COMPLIANT: 1, NON_COMPLIANT: 0, MISSING_REFERENCE: 0 },
    });
  });
});

describe("JsonResultsExporter", () => {
  it("writes summary, groups, failures and records", async () => {
    const exporter = new JsonResultsExporter();
    const parsed = JSON.parse(await exporter.render(state()));

    expect(exporter.targetPath("out", "s1")).toBe("out/json/extraction_s1.json");
    expect(parsed.summary.sessionId).toBe("s1");
    expect(parsed.groups).toHaveLength(1);
    expect(parsed.failedUnits[0].error).toBe("listing failed");
    expect(parsed.records.map((record: { documentHandle: string }) => record.documentHandle)).toEqual([
      "G1/a.pdf",
      "G1/b.pdf",
      "G1/c.pdf",
    ]);
  });
});

describe("ExcelReportExporter", () => {
  it("writes one sheet per view with a bold header row", async () => {
    const buffer = await new ExcelReportExporter().render(state());
    const bytes = new ArrayBuffer(buffer.byteLength);
    new Uint8Array(bytes).set(buffer);
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.load(bytes);

    expect(workbook.worksheets.map((sheet) => sheet.name)).toEqual([
      "Session_Progress",
      "Invoices",
      "Line_Items",
      "Groups",
      "Failed_Units",
    ]);

    const invoices = workbook.getWorksheet("Invoices");
    expect(invoices?.getRow(1).getCell(1).value).toBe("Group");
    expect(invoices?.getRow(1).getCell(1).font?.bold).toBe(true);
    expect(invoices?.rowCount).toBe(4);
    expect(invoices?.getRow(2).getCell(7).value).toBe(25);
    expect(invoices?.getRow(4).getCell(8).value).toBe("ERROR");

    const lineItems = workbook.getWorksheet("Line_Items");
    expect(lineItems?.rowCount).toBe(5);
    expect(lineItems?.getRow(3).getCell(11).value).toBe(10);

    const groups = workbook.getWorksheet("Groups");
    expect(groups?.getRow(2).getCell(9).value).toBe("COMPLIANT");
  });
});
