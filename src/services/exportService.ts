import path from "node:path";
import ExcelJS from "exceljs";
import {
  ExtractionConfidence,
  isCountable,
  type ExtractionMethod,
} from "../types/invoice.js";
import { ComplianceStatus, type SessionState, type SessionStatus } from "../types/session.js";
import { amountToNumber, sumAmounts, type Amount } from "../utils/money.js";

export interface SessionExporter {
  readonly name: string;
  targetPath(outputDir: string, sessionId: string): string;
  render(state: SessionState): Promise<string | Buffer>;
}

export interface SessionSummary {
  sessionId: string;
  status: SessionStatus;
  rootHandle: string;
  startTime: string;
  lastUpdated: string;
  endTime: string | null;
  totalUnits: number;
  completedUnits: number;
  failedUnits: number;
  pendingUnits: number;
  totalRecords: number;
  totalLineItems: number;
  successfulExtractions: number;
  failedExtractions: number;
  successRate: number;
  cacheHits: number;
  extractedTotal: Amount;
  processingTimeMs: number;
  confidenceDistribution: Record<ExtractionConfidence, number>;
  methodDistribution: Record<ExtractionMethod, number>;
  complianceDistribution: Record<ComplianceStatus, number>;
}

export const buildSessionSummary = (state: SessionState): SessionSummary => {
  const confidenceDistribution: Record<ExtractionConfidence, number> = {
    [ExtractionConfidence.HIGH]: 0,
    [ExtractionConfidence.MEDIUM]: 0,
    [ExtractionConfidence.LOW]: 0,
    [ExtractionConfidence.ERROR]: 0,
  };
  const methodDistribution: Record<ExtractionMethod, number> = {
    primary: 0,
    fallback: 0,
    heuristic: 0,
    none: 0,
  };
  const complianceDistribution: Record<ComplianceStatus, number> = {
    [ComplianceStatus.COMPLIANT]: 0,
    [ComplianceStatus.NON_COMPLIANT]: 0,
    [ComplianceStatus.MISSING_REFERENCE]: 0,
  };

  for (const { invoice } of state.records) {
    confidenceDistribution[invoice.confidence]++;
    methodDistribution[invoice.method]++;
  }
  for (const unit of state.completedUnits) {
    if (unit.reconciliation) complianceDistribution[unit.reconciliation.status]++;
  }

  const settled = new Set([
    ...state.completedUnits.map((unit) => unit.unitId),
    ...state.failedUnits.map((unit) => unit.unitId),
  ]);
  const { totalRecords, successfulExtractions } = state.metadata;

  return {
    sessionId: state.sessionId,
    status: state.status,
    rootHandle: state.rootHandle,
    startTime: state.startTime,
    lastUpdated: state.lastUpdated,
    endTime: state.endTime,
    totalUnits: state.unitIds.length,
    completedUnits: state.completedUnits.length,
    failedUnits: state.failedUnits.length,
    pendingUnits: state.unitIds.filter((id) => !settled.has(id)).length,
    totalRecords,
    totalLineItems: state.metadata.totalLineItems,
    successfulExtractions,
    failedExtractions: state.metadata.failedExtractions,
    successRate:
      totalRecords === 0
        ? 0
        : Math.round((successfulExtractions / totalRecords) * 10000) / 100,
    cacheHits: state.records.filter(({ invoice }) => invoice.cacheHit).length,
    extractedTotal: sumAmounts(
      state.records
        .filter(({ invoice }) => isCountable(invoice))
        .map(({ invoice }) => invoice.declaredTotal)
    ),
    processingTimeMs: state.metadata.processingTimeMs,
    confidenceDistribution,
    methodDistribution,
    complianceDistribution,
  };
};

export class JsonResultsExporter implements SessionExporter {
  readonly name = "json";

  targetPath(outputDir: string, sessionId: string): string {
    return path.join(outputDir, "json", `extraction_${sessionId}.json`);
  }

  async render(state: SessionState): Promise<string> {
    return JSON.stringify(
      {
        summary: buildSessionSummary(state),
        groups: state.completedUnits,
        failedUnits: state.failedUnits,
        records: state.records,
      },
      null,
      2
    );
  }
}

const INVOICE_HEADERS = [
  "Group",
  "Document",
  "Supplier",
  "Invoice Number",
  "Date",
  "Line Items",
  "Total",
  "Confidence",
  "Method",
  "Cached",
  "Duration (ms)",
  "Notes",
];

const LINE_ITEM_HEADERS = [
  "Group",
  "Document",
  "Invoice Number",
  "Line",
  "Reference Code",
  "Description",
  "Quantity",
  "Unit",
  "Tariff Code",
  "Unit Value",
  "Line Total",
  "Confidence",
];

const GROUP_HEADERS = [
  "Group",
  "Completed At",
  "Documents",
  "Line Items",
  "Extracted Total",
  "Reference Total",
  "Difference",
  "Difference %",
  "Status",
  "Risk",
  "Duration (ms)",
];

const addSheet = (
  workbook: ExcelJS.Workbook,
  name: string,
  headers: string[],
  rows: Array<Array<string | number | boolean | null>>
): void => {
  const sheet = workbook.addWorksheet(name);
  sheet.addRow(headers);
  sheet.getRow(1).font = { bold: true };
  for (const row of rows) {
    sheet.addRow(row);
  }
  sheet.columns.forEach((column, index) => {
    const header = headers[index] ?? "";
    column.width = Math.min(55, Math.max(14, header.length + 4));
  });
};

// Workbook with one sheet per view; ERROR records stay visible, with their confidence.
export class ExcelReportExporter implements SessionExporter {
  readonly name = "excel";

  targetPath(outputDir: string, sessionId: string): string {
    return path.join(outputDir, "excel", `extraction_${sessionId}.xlsx`);
  }

  async render(state: SessionState): Promise<Buffer> {
    const workbook = new ExcelJS.Workbook();
    const summary = buildSessionSummary(state);

    addSheet(
      workbook,
      "Session_Progress",
      ["Metric", "Value"],
      [
        ["Session ID", summary.sessionId],
        ["Status", summary.status],
        ["Root", summary.rootHandle],
        ["Start Time", summary.startTime],
        ["Last Updated", summary.lastUpdated],
        ["End Time", summary.endTime ?? ""],
        ["Total Groups", summary.totalUnits],
        ["Completed Groups", summary.completedUnits],
        ["Failed Groups", summary.failedUnits],
        ["Pending Groups", summary.pendingUnits],
        ["Documents", summary.totalRecords],
        ["Line Items", summary.totalLineItems],
        ["Success Rate %", summary.successRate],
        ["Cache Hits", summary.cacheHits],
        ["Extracted Total", amountToNumber(summary.extractedTotal)],
      ]
    );

    addSheet(
      workbook,
      "Invoices",
      INVOICE_HEADERS,
      state.records.map(({ unitId, documentHandle, invoice }) => [
        unitId,
        documentHandle,
        invoice.supplier,
        invoice.invoiceNumber,
        invoice.date,
        invoice.totalLineItems,
        amountToNumber(invoice.declaredTotal),
        invoice.confidence,
        invoice.method,
        invoice.cacheHit,
        invoice.processingDurationMs,
        invoice.notes,
      ])
    );

    addSheet(
      workbook,
      "Line_Items",
      LINE_ITEM_HEADERS,
      state.records.flatMap(({ unitId, documentHandle, invoice }) =>
        invoice.lineItems.map((item) => [
          unitId,
          documentHandle,
          invoice.invoiceNumber,
          item.lineNumber,
          item.referenceCode,
          item.description,
          item.quantity,
          item.unit,
          item.tariffCode,
          item.unitValue,
          amountToNumber(item.lineTotal),
          invoice.confidence,
        ])
      )
    );

    addSheet(
      workbook,
      "Groups",
      GROUP_HEADERS,
      state.completedUnits.map((unit) => [
        unit.unitId,
        unit.completionTime,
        unit.itemCount,
        unit.lineItemCount,
        amountToNumber(unit.extractedTotal),
        unit.reconciliation?.referenceTotal
          ? amountToNumber(unit.reconciliation.referenceTotal)
          : null,
        unit.reconciliation?.difference
          ? amountToNumber(unit.reconciliation.difference)
          : null,
        unit.reconciliation?.percentageDifference ?? null,
        unit.reconciliation?.status ?? "",
        unit.reconciliation?.riskLevel ?? "",
        unit.durationMs,
      ])
    );

    addSheet(
      workbook,
      "Failed_Units",
      ["Group", "Error", "Time"],
      state.failedUnits.map((unit) => [unit.unitId, unit.error, unit.time])
    );

    return Buffer.from(await workbook.xlsx.writeBuffer());
  }
}

export const defaultExporters = (): SessionExporter[] => [
  new JsonResultsExporter(),
  new ExcelReportExporter(),
];

