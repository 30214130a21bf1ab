import type { NegativeValuePolicy } from "../../config.js";
import { PermanentExtractionFailure, errorMessage } from "../../errors.js";
import { ExtractionStage } from "../../types/document.js";
import {
  ExtractionConfidence,
  createErrorInvoice,
  createExtractedInvoice,
  type ExtractedInvoice,
  type ExtractionMethod,
  type LineItem,
  type StructuredInvoice,
} from "../../types/invoice.js";
import { err, ok, type Result } from "../../utils/result.js";
import type { RetryExecutor } from "../retryExecutor.js";
import { evaluateSignals, scoreConfidence } from "./confidence.js";
import {
  extractHeaderFields,
  hasAnyMatch,
  matchFieldLists,
  rowToRawLineItem,
  zipFieldMatches,
  type HeaderFields,
} from "./fieldPatterns.js";
import { scanForLineItems } from "./heuristicScan.js";
import { normalizeLineItems, type RawLineItem } from "./lineItem.js";
import type { DocumentParser } from "./parsingService.js";
import { buildPrompt, type InvoiceStructurer } from "./structuringService.js";

export interface ExtractionEngineOptions {
  parser: DocumentParser;
  // null: no primary strategy configured, every document takes the fallback
  structurer: InvoiceStructurer | null;
  retry: RetryExecutor;
  language: string;
  minContentLength: number;
  promptCharBudget: number;
  negativeValuePolicy: NegativeValuePolicy;
  parseTimeoutMs: number;
  structuringTimeoutMs: number;
  now?: () => number;
}

export interface ExtractionContext {
  sourceIdentifier: string;
  parentId?: string;
  signal?: AbortSignal;
  onStage?: (stage: ExtractionStage) => void;
}

interface StructuredOutcome {
  header: HeaderFields;
  items: LineItem[];
  confidence: ExtractionConfidence;
  method: ExtractionMethod;
  notes: string[];
}

/**
 * Turns one document into an ExtractedInvoice:
 * PARSING -> STRUCTURING_PRIMARY -> (STRUCTURING_FALLBACK) -> DONE.
 * Never throws for a bad document; unrecoverable failures come back as an
 * ERROR record. Only cancellation propagates.
 */
export class ExtractionEngine {
  private readonly now: () => number;

  constructor(private readonly options: ExtractionEngineOptions) {
    this.now = options.now ?? Date.now;
  }

  async extract(filePath: string, context: ExtractionContext): Promise<ExtractedInvoice> {
    const startTime = this.now();
    const { sourceIdentifier, signal } = context;
    const parentNote = context.parentId ? [`parent=${context.parentId}`] : [];

    try {
      context.onStage?.(ExtractionStage.PARSING);
      const text = await this.parse(filePath, context);

      context.onStage?.(ExtractionStage.STRUCTURING_PRIMARY);
      const primary = await this.structurePrimary(text, context);

      let outcome: StructuredOutcome;
      if (primary.ok) {
        outcome = primary.value;
      } else {
        console.warn(
          `⚠️ [EXTRACT_PRIMARY_FAILED] source=${sourceIdentifier} reason=${primary.error}, falling back to patterns`
        );
        context.onStage?.(ExtractionStage.STRUCTURING_FALLBACK);
        const fallback = this.structureFallback(text);
        if (!fallback.ok) {
          throw new PermanentExtractionFailure(
            `No line items found (primary: ${primary.error}; fallback: ${fallback.error})`
          );
        }
        outcome = {
          ...fallback.value,
          notes: [...fallback.value.notes, `primary_failed=${primary.error}`],
        };
      }

      context.onStage?.(ExtractionStage.DONE);
      const invoice = createExtractedInvoice({
        ...outcome.header,
        lineItems: outcome.items,
        confidence: outcome.confidence,
        method: outcome.method,
        notes: [...outcome.notes, ...parentNote].join(" | "),
        sourceIdentifier,
        processingDurationMs: this.now() - startTime,
      });

      console.log(
        `✅ [EXTRACT_DONE] source=${sourceIdentifier} method=${invoice.method} confidence=${invoice.confidence} items=${invoice.totalLineItems} total=${invoice.declaredTotal}`
      );
      return invoice;
    } catch (error) {
      if (signal?.aborted) throw error;

      context.onStage?.(ExtractionStage.DONE);
      console.error(
        `❌ [EXTRACT_FAILED] source=${sourceIdentifier} error=${errorMessage(error)}`
      );
      const message = [errorMessage(error), ...(context.parentId ? [context.parentId] : [])].join(
        " | "
      );
      return createErrorInvoice(sourceIdentifier, message, this.now() - startTime);
    }
  }

  private async parse(filePath: string, context: ExtractionContext): Promise<string> {
    const pages = await this.options.retry.run(
      (signal) =>
        this.options.parser.parse(filePath, { language: this.options.language }, signal),
      {
        timeoutMs: this.options.parseTimeoutMs,
        label: `parse:${context.sourceIdentifier}`,
        signal: context.signal,
      }
    );

    const text = pages.join("\n\n").trim();
    if (text.length < this.options.minContentLength) {
      throw new PermanentExtractionFailure(
        `Document has too little text (${text.length} chars, need ${this.options.minContentLength})`
      );
    }
    return text;
  }

  private async structurePrimary(
    text: string,
    context: ExtractionContext
  ): Promise<Result<StructuredOutcome>> {
    const structurer = this.options.structurer;
    if (!structurer) {
      return err("no primary structurer configured");
    }

    const { prompt, truncated } = buildPrompt(text, this.options.promptCharBudget);

    let structured: StructuredInvoice;
    try {
      structured = await this.options.retry.run(
        (signal) => structurer.structure(prompt, signal),
        {
          timeoutMs: this.options.structuringTimeoutMs,
          label: `structure:${context.sourceIdentifier}`,
          signal: context.signal,
        }
      );
    } catch (error) {
      if (context.signal?.aborted) throw error;
      return err(errorMessage(error));
    }

    if (structured.lineItems.length === 0) {
      return err("primary returned no line items");
    }

    const raws: RawLineItem[] = structured.lineItems.map((item, index) => ({
      ...item,
      lineNumber: index + 1,
    }));
    const { items, rejected } = normalizeLineItems(raws, this.options.negativeValuePolicy);
    if (items.length === 0) {
      return err(`all primary line items rejected (${rejected.join("; ")})`);
    }

    const fromPatterns = extractHeaderFields(text);
    const notes = [`PRIMARY_EXTRACTION`, `model=${structurer.name}`];
    if (truncated) notes.push(`truncated_to=${this.options.promptCharBudget}`);
    if (rejected.length > 0) notes.push(`rejected=${rejected.join("; ")}`);

    return ok({
      header: {
        supplier: structured.supplier.trim() || fromPatterns.supplier,
        invoiceNumber: structured.invoiceNumber.trim() || fromPatterns.invoiceNumber,
        date: structured.date.trim() || fromPatterns.date,
      },
      items,
      confidence: ExtractionConfidence.HIGH,
      method: "primary",
      notes,
    });
  }

  // Labelled field patterns first; the heuristic scan only when no label matched.
  structureFallback(text: string): Result<StructuredOutcome> {
    const lists = matchFieldLists(text);
    let raws: RawLineItem[];
    let method: ExtractionMethod;
    const notes: string[] = [];

    if (hasAnyMatch(lists)) {
      const rows = zipFieldMatches(lists);
      raws = rows.map((row, index) => rowToRawLineItem(row, index + 1));
      method = "fallback";
      const padded = rows.reduce((count, row) => count + row.padded.length, 0);
      notes.push("REGEX_EXTRACTION", `rows=${rows.length}`, `padded_fields=${padded}`);
    } else {
      raws = scanForLineItems(text);
      method = "heuristic";
      notes.push("HEURISTIC_EXTRACTION", `rows=${raws.length}`);
    }

    const { items, rejected } = normalizeLineItems(raws, this.options.negativeValuePolicy);
    if (rejected.length > 0) notes.push(`rejected=${rejected.join("; ")}`);
    if (items.length === 0) {
      return err(
        method === "heuristic" ? "no labelled fields or identifiers found" : "all matched rows rejected"
      );
    }

    return ok({
      header: extractHeaderFields(text),
      items,
      confidence: scoreConfidence(evaluateSignals(items)),
      method,
      notes,
    });
  }
}
