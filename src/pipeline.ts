import path from "node:path";
import {
  cacheConfig,
  closeConnections,
  outputConfig,
  pipelineConfig,
  sourceConfig,
} from "./config.js";
import { ConcurrencyController } from "./services/concurrencyController.js";
import { ContentCache } from "./services/contentCache.js";
import { ExtractionEngine } from "./services/extraction/extractionEngine.js";
import { PdfTextParser, type DocumentParser } from "./services/extraction/parsingService.js";
import {
  createDefaultStructurer,
  type InvoiceStructurer,
} from "./services/extraction/structuringService.js";
import { DEFAULT_THRESHOLDS } from "./services/reconciliation.js";
import { SheetsReferenceSource, type ReferenceValueSource } from "./services/referenceService.js";
import { RetryExecutor } from "./services/retryExecutor.js";
import { SessionStore } from "./services/sessionStore.js";
import {
  LocalDocumentSource,
  S3DocumentSource,
  type DocumentSource,
} from "./services/storageService.js";
import { BatchRunner, type BatchRunOptions, type BatchRunResult } from "./workers/batchRunner.js";
import { DocumentProcessor } from "./workers/documentProcessor.js";

export interface PipelineOverrides {
  source?: DocumentSource;
  parser?: DocumentParser;
  structurer?: InvoiceStructurer | null;
  reference?: ReferenceValueSource | null;
  retry?: RetryExecutor;
  cacheDir?: string;
  outputDir?: string;
  tempDir?: string;
}

export interface Pipeline {
  readonly outputDir: string;
  readonly cache: ContentCache;
  readonly processor: DocumentProcessor;
  readonly defaultRoot: string;
  // Each run owns its SessionStore; cache and limiters are shared.
  run(options: BatchRunOptions): Promise<BatchRunResult>;
  close(): Promise<void>;
}

/**
 * Wires the pipeline from configuration. Nothing here is a module-level
 * singleton: callers hold the returned instance and close it.
 */
export const createPipeline = (overrides: PipelineOverrides = {}): Pipeline => {
  const outputDir = overrides.outputDir ?? outputConfig.directory;
  const tempDir = overrides.tempDir ?? outputConfig.tempDirectory;

  const source =
    overrides.source ??
    (sourceConfig.kind === "s3" ? new S3DocumentSource() : new LocalDocumentSource());
  const defaultRoot = sourceConfig.kind === "s3" ? "" : sourceConfig.localRoot;

  const retry =
    overrides.retry ??
    new RetryExecutor({
      maxAttempts: pipelineConfig.retryAttempts,
      baseDelayMs: pipelineConfig.retryDelay,
    });

  const cache = new ContentCache({
    directory: overrides.cacheDir ?? cacheConfig.directory,
    maxEntries: cacheConfig.maxEntries,
    maxAgeDays: cacheConfig.maxAgeDays,
    includeFileMetadata: cacheConfig.includeFileMetadata,
  });

  const engine = new ExtractionEngine({
    parser: overrides.parser ?? new PdfTextParser(),
    structurer:
      overrides.structurer !== undefined
        ? overrides.structurer
        : createDefaultStructurer(pipelineConfig.structuringTimeout),
    retry,
    language: pipelineConfig.language,
    minContentLength: pipelineConfig.minContentLength,
    promptCharBudget: pipelineConfig.promptCharBudget,
    negativeValuePolicy: pipelineConfig.negativeValuePolicy,
    parseTimeoutMs: pipelineConfig.parseTimeout,
    structuringTimeoutMs: pipelineConfig.structuringTimeout,
  });

  const processor = new DocumentProcessor({
    source,
    cache,
    engine,
    retry,
    limiter: new ConcurrencyController({
      name: "documents",
      maxConcurrent: pipelineConfig.maxConcurrentDocuments,
      staggerMs: pipelineConfig.staggerMs,
    }),
    downloadLimiter: new ConcurrencyController({
      name: "downloads",
      maxConcurrent: pipelineConfig.maxConcurrentDocuments,
    }),
    tempDir: path.join(tempDir, "documents"),
    downloadTimeoutMs: pipelineConfig.downloadTimeout,
  });

  const groupLimiter = new ConcurrencyController({
    name: "groups",
    maxConcurrent: pipelineConfig.maxConcurrentGroups,
  });

  const reference =
    overrides.reference !== undefined ? overrides.reference : SheetsReferenceSource.fromConfig();
  if (!reference) {
    console.log(`ℹ️ [REFERENCE_DISABLED] groups will reconcile as MISSING_REFERENCE`);
  }

  const thresholds = {
    ...DEFAULT_THRESHOLDS,
    tolerancePercent: pipelineConfig.tolerancePercent,
  };

  return {
    outputDir,
    cache,
    processor,
    defaultRoot,
    async run(options) {
      const store = new SessionStore({ outputDir });
      const runner = new BatchRunner({
        source,
        processor,
        store,
        reference,
        groupLimiter,
        thresholds,
      });
      try {
        return await runner.run(options);
      } finally {
        await store.close();
      }
    },
    async close() {
      await cache.close();
      await closeConnections();
    },
  };
};
