import { promises as fs } from "node:fs";
import path from "node:path";
import { v4 as uuidv4 } from "uuid";
import { errorMessage } from "../errors.js";
import { CACHED_NOTE_PREFIX, type ContentCache } from "../services/contentCache.js";
import type { ConcurrencyController } from "../services/concurrencyController.js";
import type { ExtractionEngine } from "../services/extraction/extractionEngine.js";
import type { RetryExecutor } from "../services/retryExecutor.js";
import type { DocumentSource } from "../services/storageService.js";
import type { WorkUnit } from "../types/document.js";
import {
  ExtractionConfidence,
  createErrorInvoice,
  type ExtractedInvoice,
} from "../types/invoice.js";

export interface DocumentProcessorOptions {
  source: DocumentSource;
  cache: ContentCache;
  engine: ExtractionEngine;
  retry: RetryExecutor;
  // Bounds extraction (parse + structure). Cache hits never take a permit.
  limiter: ConcurrencyController;
  // Bounds downloads separately, when set
  downloadLimiter?: ConcurrencyController;
  tempDir: string;
  downloadTimeoutMs: number;
}

export interface ProcessorStats {
  processed: number;
  cacheHits: number;
  primary: number;
  fallback: number;
  errors: number;
  cacheStoreFailures: number;
}

const safeName = (name: string): string =>
  name.replace(/\s+/g, "-").replace(/[^a-zA-Z0-9._-]/g, "").slice(-80) || "document.pdf";

/**
 * Processes one work unit: download, fingerprint, cache lookup, extraction
 * under a permit, cache store. Always resolves with a record (ERROR on
 * failure) unless the run is aborted.
 */
export class DocumentProcessor {
  private readonly counters: ProcessorStats = {
    processed: 0,
    cacheHits: 0,
    primary: 0,
    fallback: 0,
    errors: 0,
    cacheStoreFailures: 0,
  };
  // Extractions in flight, by content fingerprint
  private readonly inFlight = new Map<string, Promise<ExtractedInvoice>>();

  constructor(private readonly options: DocumentProcessorOptions) {}

  async process(unit: WorkUnit, signal?: AbortSignal): Promise<ExtractedInvoice> {
    const { parentId, documentHandle, displayName } = unit;
    const startTime = Date.now();
    const localPath = path.join(this.options.tempDir, `${uuidv4()}-${safeName(displayName)}`);

    try {
      console.log(`🔄 [WORKER_START] parent=${parentId} document=${documentHandle}`);

      await this.download(documentHandle, localPath, signal);

      const fingerprint = await this.options.cache.fingerprint(localPath);
      const cached = await this.options.cache.lookup(fingerprint);
      if (cached) {
        this.record(cached, true);
        return cached;
      }

      const pending = this.inFlight.get(fingerprint);
      if (pending) {
        console.log(
          `♻️ [WORKER_SHARED] parent=${parentId} document=${documentHandle} fingerprint=${fingerprint.slice(0, 12)}`
        );
        return this.share(await pending, documentHandle);
      }

      const extraction = this.extractAndStore(unit, localPath, fingerprint, signal);
      this.inFlight.set(fingerprint, extraction);
      let invoice: ExtractedInvoice;
      try {
        invoice = await extraction;
      } finally {
        this.inFlight.delete(fingerprint);
      }

      this.record(invoice, false);
      return invoice;
    } catch (error) {
      if (signal?.aborted) throw error;

      const duration = Date.now() - startTime;
      console.error(
        `❌ [WORKER_ERROR] parent=${parentId} document=${documentHandle} duration=${duration}ms error=${errorMessage(error)}`
      );
      const invoice = createErrorInvoice(
        documentHandle,
        `${errorMessage(error)} | ${parentId}`,
        duration
      );
      this.record(invoice, false);
      return invoice;
    } finally {
      await fs.rm(localPath, { force: true }).catch((error: unknown) => {
        console.warn(`⚠️ [WORKER_CLEANUP_FAILED] path=${localPath} error=${errorMessage(error)}`);
      });
    }
  }

  private async extractAndStore(
    unit: WorkUnit,
    localPath: string,
    fingerprint: string,
    signal?: AbortSignal
  ): Promise<ExtractedInvoice> {
    const { parentId, documentHandle } = unit;
    console.log(
      `🔍 [WORKER_EXTRACT] parent=${parentId} document=${documentHandle} ${this.options.limiter.describe()}`
    );
    const invoice = await this.options.limiter.run(
      () =>
        this.options.engine.extract(localPath, {
          sourceIdentifier: documentHandle,
          parentId,
          signal,
        }),
      signal
    );

    try {
      await this.options.cache.store(fingerprint, invoice);
    } catch (error) {
      this.counters.cacheStoreFailures++;
      console.warn(
        `⚠️ [CACHE_STORE_FAILED] document=${documentHandle} error=${errorMessage(error)}`
      );
    }
    return invoice;
  }

  // A duplicate of a document already being extracted reuses that result the
  // way a cache hit would. ERROR records are not cached, so they stay errors.
  private share(invoice: ExtractedInvoice, documentHandle: string): ExtractedInvoice {
    if (invoice.confidence === ExtractionConfidence.ERROR) {
      const failed = { ...invoice, sourceIdentifier: documentHandle };
      this.record(failed, false);
      return failed;
    }

    const shared = {
      ...invoice,
      notes: `${CACHED_NOTE_PREFIX}${invoice.notes}`,
      cacheHit: true,
    };
    this.record(shared, true);
    return shared;
  }

  stats(): ProcessorStats {
    return { ...this.counters };
  }

  private async download(handle: string, localPath: string, signal?: AbortSignal): Promise<void> {
    await fs.mkdir(this.options.tempDir, { recursive: true });
    const fetchFile = () =>
      this.options.retry.run(
        (attemptSignal) => this.options.source.download(handle, localPath, attemptSignal),
        {
          timeoutMs: this.options.downloadTimeoutMs,
          label: `download:${handle}`,
          signal,
        }
      );

    if (this.options.downloadLimiter) {
      await this.options.downloadLimiter.run(fetchFile, signal);
    } else {
      await fetchFile();
    }
  }

  private record(invoice: ExtractedInvoice, cacheHit: boolean): void {
    this.counters.processed++;
    if (cacheHit) {
      this.counters.cacheHits++;
    } else if (invoice.confidence === ExtractionConfidence.ERROR) {
      this.counters.errors++;
    } else if (invoice.method === "primary") {
      this.counters.primary++;
    } else {
      this.counters.fallback++;
    }
  }
}
