import { createHash } from "node:crypto";
import { createReadStream, promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { CacheCorruption, errorMessage } from "../errors.js";
import {
  ExtractedInvoiceSchema,
  ExtractionConfidence,
  createExtractedInvoice,
  type ExtractedInvoice,
} from "../types/invoice.js";
import { SerialQueue } from "../utils/serialQueue.js";
import { writeFileAtomic } from "../utils/atomicWrite.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const CHUNK_SIZE = 64 * 1024;
const INDEX_FILE = "cache_index.json";
export const CACHED_NOTE_PREFIX = "CACHED: ";

const CacheEntrySchema = ExtractedInvoiceSchema.extend({
  cachedAt: z.string().datetime(),
  source: z.string(),
});
type CacheEntry = z.infer<typeof CacheEntrySchema>;

const IndexEntrySchema = z.object({
  cachedAt: z.number(),
  lastAccessed: z.number(),
  sequence: z.number(),
});
const CacheIndexSchema = z.record(IndexEntrySchema);
type CacheIndex = z.infer<typeof CacheIndexSchema>;

export interface ContentCacheOptions {
  directory: string;
  maxEntries: number;
  maxAgeDays: number;
  includeFileMetadata?: boolean;
  now?: () => number;
}

export interface CacheStats {
  entries: number;
  hits: number;
  misses: number;
  stores: number;
  evictions: number;
  expired: number;
  corrupted: number;
}

/**
 * Maps a content fingerprint to the invoice previously extracted from that
 * content. One JSON file per fingerprint plus an access-time index used for
 * LRU eviction. All index and entry mutations go through a single queue.
 */
export class ContentCache {
  private readonly queue = new SerialQueue();
  private readonly now: () => number;
  private readonly maxAgeMs: number;
  private index: CacheIndex | null = null;
  private sequence = 0;
  private readonly counters = {
    hits: 0,
    misses: 0,
    stores: 0,
    evictions: 0,
    expired: 0,
    corrupted: 0,
  };

  constructor(private readonly options: ContentCacheOptions) {
    this.now = options.now ?? Date.now;
    this.maxAgeMs = options.maxAgeDays * DAY_MS;
  }

  async fingerprint(filePath: string): Promise<string> {
    const hash = createHash("sha256");
    for await (const chunk of createReadStream(filePath, {
      highWaterMark: CHUNK_SIZE,
    })) {
      hash.update(chunk);
    }

    if (this.options.includeFileMetadata) {
      const stats = await fs.stat(filePath);
      hash.update(`|${stats.size}|${stats.mtimeMs}`);
    }

    return hash.digest("hex");
  }

  lookup(fingerprint: string): Promise<ExtractedInvoice | null> {
    return this.queue.run(async () => {
      const index = await this.loadIndex();
      let entry: CacheEntry | null;

      try {
        entry = await this.readEntry(fingerprint);
      } catch (error) {
        if (!(error instanceof CacheCorruption)) throw error;
        console.warn(
          `⚠️ [CACHE_CORRUPTED] fingerprint=${short(fingerprint)} error=${error.message}`
        );
        this.counters.corrupted++;
        await this.removeEntry(index, fingerprint);
        await this.saveIndex(index);
        this.counters.misses++;
        return null;
      }

      if (!entry) {
        if (index[fingerprint]) {
          delete index[fingerprint];
          await this.saveIndex(index);
        }
        this.counters.misses++;
        return null;
      }

      const cachedAt = Date.parse(entry.cachedAt);
      if (this.now() - cachedAt > this.maxAgeMs) {
        console.log(
          `⌛ [CACHE_EXPIRED] fingerprint=${short(fingerprint)} cached_at=${entry.cachedAt}`
        );
        this.counters.expired++;
        await this.removeEntry(index, fingerprint);
        await this.saveIndex(index);
        this.counters.misses++;
        return null;
      }

      index[fingerprint] = {
        cachedAt,
        lastAccessed: this.now(),
        sequence: this.nextSequence(),
      };
      await this.saveIndex(index);
      this.counters.hits++;

      console.log(
        `✅ [CACHE_HIT] fingerprint=${short(fingerprint)} source=${entry.source}`
      );

      const { cachedAt: _cachedAt, source: _source, ...invoice } = entry;
      return createExtractedInvoice({
        ...invoice,
        notes: `${CACHED_NOTE_PREFIX}${invoice.notes}`,
        cacheHit: true,
      });
    });
  }

  // Returns false when nothing was stored (ERROR records are never cached).
  store(fingerprint: string, invoice: ExtractedInvoice): Promise<boolean> {
    if (invoice.confidence === ExtractionConfidence.ERROR) {
      return Promise.resolve(false);
    }

    return this.queue.run(async () => {
      const index = await this.loadIndex();
      const timestamp = this.now();
      const entry: CacheEntry = {
        ...invoice,
        cacheHit: false,
        cachedAt: new Date(timestamp).toISOString(),
        source: invoice.sourceIdentifier,
      };

      await fs.mkdir(this.options.directory, { recursive: true });
      await writeFileAtomic(this.entryPath(fingerprint), JSON.stringify(entry, null, 2));

      index[fingerprint] = {
        cachedAt: timestamp,
        lastAccessed: timestamp,
        sequence: this.nextSequence(),
      };
      this.counters.stores++;
      await this.evictIfNeeded(index);
      await this.saveIndex(index);

      console.log(
        `💾 [CACHE_STORE] fingerprint=${short(fingerprint)} source=${invoice.sourceIdentifier} items=${invoice.totalLineItems}`
      );
      return true;
    });
  }

  stats(): CacheStats {
    return {
      entries: this.index ? Object.keys(this.index).length : 0,
      ...this.counters,
    };
  }

  async close(): Promise<void> {
    await this.queue.drain();
  }

  // Drops the oldest-accessed 10% (at least one) once over the ceiling.
  private async evictIfNeeded(index: CacheIndex): Promise<void> {
    const fingerprints = Object.keys(index);
    if (fingerprints.length <= this.options.maxEntries) return;

    const toRemove = Math.max(1, Math.floor(fingerprints.length / 10));
    const oldest = fingerprints
      .sort((a, b) => {
        const left = index[a];
        const right = index[b];
        return (
          left.lastAccessed - right.lastAccessed || left.sequence - right.sequence
        );
      })
      .slice(0, toRemove);

    for (const fingerprint of oldest) {
      await this.removeEntry(index, fingerprint);
      this.counters.evictions++;
    }

    console.log(
      `🧹 [CACHE_EVICT] removed=${oldest.length} remaining=${Object.keys(index).length}`
    );
  }

  private async readEntry(fingerprint: string): Promise<CacheEntry | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.entryPath(fingerprint), "utf8");
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new CacheCorruption(fingerprint, "Entry is not valid JSON", {
        cause: error,
      });
    }

    const result = CacheEntrySchema.safeParse(parsed);
    if (!result.success) {
      throw new CacheCorruption(
        fingerprint,
        `Entry does not match schema: ${result.error.issues[0]?.message ?? "unknown"}`
      );
    }
    return result.data;
  }

  private async removeEntry(index: CacheIndex, fingerprint: string): Promise<void> {
    delete index[fingerprint];
    await fs.rm(this.entryPath(fingerprint), { force: true });
  }

  private async loadIndex(): Promise<CacheIndex> {
    if (this.index) return this.index;

    try {
      const raw = await fs.readFile(this.indexPath(), "utf8");
      const result = CacheIndexSchema.safeParse(JSON.parse(raw));
      if (result.success) {
        this.index = result.data;
      } else {
        console.warn(`⚠️ [CACHE_INDEX_INVALID] path=${this.indexPath()}`);
        this.index = {};
      }
    } catch (error) {
      if (!isNotFound(error)) {
        console.warn(
          `⚠️ [CACHE_INDEX_UNREADABLE] path=${this.indexPath()} error=${errorMessage(error)}`
        );
      }
      this.index = {};
    }

    this.sequence = Object.values(this.index).reduce(
      (max, entry) => Math.max(max, entry.sequence),
      0
    );
    return this.index;
  }

  private async saveIndex(index: CacheIndex): Promise<void> {
    await fs.mkdir(this.options.directory, { recursive: true });
    await writeFileAtomic(this.indexPath(), JSON.stringify(index, null, 2));
  }

  private nextSequence(): number {
    this.sequence += 1;
    return this.sequence;
  }

  private entryPath(fingerprint: string): string {
    return path.join(this.options.directory, `${fingerprint}.json`);
  }

  private indexPath(): string {
    return path.join(this.options.directory, INDEX_FILE);
  }
}

const short = (fingerprint: string): string => fingerprint.slice(0, 12);

const isNotFound = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";
