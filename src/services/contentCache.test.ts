import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { invoice, makeTempDir, removeDir } from "../test/fakes.js";
import { ExtractionConfidence } from "../types/invoice.js";
import { ContentCache } from "./contentCache.js";

const DAY_MS = 24 * 60 * 60 * 1000;

describe("ContentCache", () => {
  let directory: string;
  let clock: number;

  const createCache = (maxEntries = 1000) =>
    new ContentCache({ directory, maxEntries, maxAgeDays: 30, now: () => clock });

  const exists = (filePath: string) =>
    fs.access(filePath).then(
      () => true,
      () => false
    );

  beforeEach(async () => {
    directory = await makeTempDir("content-cache-");
    clock = Date.parse("2024-03-01T00:00:00.000Z");
  });

  afterEach(async () => {
    await removeDir(directory);
  });

  it("fingerprints identical bytes identically", async () => {
    const cache = createCache();
    const first = path.join(directory, "first.pdf");
    const copy = path.join(directory, "copy.pdf");
    const other = path.join(directory, "other.pdf");
    await fs.writeFile(first, "same invoice bytes");
    await fs.writeFile(copy, "same invoice bytes");
    await fs.writeFile(other, "different invoice bytes");

    const fingerprint = await cache.fingerprint(first);
    expect(fingerprint).toMatch(/^[0-9a-f]{64}$/);
    expect(await cache.fingerprint(copy)).toBe(fingerprint);
    expect(await cache.fingerprint(other)).not.toBe(fingerprint);
  });

  it("returns a stored record marked as a cache hit", async () => {
    const cache = createCache();
    const stored = invoice();

    expect(await cache.store("fp-1", stored)).toBe(true);
    const hit = await cache.lookup("fp-1");

    expect(hit).toEqual({
      ...stored,
      cacheHit: true,
      notes: "CACHED: PRIMARY_EXTRACTION",
    });
    expect(cache.stats()).toMatchObject({ hits: 1, stores: 1, entries: 1 });
  });

  it("never caches ERROR records", async () => {
    const cache = createCache();
    const failed = invoice({ confidence: ExtractionConfidence.ERROR, lineItems: [] });

    expect(await cache.store("fp-error", failed)).toBe(false);
    expect(await cache.lookup("fp-error")).toBeNull();
    expect(await exists(path.join(directory, "fp-error.json"))).toBe(false);
  });

  it("removes entries older than the retention window", async () => {
    const cache = createCache();
    await cache.store("fp-old", invoice());

    clock += 31 * DAY_MS;
    expect(await cache.lookup("fp-old")).toBeNull();
    expect(await exists(path.join(directory, "fp-old.json"))).toBe(false);
    expect(cache.stats().expired).toBe(1);
  });

  it("treats a malformed entry as absent and deletes it", async () => {
    const cache = createCache();
    const entryPath = path.join(directory, "fp-bad.json");
    await fs.writeFile(entryPath, "{ not json");

    expect(await cache.lookup("fp-bad")).toBeNull();
    expect(await exists(entryPath)).toBe(false);
    expect(cache.stats().corrupted).toBe(1);
  });

  it("treats an entry with an unreadable timestamp as corrupted", async () => {
    const cache = createCache();
    await cache.store("fp-stamp", invoice());
    const entryPath = path.join(directory, "fp-stamp.json");
    const entry = JSON.parse(await fs.readFile(entryPath, "utf8"));
    await fs.writeFile(entryPath, JSON.stringify({ ...entry, cachedAt: "last tuesday" }));

    expect(await cache.lookup("fp-stamp")).toBeNull();
    expect(await exists(entryPath)).toBe(false);
    expect(cache.stats().corrupted).toBe(1);
  });

  it("evicts the oldest-accessed tenth once over capacity", async () => {
    const cache = createCache(10);
    for (let i = 0; i < 10; i++) {
      clock += 1;
      await cache.store(`fp-${i}`, invoice({ sourceIdentifier: `doc-${i}.pdf` }));
    }

    // fp-0 becomes the most recently accessed entry
    clock += 1;
    expect(await cache.lookup("fp-0")).not.toBeNull();

    clock += 1;
    await cache.store("fp-10", invoice({ sourceIdentifier: "doc-10.pdf" }));

    expect(await exists(path.join(directory, "fp-1.json"))).toBe(false);
    expect(await exists(path.join(directory, "fp-0.json"))).toBe(true);
    expect(await exists(path.join(directory, "fp-10.json"))).toBe(true);
    expect(cache.stats()).toMatchObject({ entries: 10, evictions: 1 });
  });

  it("keeps the access index across instances", async () => {
    await createCache().store("fp-1", invoice());

    const reopened = createCache();
    expect((await reopened.lookup("fp-1"))?.cacheHit).toBe(true);
    const index = JSON.parse(await fs.readFile(path.join(directory, "cache_index.json"), "utf8"));
    expect(Object.keys(index)).toEqual(["fp-1"]);
  });
});
