// Quad cache: every tile record discovered so far, keyed by collection id
// Reloaded at start so an interrupted run skips listing work it already did

import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import type { BBox } from "../bbox.js";
import { silentLogger } from "../log.js";
import type { Logger } from "../log.js";
import { CacheIOError, describeError } from "./errors.js";

// ---------- Types ----------

export interface TileRecord {
  collectionId: string;
  tileId: string;
  bbox: BBox;
  /** percent_covered as reported by the catalog (0-100) */
  coverage: number;
  downloadUrl: string;
}

export type CacheStore = Map<string, TileRecord[]>;

const cachedRecordSchema = z.object({
  mosaic_id: z.string(),
  quad_id: z.string(),
  bbox: z.tuple([z.number(), z.number(), z.number(), z.number()]),
  percent_covered: z.number(),
  download_url: z.string(),
});

const cacheFileSchema = z.record(z.string(), z.array(cachedRecordSchema));

type CachedRecord = z.infer<typeof cachedRecordSchema>;

// ---------- Pure functions ----------

export function recordKey(record: Pick<TileRecord, "collectionId" | "tileId">): string {
  return `${record.collectionId}/${record.tileId}`;
}

function toCached(record: TileRecord): CachedRecord {
  return {
    mosaic_id: record.collectionId,
    quad_id: record.tileId,
    bbox: record.bbox,
    percent_covered: record.coverage,
    download_url: record.downloadUrl,
  };
}

function fromCached(cached: CachedRecord): TileRecord {
  return {
    collectionId: cached.mosaic_id,
    tileId: cached.quad_id,
    bbox: cached.bbox,
    coverage: cached.percent_covered,
    downloadUrl: cached.download_url,
  };
}

export function serializeStore(store: CacheStore): string {
  const out: Record<string, CachedRecord[]> = {};
  for (const [collectionId, records] of store) {
    out[collectionId] = records.map(toCached);
  }
  return JSON.stringify(out, null, 2);
}

/** Parse cache file contents; throws on malformed JSON or records. */
export function parseStore(text: string): CacheStore {
  const parsed = cacheFileSchema.parse(JSON.parse(text));
  const store: CacheStore = new Map();
  for (const [collectionId, records] of Object.entries(parsed)) {
    store.set(collectionId, records.map(fromCached));
  }
  return store;
}

/** Keep the first record for each key; later repeats are dropped. */
export function dropRepeatedKeys(records: readonly TileRecord[]): { kept: TileRecord[]; dropped: number } {
  const seen = new Set<string>();
  const kept: TileRecord[] = [];
  for (const record of records) {
    const key = recordKey(record);
    if (seen.has(key)) continue;
    seen.add(key);
    kept.push(record);
  }
  return { kept, dropped: records.length - kept.length };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

// ---------- File-backed cache ----------

export class TileCache {
  private store: CacheStore = new Map();
  private pending: Promise<void> = Promise.resolve();

  constructor(
    readonly filePath: string,
    private readonly log: Logger = silentLogger,
  ) {}

  /**
   * Read the cache file. A missing file is an empty cache; so is an
   * unparseable one, after a warning. Repeated quads within an entry are
   * dropped, keeping the first. A path that cannot be read at all
   * (a directory, no permission) throws CacheIOError.
   */
  async load(): Promise<CacheStore> {
    let text: string;
    try {
      text = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) {
        this.store = new Map();
        return this.store;
      }
      throw new CacheIOError(`Cannot read cache ${this.filePath}: ${describeError(err)}`, this.filePath);
    }

    let store: CacheStore;
    try {
      store = parseStore(text);
    } catch (err) {
      this.log.warn(
        `Cache ${this.filePath} is corrupt (${describeError(err)}); starting with an empty cache, it will be overwritten on the next flush`,
      );
      this.store = new Map();
      return this.store;
    }

    for (const [collectionId, records] of store) {
      const { kept, dropped } = dropRepeatedKeys(records);
      if (dropped === 0) continue;
      this.log.warn(`Cache entry ${collectionId} repeats ${dropped} quad(s); keeping the first of each`);
      store.set(collectionId, kept);
    }
    this.store = store;
    return this.store;
  }

  get(collectionId: string): TileRecord[] {
    return [...(this.store.get(collectionId) ?? [])];
  }

  put(collectionId: string, records: readonly TileRecord[]): void {
    this.store.set(collectionId, [...records]);
  }

  collections(): string[] {
    return [...this.store.keys()];
  }

  /**
   * Persist the whole store: write `<path>.tmp`, then rename over the cache
   * file. Calls are queued so only one write is ever in flight.
   */
  flush(): Promise<void> {
    const snapshot = serializeStore(this.store);
    const next = this.pending.then(() => this.write(snapshot));
    // A failed flush must not block the ones queued behind it
    this.pending = next.catch(() => undefined);
    return next;
  }

  private async write(contents: string): Promise<void> {
    const tmpPath = this.filePath + ".tmp";
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tmpPath, contents);
      await rename(tmpPath, this.filePath);
    } catch (err) {
      throw new CacheIOError(`Cannot write cache ${this.filePath}: ${describeError(err)}`, this.filePath);
    }
  }
}
