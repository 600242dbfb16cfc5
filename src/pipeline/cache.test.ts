import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { TileCache, dropRepeatedKeys, parseStore, recordKey, serializeStore } from "./cache.js";
import type { TileRecord } from "./cache.js";
import { CacheIOError } from "./errors.js";

function makeRecord(tileId: string, collectionId = "m1"): TileRecord {
  return {
    collectionId,
    tileId,
    bbox: [-100, 25, -99.5, 25.5],
    coverage: 100,
    downloadUrl: `https://tiles.example.com/${collectionId}/${tileId}/full`,
  };
}

function makeLog() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

// ---------- recordKey ----------

describe("recordKey", () => {
  it("combines collection and tile id", () => {
    expect(recordKey({ collectionId: "m1", tileId: "0455-1192" })).toBe("m1/0455-1192");
  });
});

describe("dropRepeatedKeys", () => {
  it("keeps the first record of each key", () => {
    const first = { ...makeRecord("a"), coverage: 40 };
    const { kept, dropped } = dropRepeatedKeys([first, makeRecord("b"), makeRecord("a")]);
    expect(kept).toEqual([first, makeRecord("b")]);
    expect(dropped).toBe(1);
  });
});

// ---------- serializeStore / parseStore ----------

describe("serializeStore", () => {
  it("writes catalog field names", () => {
    const store = new Map([["m1", [makeRecord("0455-1192")]]]);
    expect(JSON.parse(serializeStore(store))).toEqual({
      m1: [
        {
          mosaic_id: "m1",
          quad_id: "0455-1192",
          bbox: [-100, 25, -99.5, 25.5],
          percent_covered: 100,
          download_url: "https://tiles.example.com/m1/0455-1192/full",
        },
      ],
    });
  });

  it("is read back by parseStore", () => {
    const store = new Map([
      ["m1", [makeRecord("a"), makeRecord("b")]],
      ["m2", [makeRecord("c", "m2")]],
    ]);
    expect(parseStore(serializeStore(store))).toEqual(store);
  });
});

describe("parseStore", () => {
  it("rejects records with missing fields", () => {
    expect(() => parseStore('{"m1":[{"quad_id":"a"}]}')).toThrow();
  });

  it("rejects truncated JSON", () => {
    expect(() => parseStore('{"m1":[{"mosaic_id":"m1",')).toThrow();
  });
});

// ---------- TileCache ----------

describe("TileCache", () => {
  let dir: string;
  let cachePath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "quad-cache-test-"));
    cachePath = join(dir, "quad-cache.json");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("loads an empty store when the file is missing", async () => {
    const cache = new TileCache(cachePath);
    const store = await cache.load();
    expect(store.size).toBe(0);
    expect(cache.get("m1")).toEqual([]);
  });

  it("persists records across instances", async () => {
    const first = new TileCache(cachePath);
    await first.load();
    first.put("m1", [makeRecord("a"), makeRecord("b")]);
    await first.flush();

    const second = new TileCache(cachePath);
    await second.load();
    expect(second.get("m1").map((r) => r.tileId)).toEqual(["a", "b"]);
    expect(second.collections()).toEqual(["m1"]);
  });

  it("put replaces the collection's entry", async () => {
    const cache = new TileCache(cachePath);
    await cache.load();
    cache.put("m1", [makeRecord("a")]);
    cache.put("m1", [makeRecord("b")]);
    expect(cache.get("m1").map((r) => r.tileId)).toEqual(["b"]);
  });

  it("get returns a copy", async () => {
    const cache = new TileCache(cachePath);
    await cache.load();
    cache.put("m1", [makeRecord("a")]);
    cache.get("m1").push(makeRecord("b"));
    expect(cache.get("m1")).toHaveLength(1);
  });

  it("leaves no temp file behind after flush", async () => {
    const cache = new TileCache(cachePath);
    await cache.load();
    cache.put("m1", [makeRecord("a")]);
    await cache.flush();
    expect(existsSync(cachePath)).toBe(true);
    expect(existsSync(cachePath + ".tmp")).toBe(false);
  });

  it("creates the cache directory on flush", async () => {
    const nested = join(dir, "a", "b", "quad-cache.json");
    const cache = new TileCache(nested);
    await cache.load();
    cache.put("m1", [makeRecord("a")]);
    await cache.flush();
    expect(existsSync(nested)).toBe(true);
  });

  it("ignores a half-written temp file from an interrupted flush", async () => {
    const cache = new TileCache(cachePath);
    await cache.load();
    cache.put("m1", [makeRecord("a")]);
    await cache.flush();

    // Simulate a crash partway through the next flush
    writeFileSync(cachePath + ".tmp", '{"m1":[{"mosaic_id":"m1","quad_');

    const reloaded = new TileCache(cachePath);
    await reloaded.load();
    expect(reloaded.get("m1").map((r) => r.tileId)).toEqual(["a"]);
  });

  it("serializes overlapping flushes and keeps the latest state", async () => {
    const cache = new TileCache(cachePath);
    await cache.load();
    cache.put("m1", [makeRecord("a")]);
    const first = cache.flush();
    cache.put("m2", [makeRecord("b", "m2")]);
    const second = cache.flush();
    await Promise.all([first, second]);

    const saved = parseStore(readFileSync(cachePath, "utf-8"));
    expect([...saved.keys()]).toEqual(["m1", "m2"]);
  });

  it("warns and starts empty when the file is corrupt", async () => {
    writeFileSync(cachePath, "{not json");
    const log = makeLog();
    const cache = new TileCache(cachePath, log);

    const store = await cache.load();

    expect(store.size).toBe(0);
    expect(log.warn).toHaveBeenCalledTimes(1);
  });

  it("drops repeated quads when loading and saves them once", async () => {
    writeFileSync(cachePath, serializeStore(new Map([["m1", [makeRecord("q1"), makeRecord("q2"), makeRecord("q1")]]])));
    const log = makeLog();
    const cache = new TileCache(cachePath, log);

    await cache.load();
    await cache.flush();

    expect(cache.get("m1").map((r) => r.tileId)).toEqual(["q1", "q2"]);
    expect(log.warn).toHaveBeenCalledWith("Cache entry m1 repeats 1 quad(s); keeping the first of each");
    expect(parseStore(readFileSync(cachePath, "utf-8")).get("m1")?.map((r) => r.tileId)).toEqual(["q1", "q2"]);
  });

  it("overwrites a corrupt file on the next flush", async () => {
    writeFileSync(cachePath, "{not json");
    const cache = new TileCache(cachePath, makeLog());
    await cache.load();
    cache.put("m1", [makeRecord("a")]);
    await cache.flush();

    expect(parseStore(readFileSync(cachePath, "utf-8")).get("m1")).toHaveLength(1);
  });

  it("throws CacheIOError when the path cannot be read", async () => {
    mkdirSync(cachePath);
    await expect(new TileCache(cachePath).load()).rejects.toThrow(CacheIOError);
  });

  it("throws CacheIOError when the cache cannot be written", async () => {
    const blocker = join(dir, "blocker");
    writeFileSync(blocker, "");
    const cache = new TileCache(join(blocker, "quad-cache.json"));
    cache.put("m1", [makeRecord("a")]);

    await expect(cache.flush()).rejects.toThrow(CacheIOError);
  });

  it("keeps flushing after a failed flush", async () => {
    const blocker = join(dir, "blocker");
    writeFileSync(blocker, "");
    const blocked = new TileCache(join(blocker, "quad-cache.json"));
    await expect(blocked.flush()).rejects.toThrow(CacheIOError);

    rmSync(blocker);
    blocked.put("m1", [makeRecord("a")]);
    await blocked.flush();
    expect(existsSync(join(blocker, "quad-cache.json"))).toBe(true);
  });
});
