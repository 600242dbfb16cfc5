/**
 * Download quads to disk, one GeoTIFF per tile record.
 *
 * A tile whose file already exists is never fetched again, so a rerun only
 * downloads what is missing. Bodies are streamed to a `.part` file that is
 * renamed into place once complete.
 */

import { createWriteStream, existsSync } from "node:fs";
import { mkdir, rename, rm } from "node:fs/promises";
import { join } from "node:path";
import { pipeline } from "node:stream/promises";
import { Readable } from "node:stream";
import type { ReadableStream } from "node:stream/web";
import type { TileRecord } from "./cache.js";
import { describeError } from "./errors.js";
import type { HttpClient } from "./http.js";
import { runPool } from "./pool.js";
import { silentLogger } from "../log.js";
import type { Logger } from "../log.js";

// ---------- Types ----------

export type DownloadOutcome =
  | { status: "downloaded"; record: TileRecord; path: string; bytes: number }
  | { status: "present"; record: TileRecord; path: string }
  | { status: "failed"; record: TileRecord; path: string; reason: string };

export interface DownloadOptions {
  client: HttpClient;
  /** Per-tile timeout for the whole transfer */
  timeoutMs: number;
  log?: Logger;
}

export interface DownloadSummary {
  downloaded: number;
  present: number;
  failed: number;
  bytes: number;
}

// ---------- Pure functions ----------

/** Single path segment with anything outside `[A-Za-z0-9._-]` replaced by `_`. */
export function safeSegment(value: string): string {
  return value.replace(/[^A-Za-z0-9._-]/g, "_");
}

/** File name for a tile; stable across runs. */
export function tileFileName(record: Pick<TileRecord, "collectionId" | "tileId">): string {
  return `${safeSegment(record.collectionId)}_${safeSegment(record.tileId)}.tif`;
}

export function tilePath(
  record: Pick<TileRecord, "collectionId" | "tileId">,
  dir: string,
): string {
  return join(dir, tileFileName(record));
}

function isWellFormedUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return parsed.protocol === "https:" || parsed.protocol === "http:";
  } catch {
    return false;
  }
}

export function summarizeOutcomes(outcomes: readonly DownloadOutcome[]): DownloadSummary {
  const summary: DownloadSummary = { downloaded: 0, present: 0, failed: 0, bytes: 0 };
  for (const outcome of outcomes) {
    if (outcome.status === "downloaded") {
      summary.downloaded++;
      summary.bytes += outcome.bytes;
    } else if (outcome.status === "present") {
      summary.present++;
    } else {
      summary.failed++;
    }
  }
  return summary;
}

/** Format byte count for display. */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(1)} GB`;
}

// ---------- Downloads ----------

/**
 * Download a single tile. Never throws: every failure becomes a
 * `failed` outcome, and no partial file is left at the final path.
 */
export async function downloadTile(
  record: TileRecord,
  dir: string,
  opts: DownloadOptions,
): Promise<DownloadOutcome> {
  const { client, timeoutMs, log = silentLogger } = opts;
  const path = tilePath(record, dir);
  const label = `${record.collectionId}/${record.tileId}`;

  if (!isWellFormedUrl(record.downloadUrl)) {
    const reason = `malformed download URL "${record.downloadUrl}"`;
    log.error(`Failed ${label}: ${reason}`);
    return { status: "failed", record, path, reason };
  }

  if (existsSync(path)) {
    log.info(`Already downloaded: ${path}`);
    return { status: "present", record, path };
  }

  const partPath = path + ".part";
  try {
    await mkdir(dir, { recursive: true });
    const response = await client.stream(record.downloadUrl, timeoutMs);

    let bytes = 0;
    // Convert web ReadableStream to Node.js Readable
    const nodeStream = Readable.fromWeb(response.body as ReadableStream);
    nodeStream.on("data", (chunk: Buffer) => {
      bytes += chunk.length;
    });

    await pipeline(nodeStream, createWriteStream(partPath));
    await rename(partPath, path);

    log.info(`Downloaded: ${path} (${formatBytes(bytes)})`);
    return { status: "downloaded", record, path, bytes };
  } catch (err) {
    await rm(partPath, { force: true }).catch((rmErr: unknown) => {
      log.warn(`Could not remove ${partPath}: ${describeError(rmErr)}`);
    });
    const reason = describeError(err);
    log.error(`Failed to download ${label} from ${record.downloadUrl}: ${reason}`);
    return { status: "failed", record, path, reason };
  }
}

/**
 * Download every record into `dir` with at most `concurrency` transfers in
 * flight. Outcomes are in completion order.
 */
export async function downloadAll(
  records: readonly TileRecord[],
  dir: string,
  concurrency: number,
  opts: DownloadOptions,
): Promise<DownloadOutcome[]> {
  return runPool(records, concurrency, (record) => downloadTile(record, dir, opts));
}
