#!/usr/bin/env node
// Harvest run: list basemap collections, then list and download each one's quads
// Run with: npm run harvest (configured through the environment, see config.ts)

import { join } from "node:path";
import type { BBox } from "../bbox.js";
import { isValidBBox } from "../bbox.js";
import { LOG_FILE_NAME, loadConfig } from "../config.js";
import type { RunConfig } from "../config.js";
import { createLogger } from "../log.js";
import type { Logger } from "../log.js";
import { readRegionBBox } from "../region.js";
import { TileCache } from "./cache.js";
import { CatalogWalker } from "./catalog.js";
import type { Collection } from "./catalog.js";
import { downloadAll, formatBytes, safeSegment, summarizeOutcomes } from "./download.js";
import type { DownloadSummary } from "./download.js";
import { describeError } from "./errors.js";
import { HttpClient } from "./http.js";

// ---------- Types ----------

export interface CollectionReport {
  collection: Collection;
  /** Records known for the collection (cached + discovered) */
  listed: number;
  discovered: number;
  listingComplete: boolean;
  downloads: DownloadSummary;
  /** Set when listing or downloading threw */
  error: string | null;
}

export interface RunReport {
  collections: CollectionReport[];
  totals: DownloadSummary;
}

export interface HarvestOptions {
  config: Omit<RunConfig, "apiKey" | "logDir" | "regionPath" | "regionBBox">;
  bbox: BBox;
  client: HttpClient;
  log: Logger;
}

const EMPTY_SUMMARY: DownloadSummary = { downloaded: 0, present: 0, failed: 0, bytes: 0 };

function addSummaries(a: DownloadSummary, b: DownloadSummary): DownloadSummary {
  return {
    downloaded: a.downloaded + b.downloaded,
    present: a.present + b.present,
    failed: a.failed + b.failed,
    bytes: a.bytes + b.bytes,
  };
}

// ---------- Orchestrator ----------

/**
 * Harvest every matching collection intersecting `bbox`.
 *
 * Throws only if the collection listing itself fails. A collection whose
 * quads cannot be listed or downloaded is logged, reported and skipped.
 */
export async function harvest(opts: HarvestOptions): Promise<RunReport> {
  const { config, bbox, client, log } = opts;
  if (!isValidBBox(bbox)) {
    throw new RangeError(`Invalid region bounding box: ${bbox.join(",")}`);
  }

  const cache = new TileCache(config.cachePath, log);
  await cache.load();
  log.info(`Loaded quad cache ${config.cachePath}: ${cache.collections().length} collection(s)`);

  const walker = new CatalogWalker({
    client,
    cache,
    apiUrl: config.apiUrl,
    collectionPrefix: config.collectionPrefix,
    pageSize: config.pageSize,
    maxCollections: config.maxCollections,
    catalogPolicy: config.catalogPolicy,
    pagePolicy: config.pagePolicy,
    log,
  });

  const collections = await walker.listCollections();
  log.info(`Found ${collections.length} collection(s) matching "${config.collectionPrefix}"`);

  const reports: CollectionReport[] = [];
  for (const collection of collections) {
    reports.push(await harvestCollection(collection, walker, opts));
  }

  const totals = reports.reduce((sum, r) => addSummaries(sum, r.downloads), EMPTY_SUMMARY);
  const failedCollections = reports.filter((r) => r.error !== null).length;
  log.info(
    `Run complete: ${totals.downloaded} downloaded (${formatBytes(totals.bytes)}), ${totals.present} already present, ${totals.failed} failed; ${failedCollections} collection(s) with errors`,
  );
  return { collections: reports, totals };
}

async function harvestCollection(
  collection: Collection,
  walker: CatalogWalker,
  { config, bbox, client, log }: HarvestOptions,
): Promise<CollectionReport> {
  const report: CollectionReport = {
    collection,
    listed: 0,
    discovered: 0,
    listingComplete: false,
    downloads: EMPTY_SUMMARY,
    error: null,
  };
  const period = collection.interval ? ` [${collection.interval}]` : "";
  log.info(`Processing collection ${collection.name} (${collection.id})${period}`);

  try {
    const listing = await walker.listTiles(collection.id, bbox);
    report.listed = listing.records.length;
    report.discovered = listing.discovered;
    report.listingComplete = listing.complete;
    log.info(
      `Found ${listing.records.length} quad(s) for ${collection.name} (${listing.discovered} new${listing.complete ? "" : ", listing incomplete"})`,
    );

    const outcomes = await downloadAll(
      listing.records,
      join(config.outputDir, safeSegment(collection.name)),
      config.concurrency,
      { client, timeoutMs: config.downloadTimeoutMs, log },
    );
    report.downloads = summarizeOutcomes(outcomes);
    const { downloaded, present, failed, bytes } = report.downloads;
    log.info(
      `${collection.name}: ${downloaded} downloaded (${formatBytes(bytes)}), ${present} already present, ${failed} failed`,
    );
  } catch (err) {
    report.error = describeError(err);
    log.error(`Collection ${collection.name} (${collection.id}) failed: ${report.error}`);
  }
  return report;
}

// ---------- CLI runner ----------

async function main(): Promise<void> {
  const config = await loadConfig(process.env);
  const log = createLogger({
    file: config.logDir ? join(config.logDir, LOG_FILE_NAME) : null,
  });

  const bbox = config.regionBBox ?? (await readRegionBBox(config.regionPath));
  log.info(`Region bbox ${bbox.join(",")}${config.regionBBox ? "" : ` from ${config.regionPath}`}`);

  const client = new HttpClient({ apiKey: config.apiKey, log });
  await harvest({ config, bbox, client, log });
}

// Run when executed directly
const isDirectExecution =
  typeof process !== "undefined" &&
  process.argv[1] &&
  (process.argv[1].endsWith("/harvest.ts") ||
    process.argv[1].endsWith("/harvest.js") ||
    process.argv[1].endsWith("/quad-harvest"));

if (isDirectExecution) {
  main().catch((err) => {
    console.error("Harvest failed:", err);
    process.exit(1);
  });
}
