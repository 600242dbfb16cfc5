// Run configuration, read once from the environment and passed to every component

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { parseBBox } from "./bbox.js";
import type { BBox } from "./bbox.js";
import type { RetryPolicy } from "./pipeline/http.js";

export interface RunConfig {
  apiUrl: string;
  apiKey: string;
  outputDir: string;
  cachePath: string;
  /** Directory for the run log; null logs to the console only */
  logDir: string | null;
  regionPath: string;
  /** Explicit region; when set, regionPath is not read */
  regionBBox: BBox | null;
  collectionPrefix: string;
  pageSize: number;
  concurrency: number;
  maxCollections: number | null;
  /** Collection listing: constant delay between attempts */
  catalogPolicy: RetryPolicy;
  /** Quad listing pages: exponential backoff */
  pagePolicy: RetryPolicy;
  downloadTimeoutMs: number;
}

export const DEFAULT_API_URL = "https://api.planet.com/basemaps/v1/mosaics";
export const DEFAULT_COLLECTION_PREFIX = "planet_medres_normalized_analytic";
export const LOG_FILE_NAME = "quad-harvest.log";

export const CATALOG_POLICY: RetryPolicy = {
  maxAttempts: 5,
  baseDelayMs: 10_000,
  backoff: "constant",
  timeoutMs: 60_000,
};

export const PAGE_POLICY: RetryPolicy = {
  maxAttempts: 5,
  baseDelayMs: 2_000,
  backoff: "exponential",
  timeoutMs: 60_000,
};

const DEFAULT_DOWNLOAD_TIMEOUT_MS = 300_000;

const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().optional());
const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

const envSchema = z.object({
  TILES_API_URL: z.preprocess(blankToUndefined, z.string().url().default(DEFAULT_API_URL)),
  TILES_API_KEY: optionalString,
  TILES_API_KEY_PATH: optionalString,
  OUTPUT_DIR: z.preprocess(blankToUndefined, z.string().default("data/quads")),
  CACHE_PATH: optionalString,
  LOG_DIR: optionalString,
  REGION_PATH: z.preprocess(blankToUndefined, z.string().default("data/region.geojson")),
  REGION_BBOX: optionalString,
  COLLECTION_PREFIX: z.preprocess(blankToUndefined, z.string().default(DEFAULT_COLLECTION_PREFIX)),
  PAGE_SIZE: positiveInt(250),
  CONCURRENCY: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(1).max(32).default(4),
  ),
  MAX_COLLECTIONS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().optional()),
  DOWNLOAD_TIMEOUT_MS: positiveInt(DEFAULT_DOWNLOAD_TIMEOUT_MS),
});

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Token from TILES_API_KEY, else the trimmed contents of TILES_API_KEY_PATH. */
export async function resolveApiKey(env: { key?: string; keyPath?: string }): Promise<string> {
  if (env.key) return env.key.trim();
  if (!env.keyPath) {
    throw new ConfigError("Set TILES_API_KEY or TILES_API_KEY_PATH");
  }
  let text: string;
  try {
    text = await readFile(env.keyPath, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read API key file ${env.keyPath}: ${String(err)}`);
  }
  const key = text.trim();
  if (!key) throw new ConfigError(`API key file ${env.keyPath} is empty`);
  return key;
}

export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<RunConfig> {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Invalid configuration:\n  ${issues.join("\n  ")}`);
  }
  const vars = result.data;

  let regionBBox: BBox | null = null;
  if (vars.REGION_BBOX) {
    try {
      regionBBox = parseBBox(vars.REGION_BBOX);
    } catch (err) {
      throw new ConfigError(`REGION_BBOX: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  return {
    apiUrl: vars.TILES_API_URL,
    apiKey: await resolveApiKey({ key: vars.TILES_API_KEY, keyPath: vars.TILES_API_KEY_PATH }),
    outputDir: vars.OUTPUT_DIR,
    cachePath: vars.CACHE_PATH ?? join(vars.OUTPUT_DIR, "quad-cache.json"),
    logDir: vars.LOG_DIR ?? null,
    regionPath: vars.REGION_PATH,
    regionBBox,
    collectionPrefix: vars.COLLECTION_PREFIX,
    pageSize: vars.PAGE_SIZE,
    concurrency: vars.CONCURRENCY,
    maxCollections: vars.MAX_COLLECTIONS ?? null,
    catalogPolicy: CATALOG_POLICY,
    pagePolicy: PAGE_POLICY,
    downloadTimeoutMs: vars.DOWNLOAD_TIMEOUT_MS,
  };
}
