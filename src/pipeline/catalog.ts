// Catalog traversal: basemap collections (mosaics) and the quads inside them
// Pagination follows `_links._next`; quads are deduplicated against the cache

import { z } from "zod";
import { bboxParam } from "../bbox.js";
import type { BBox } from "../bbox.js";
import { silentLogger } from "../log.js";
import type { Logger } from "../log.js";
import { recordKey } from "./cache.js";
import type { TileCache, TileRecord } from "./cache.js";
import { PermanentRequestError, describeError } from "./errors.js";
import type { HttpClient, Query, RetryPolicy } from "./http.js";

// ---------- Types ----------

export interface Collection {
  id: string;
  name: string;
  /** "first/last" acquisition dates, when the catalog reports them */
  interval: string | null;
}

export interface TileListing {
  /** Cached records first, then newly discovered ones, in page order */
  records: TileRecord[];
  discovered: number;
  /** False when a page failed and pagination stopped early */
  complete: boolean;
}

export interface CatalogOptions {
  client: HttpClient;
  cache: TileCache;
  /** Collections listing URL; quads live under `<apiUrl>/<id>/quads` */
  apiUrl: string;
  collectionPrefix: string;
  pageSize: number;
  maxCollections?: number | null;
  catalogPolicy: RetryPolicy;
  pagePolicy: RetryPolicy;
  log?: Logger;
}

// ---------- Response schemas ----------

const linksSchema = z.object({ _next: z.string().optional() }).passthrough();

const mosaicSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    first_acquired: z.string().optional(),
    last_acquired: z.string().optional(),
  })
  .passthrough();

const mosaicPageSchema = z.object({
  mosaics: z.array(mosaicSchema),
  _links: linksSchema.optional(),
});

const quadSchema = z
  .object({
    id: z.string(),
    bbox: z.tuple([z.number(), z.number(), z.number(), z.number()]),
    percent_covered: z
      .number()
      .transform((value) => Math.min(100, Math.max(0, value)))
      .optional(),
    _links: z.object({ download: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

const quadPageSchema = z.object({
  items: z.array(z.unknown()),
  _links: linksSchema.optional(),
});

type Mosaic = z.infer<typeof mosaicSchema>;

// ---------- Pure functions ----------

function datePart(timestamp: string | undefined): string | null {
  if (!timestamp) return null;
  return timestamp.slice(0, 10);
}

export function toCollection(mosaic: Mosaic): Collection {
  const first = datePart(mosaic.first_acquired);
  const last = datePart(mosaic.last_acquired);
  return {
    id: mosaic.id,
    name: mosaic.name,
    interval: first && last ? `${first}/${last}` : null,
  };
}

export function quadsUrl(apiUrl: string, collectionId: string): string {
  return `${apiUrl.replace(/\/+$/, "")}/${encodeURIComponent(collectionId)}/quads`;
}

function parseJson(body: string, url: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    throw new PermanentRequestError(`Malformed JSON from ${url}`, url);
  }
}

function schemaError(url: string, error: z.ZodError): PermanentRequestError {
  const issue = error.issues[0];
  const where = issue?.path.join(".") || "(root)";
  return new PermanentRequestError(`Unexpected response from ${url}: ${where} ${issue?.message ?? ""}`.trim(), url);
}

function parseMosaicPage(body: string, url: string): z.infer<typeof mosaicPageSchema> {
  const result = mosaicPageSchema.safeParse(parseJson(body, url));
  if (!result.success) throw schemaError(url, result.error);
  return result.data;
}

function parseQuadPage(body: string, url: string): z.infer<typeof quadPageSchema> {
  const result = quadPageSchema.safeParse(parseJson(body, url));
  if (!result.success) throw schemaError(url, result.error);
  return result.data;
}

// ---------- Walker ----------

export class CatalogWalker {
  private readonly log: Logger;

  constructor(private readonly opts: CatalogOptions) {
    this.log = opts.log ?? silentLogger;
  }

  /**
   * Every collection whose name carries the configured prefix.
   * Failures propagate: nothing else can run without this list.
   */
  async listCollections(): Promise<Collection[]> {
    const { client, apiUrl, collectionPrefix, catalogPolicy, maxCollections } = this.opts;
    const collections: Collection[] = [];
    const visited = new Set<string>();
    let url: string | undefined = apiUrl;

    while (url) {
      visited.add(url);
      const response = await client.get(url, { policy: catalogPolicy });
      const page = parseMosaicPage(response.body, url);

      for (const mosaic of page.mosaics) {
        if (mosaic.name.startsWith(collectionPrefix)) collections.push(toCollection(mosaic));
      }

      const next = page._links?._next;
      if (next && visited.has(next)) {
        this.log.warn(`Collection listing links back to ${next}; stopping`);
        break;
      }
      url = next;
    }

    if (maxCollections != null && collections.length > maxCollections) {
      this.log.info(`Limiting run to the first ${maxCollections} of ${collections.length} collections`);
      return collections.slice(0, maxCollections);
    }
    return collections;
  }

  /**
   * Quads of one collection intersecting `bbox`, merged with what the cache
   * already holds. A failing page ends pagination early; whatever was gathered
   * is still cached and returned.
   */
  async listTiles(collectionId: string, bbox: BBox): Promise<TileListing> {
    const { client, cache, apiUrl, pageSize, pagePolicy } = this.opts;

    const records = cache.get(collectionId);
    const seen = new Set(records.map(recordKey));
    let discovered = 0;
    let missingLink = 0;
    let complete = true;

    let url: string | undefined = quadsUrl(apiUrl, collectionId);
    let query: Query | undefined = { bbox: bboxParam(bbox), _page_size: pageSize };
    const visited = new Set<string>();
    let pageNum = 0;

    while (url) {
      pageNum++;
      visited.add(url);
      let page: z.infer<typeof quadPageSchema>;
      try {
        const response = await client.get(url, { query, policy: pagePolicy });
        page = parseQuadPage(response.body, url);
      } catch (err) {
        this.log.error(
          `Listing ${collectionId} stopped at page ${pageNum} (${url}): ${describeError(err)}; keeping ${records.length} tiles gathered so far`,
        );
        complete = false;
        break;
      }

      for (const item of page.items) {
        const parsed = quadSchema.safeParse(item);
        if (!parsed.success) {
          this.log.warn(`Skipping malformed quad in ${collectionId} page ${pageNum}`);
          continue;
        }
        const quad = parsed.data;
        const key = recordKey({ collectionId, tileId: quad.id });
        if (seen.has(key)) continue;
        const downloadUrl = quad._links?.download;
        if (!downloadUrl) {
          missingLink++;
          continue;
        }
        records.push({
          collectionId,
          tileId: quad.id,
          bbox: quad.bbox,
          coverage: quad.percent_covered ?? 0,
          downloadUrl,
        });
        seen.add(key);
        discovered++;
      }

      // The next link already carries every parameter
      query = undefined;
      const next = page._links?._next;
      if (next && visited.has(next)) {
        this.log.warn(`Quad listing for ${collectionId} links back to ${next}; stopping`);
        break;
      }
      url = next;
    }

    if (missingLink > 0) {
      this.log.warn(`${missingLink} quad(s) in ${collectionId} had no download link`);
    }

    cache.put(collectionId, records);
    await cache.flush();

    return { records, discovered, complete };
  }
}
