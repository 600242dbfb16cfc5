// Authenticated GET for the tile catalog, with timeout and retry/backoff
// Downloads use stream(), which never retries

import { silentLogger } from "../log.js";
import type { Logger } from "../log.js";
import {
  PermanentRequestError,
  RetryExhaustedError,
  TransientNetworkError,
  describeError,
} from "./errors.js";

// ---------- Types ----------

export type Backoff = "constant" | "exponential";

export interface RetryPolicy {
  /** Total attempts, including the first */
  maxAttempts: number;
  baseDelayMs: number;
  backoff: Backoff;
  /** Per-attempt timeout */
  timeoutMs: number;
}

export interface HttpResponse {
  status: number;
  body: string;
}

export type Query = Record<string, string | number>;

export interface HttpClientOptions {
  apiKey: string;
  /** Fetch function (injectable for testing) */
  fetchFn?: typeof fetch;
  /** Delay between retries (injectable for testing) */
  sleep?: (ms: number) => Promise<void>;
  log?: Logger;
  userAgent?: string;
}

// ---------- Pure functions ----------

/** Delay after the zero-based `attempt` failed. */
export function retryDelay(policy: RetryPolicy, attempt: number): number {
  if (policy.backoff === "constant") return policy.baseDelayMs;
  return policy.baseDelayMs * 2 ** attempt;
}

export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/** Resolve `url` with `query` appended; malformed URLs are permanent failures. */
export function withQuery(url: string, query: Query = {}): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new PermanentRequestError(`Malformed URL: ${url}`, url);
  }
  for (const [key, value] of Object.entries(query)) {
    parsed.searchParams.set(key, String(value));
  }
  return parsed.toString();
}

function assertPolicy(policy: RetryPolicy): void {
  if (!(policy.timeoutMs > 0)) throw new RangeError(`timeoutMs must be > 0, got ${policy.timeoutMs}`);
  if (!(policy.maxAttempts >= 1)) throw new RangeError(`maxAttempts must be >= 1, got ${policy.maxAttempts}`);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ---------- Client ----------

export class HttpClient {
  private readonly apiKey: string;
  private readonly fetchFn: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly log: Logger;
  private readonly userAgent: string;

  constructor(opts: HttpClientOptions) {
    this.apiKey = opts.apiKey;
    this.fetchFn = opts.fetchFn ?? fetch;
    this.sleep = opts.sleep ?? sleep;
    this.log = opts.log ?? silentLogger;
    this.userAgent = opts.userAgent ?? "quad-harvest/0.1";
  }

  /**
   * GET with retries on transient failures.
   *
   * Throws PermanentRequestError straight away for 4xx and malformed URLs, and
   * RetryExhaustedError once `policy.maxAttempts` transient failures pile up.
   */
  async get(
    url: string,
    { query, policy }: { query?: Query; policy: RetryPolicy },
  ): Promise<HttpResponse> {
    assertPolicy(policy);
    const target = withQuery(url, query);

    let attempt = 0;
    while (true) {
      try {
        return await this.attempt(target, policy.timeoutMs);
      } catch (err) {
        if (!(err instanceof TransientNetworkError)) throw err;
        attempt++;
        if (attempt >= policy.maxAttempts) {
          throw new RetryExhaustedError(target, attempt, err);
        }
        const delay = retryDelay(policy, attempt - 1);
        this.log.warn(
          `GET ${target} failed (attempt ${attempt}/${policy.maxAttempts}): ${err.message}; retrying in ${(delay / 1000).toFixed(1)}s`,
        );
        await this.sleep(delay);
      }
    }
  }

  /** Single-attempt GET whose body the caller consumes as a stream. */
  async stream(url: string, timeoutMs: number): Promise<Response> {
    if (!(timeoutMs > 0)) throw new RangeError(`timeoutMs must be > 0, got ${timeoutMs}`);
    const target = withQuery(url);
    const response = await this.send(target, timeoutMs);
    if (!response.body) {
      throw new PermanentRequestError(`No response body for ${target}`, target, response.status);
    }
    return response;
  }

  private async attempt(url: string, timeoutMs: number): Promise<HttpResponse> {
    const response = await this.send(url, timeoutMs);
    try {
      return { status: response.status, body: await response.text() };
    } catch (err) {
      throw new TransientNetworkError(`Reading body of ${url} failed: ${describeError(err)}`, url);
    }
  }

  private async send(url: string, timeoutMs: number): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: "GET",
        headers: {
          Authorization: `api-key ${this.apiKey}`,
          "User-Agent": this.userAgent,
        },
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      throw new TransientNetworkError(`GET ${url}: ${describeError(err)}`, url);
    }

    if (response.ok) return response;

    const detail = (await response.text().catch(() => "")).trim().slice(0, 200);
    const message = `GET ${url}: ${response.status} ${response.statusText}${detail ? ` (${detail})` : ""}`;
    if (isTransientStatus(response.status)) {
      throw new TransientNetworkError(message, url, response.status);
    }
    throw new PermanentRequestError(message, url, response.status);
  }
}
