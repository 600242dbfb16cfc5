// Failure taxonomy for catalog and download calls

/** Timeouts, connection resets, 408/429/5xx. Worth retrying. */
export class TransientNetworkError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status: number | null = null,
  ) {
    super(message);
    this.name = "TransientNetworkError";
  }
}

/** 4xx, malformed URLs, unusable response bodies. Never retried. */
export class PermanentRequestError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status: number | null = null,
  ) {
    super(message);
    this.name = "PermanentRequestError";
  }
}

export class RetryExhaustedError extends Error {
  constructor(
    public readonly url: string,
    public readonly attempts: number,
    public readonly lastError: unknown,
  ) {
    super(`GET ${url} failed after ${attempts} attempts: ${describeError(lastError)}`);
    this.name = "RetryExhaustedError";
  }
}

export class CacheIOError extends Error {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(message);
    this.name = "CacheIOError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
