/** Caller handed the engine a series that breaks the ingestion contract. */
export class PriceSeriesError extends Error {
  constructor(
    message: string,
    readonly symbol: string,
    readonly index?: number,
  ) {
    super(message);
    this.name = "PriceSeriesError";
  }
}

/** A remote price source failed or answered with an error payload. */
export class SourceError extends Error {
  constructor(
    message: string,
    readonly source: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "SourceError";
  }

  get rateLimited(): boolean {
    return this.status === 429 || /rate limit|\b429\b/i.test(this.message);
  }
}
