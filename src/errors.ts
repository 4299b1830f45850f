import type { DateSpan } from "./utils/dates.js";

/** A date/time string did not match any format we know how to read. */
export class ParseError extends Error {
  constructor(
    message: string,
    readonly input: string
  ) {
    super(message);
    this.name = "ParseError";
  }
}

/** An upstream call failed or answered with something we can't use. */
export class FetchFailure extends Error {
  /** Date span of the request, when the failure is tied to one. */
  readonly span?: DateSpan;

  constructor(
    message: string,
    readonly provider: string,
    options?: { cause?: unknown; span?: DateSpan }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "FetchFailure";
    this.span = options?.span;
  }
}

/** The on-disk cache file could not be read back as a cache entry. */
export class CacheCorruption extends Error {
  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "CacheCorruption";
  }
}
