// src/atlas/errors.ts

/** The backing store is missing or unreadable. Raised at startup; the service must not serve. */
export class StoreUnavailableError extends Error {
  constructor(message: string, readonly dbPath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreUnavailableError";
  }
}

/** A store-level fault while answering a read. Filter and page state are untouched. */
export class QueryExecutionError extends Error {
  readonly retryable = true;

  constructor(readonly operation: string, options?: { cause?: unknown }) {
    const cause = options?.cause;
    const detail = cause instanceof Error ? cause.message : cause === undefined ? "" : String(cause);
    super(detail ? `${operation} failed: ${detail}` : `${operation} failed`, options);
    this.name = "QueryExecutionError";
  }
}

export class UnknownSessionError extends Error {
  constructor(readonly sessionId: string) {
    super(`Unknown session: ${sessionId}`);
    this.name = "UnknownSessionError";
  }
}
