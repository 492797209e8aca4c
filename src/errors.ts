/**
 * Error taxonomy used by the ingestion pipeline. The orchestrator decides how
 * far a failure reaches purely from the error class:
 *  - LedgerError            : fatal to the current pass, propagated to the caller.
 *  - SourceUnavailableError : aborts one source's pass, other sources proceed.
 *  - MalformedContentError  : the document is skipped with a warning.
 *  - anything else          : transient; the document is retried next pass.
 */

/** Content that cannot be decoded (bad JSON, unreadable PDF, malformed log entry). */
export class MalformedContentError extends Error {
  public readonly documentId: string;

  constructor(documentId: string, message: string, options?: { cause?: unknown }) {
    super(`Malformed content in ${documentId}: ${message}`, options);
    this.name = "MalformedContentError";
    this.documentId = documentId;
  }
}

/** A source could not enumerate its documents (missing directory, backend down). */
export class SourceUnavailableError extends Error {
  public readonly sourceId: string;

  constructor(sourceId: string, message: string, options?: { cause?: unknown }) {
    super(`Source ${sourceId} unavailable: ${message}`, options);
    this.name = "SourceUnavailableError";
    this.sourceId = sourceId;
  }
}

/** Durable storage failure in the ingestion ledger. */
export class LedgerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LedgerError";
  }
}

/** Failed request against the log-query backend. */
export class LogQueryError extends Error {
  public readonly statusCode?: number;
  public readonly responseBody?: string;

  constructor(message: string, statusCode?: number, responseBody?: string) {
    super(message);
    this.name = "LogQueryError";
    this.statusCode = statusCode;
    this.responseBody = responseBody;
  }
}

/** Short, log-friendly description of an unknown thrown value. */
export function describeError(e: unknown): string {
  return e instanceof Error ? `${e.name}: ${e.message}` : String(e);
}
