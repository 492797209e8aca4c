import { APP_VERSION } from "./config";

/** Outcome of one source within one ingestion pass. */
export interface SourceReport {
  sourceId: string;
  /** Documents indexed for the first time. */
  added: number;
  /** Documents re-indexed because their version changed. */
  updated: number;
  /** Documents removed from ledger and index. */
  deleted: number;
  /** Reported by the source but already at the same version in the ledger. */
  unchanged: number;
  /** Documents left for the next pass after a failure. */
  failed: number;
  /** Chunks written to the semantic index. */
  chunksWritten: number;
  /** Set when the whole source pass was aborted. */
  error?: string;
}

export function emptyReport(sourceId: string): SourceReport {
  return {
    sourceId,
    added: 0,
    updated: 0,
    deleted: 0,
    unchanged: 0,
    failed: 0,
    chunksWritten: 0,
  };
}

/** Progress of the ingestion pipeline across passes. */
export interface IngestionStatus {
  /** Completed passes since start. */
  passes: number;
  running: boolean;
  lastStartedAt?: string;
  lastFinishedAt?: string;
  /** Error that aborted the last pass (ledger failure), if any. */
  lastError?: string;
  /** Latest report per source id. */
  sources: Record<string, SourceReport>;
  /** Ledger totals after the last pass. */
  documentsIndexed: number;
  chunksIndexed: number;
}

/**
 * Mutable in-memory snapshot of server lifecycle + ingestion progress.
 * Exposed read-only to external callers via `statusManager.getStatus()`.
 *
 * ready = true once the first ingestion pass has finished (successfully or
 * not); search is served from whatever the index holds at that point.
 */
export interface ServerStatus {
  /** Package / server version (kept in sync with package.json). */
  version: string;
  /** Name / identifier of the loaded embedding model (may be empty pre-init). */
  modelName: string;
  /** Active transport in use: 'stdio' | 'http' | 'unknown'. */
  transport: string;
  ready: boolean;
  /** ISO timestamp when the process (or StatusManager) started. */
  startedAt: string;
  ingestion: IngestionStatus;
}

/**
 * Class wrapper around mutable server status state. Avoids ad-hoc mutation and
 * centralizes any future validation or side-effects.
 */
export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      modelName: initial?.modelName ?? "",
      transport: initial?.transport ?? "unknown",
      ready: initial?.ready ?? false,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      ingestion: initial?.ingestion ?? {
        passes: 0,
        running: false,
        sources: {},
        documentsIndexed: 0,
        chunksIndexed: 0,
      },
    };
  }

  /** Record the concrete transport selected at runtime. */
  public markTransport(t: string) {
    this.data.transport = t;
  }

  /** Store the resolved model identifier/name after embedding init. */
  public setModelName(name: string) {
    this.data.modelName = name;
  }

  public beginPass() {
    this.data.ingestion.running = true;
    this.data.ingestion.lastStartedAt = new Date().toISOString();
  }

  public recordSource(report: SourceReport) {
    this.data.ingestion.sources[report.sourceId] = { ...report };
  }

  /**
   * Close the current pass. Totals are omitted when the pass was aborted by a
   * ledger failure; the previous totals are kept then.
   */
  public endPass(totals?: { documents: number; chunks: number }, error?: string) {
    const ing = this.data.ingestion;
    ing.running = false;
    ing.passes++;
    ing.lastFinishedAt = new Date().toISOString();
    ing.lastError = error;
    if (totals) {
      ing.documentsIndexed = totals.documents;
      ing.chunksIndexed = totals.chunks;
    }
    this.data.ready = true;
  }

  /** Access a live reference to current status (treat as read-only). */
  public getStatus(): ServerStatus {
    return this.data;
  }

  /** JSON serialization helper (returns underlying object). */
  public toJSON() {
    return this.data;
  }
}

// Singleton instance used across modules (ingestor, transports, health checks).
export const statusManager = new StatusManager();
