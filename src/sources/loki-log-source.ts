import { createHash } from "node:crypto";
import { chunkLines, embedChunks, type ChunkDraft } from "../chunking";
import { SourceUnavailableError } from "../errors";
import { compareNanos, formatHourBucket, formatLogTimestamp, nanosToDate } from "../loki/time";
import type { LogQueryBackend, LokiStream } from "../loki/types";
import type {
  ContentSource,
  DocumentRef,
  EmbeddingGenerator,
  ExistingDocuments,
  IndexChunk,
  IngestedDocument,
} from "../types";

/** One label stream's lines within one UTC hour: a single document. */
export interface LogBucket {
  /** `<yyyyMMdd_HH>_<k-v pairs joined by "_">`. */
  readonly id: string;
  readonly labels: Readonly<Record<string, string>>;
  /** `[yyyy-MM-dd HH:mm:ss.fff] line`, ascending by timestamp. */
  readonly lines: readonly string[];
  /** Base64 SHA-256 of the newline-joined lines. */
  readonly version: string;
}

/** Labels as `k-v` pairs sorted by key and joined by "_". */
export function labelSignature(labels: Readonly<Record<string, string>>): string {
  return Object.keys(labels)
    .sort()
    .map((k) => `${k}-${labels[k]}`)
    .join("_");
}

export function hashLines(lines: readonly string[]): string {
  return createHash("sha256").update(lines.join("\n"), "utf8").digest("base64");
}

/**
 * Group query results into hour buckets per label stream. Entries are ordered
 * by timestamp (stable for ties) before formatting, so the same set of lines
 * always hashes the same regardless of query direction. Buckets come back
 * ordered by id.
 */
export function buildLogBuckets(streams: readonly LokiStream[]): LogBucket[] {
  const grouped = new Map<string, { labels: Record<string, string>; entries: [string, string][] }>();
  for (const s of streams) {
    const signature = labelSignature(s.stream);
    for (const [ts, line] of s.values) {
      const id = `${formatHourBucket(nanosToDate(ts))}_${signature}`;
      let group = grouped.get(id);
      if (!group) {
        group = { labels: s.stream, entries: [] };
        grouped.set(id, group);
      }
      group.entries.push([ts, line]);
    }
  }
  const buckets: LogBucket[] = [];
  for (const [id, group] of grouped) {
    const lines = [...group.entries]
      .sort((a, b) => compareNanos(a[0], b[0]))
      .map(([ts, line]) => `[${formatLogTimestamp(nanosToDate(ts))}] ${line}`);
    buckets.push({ id, labels: group.labels, lines, version: hashLines(lines) });
  }
  return buckets.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
}

export interface LokiLogSourceOptions {
  /** LogQL selector, e.g. `{app="checkout"}`. */
  query: string;
  lookbackHours: number;
  /** Max lines per query (default 5000). */
  limit?: number;
  /** Overrides the default `LokiLogSource:<query>` identity. */
  sourceId?: string;
  embedConcurrency?: number;
  /** Clock, for tests. */
  now?: () => Date;
}

/**
 * Time-windowed log source over a label-query backend. Each document is one
 * stream's lines within one UTC hour, versioned by content hash since a live
 * query result has no modification time.
 *
 * Deletion is not tracked: hours that fall out of the lookback window stay
 * indexed.
 */
export class LokiLogSource implements ContentSource {
  private readonly backend: LogQueryBackend;
  private readonly query: string;
  private readonly lookbackHours: number;
  private readonly limit: number;
  private readonly sourceId: string;
  private readonly embedConcurrency: number;
  private readonly now: () => Date;
  /** Buckets seen by the last window fetch, keyed by document id. */
  private buckets = new Map<string, LogBucket>();

  public constructor(backend: LogQueryBackend, opts: LokiLogSourceOptions) {
    this.backend = backend;
    this.query = opts.query;
    this.lookbackHours = opts.lookbackHours;
    this.limit = opts.limit ?? 5000;
    this.sourceId = opts.sourceId ?? `LokiLogSource:${opts.query}`;
    this.embedConcurrency = opts.embedConcurrency ?? 1;
    this.now = opts.now ?? (() => new Date());
  }

  public identify(): string {
    return this.sourceId;
  }

  public async diff(existing: ExistingDocuments): Promise<DocumentRef[]> {
    const buckets = await this.fetchWindow();
    const out: DocumentRef[] = [];
    for (const b of buckets) {
      const known = existing.get(b.id);
      if (!known || known.version !== b.version) {
        out.push({ id: b.id, sourceId: this.sourceId, version: b.version });
      }
    }
    return out;
  }

  public async findDeleted(_existing: ExistingDocuments): Promise<IngestedDocument[]> {
    return [];
  }

  public async materialize(
    embedder: EmbeddingGenerator,
    documentId: string,
  ): Promise<IndexChunk[]> {
    let bucket = this.buckets.get(documentId);
    if (!bucket) {
      await this.fetchWindow();
      bucket = this.buckets.get(documentId);
    }
    if (!bucket) throw new Error(`Log window no longer contains ${documentId}`);

    const drafts: ChunkDraft[] = chunkLines(bucket.lines).map((text, i) => ({
      key: `${documentId}_chunk_${i}`,
      sourceFileName: documentId,
      pageNumber: i + 1,
      text,
    }));
    return embedChunks(embedder, drafts, this.embedConcurrency);
  }

  /**
   * Query the lookback window and refresh the bucket cache. The start is
   * floored to the hour so the oldest bucket is always a whole hour.
   */
  private async fetchWindow(): Promise<LogBucket[]> {
    const end = Math.floor(this.now().getTime() / 1000);
    const start = Math.floor((end - this.lookbackHours * 3600) / 3600) * 3600;
    const response = await this.backend.query(this.query, start, end, this.limit, "backward");
    if (response.status !== "success" || !response.data) {
      throw new SourceUnavailableError(this.sourceId, `query returned status "${response.status}"`);
    }
    const buckets = buildLogBuckets(response.data.result);
    this.buckets = new Map(buckets.map((b) => [b.id, b]));
    return buckets;
  }
}
