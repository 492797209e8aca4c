import type { LogQueryBackend, LokiQueryResponse, QueryDirection } from "../loki/types";
import type {
  EmbeddingGenerator,
  IndexChunk,
  IndexedKey,
  ScoredChunk,
  SemanticIndex,
} from "../types";
import { JsonVectorStore } from "../vector-store";

/**
 * Deterministic embedder: a 26-dim letter histogram of the lowercased text.
 * Records every call; `failWhen` makes matching texts reject.
 */
export class FakeEmbedder implements EmbeddingGenerator {
  public readonly calls: string[] = [];
  public failWhen?: (text: string) => boolean;

  public getModelName(): string {
    return "fake-letter-histogram";
  }

  public async embed(text: string): Promise<Float32Array> {
    this.calls.push(text);
    if (this.failWhen?.(text)) throw new Error(`embedding failed for "${text.slice(0, 20)}"`);
    const v = new Float32Array(26);
    for (const ch of text.toLowerCase()) {
      const i = ch.charCodeAt(0) - 97;
      if (i >= 0 && i < 26) v[i] += 1;
    }
    return v;
  }
}

/** In-memory index that counts writes and can be told to fail them. */
export class RecordingIndex implements SemanticIndex {
  public readonly store = new JsonVectorStore();
  public upserts = 0;
  public deletes = 0;
  public failUpsert = false;
  public failDelete = false;

  public async upsert(sourceId: string, chunks: readonly IndexChunk[]): Promise<void> {
    if (this.failUpsert) throw new Error("index upsert unavailable");
    this.upserts++;
    await this.store.upsert(sourceId, chunks);
  }

  public async delete(sourceId: string, keys: readonly string[]): Promise<void> {
    if (this.failDelete) throw new Error("index delete unavailable");
    this.deletes++;
    await this.store.delete(sourceId, keys);
  }

  public search(
    query: Float32Array,
    topK: number,
    filter?: (chunk: IndexChunk, sourceId: string) => boolean,
  ): Promise<ScoredChunk[]> {
    return this.store.search(query, topK, filter);
  }

  public keys(): IndexedKey[] {
    return this.store.keys();
  }

  /** Sorted chunk keys of one source. */
  public keysOf(sourceId: string): string[] {
    return this.store
      .keys()
      .filter((k) => k.sourceId === sourceId)
      .map((k) => k.key)
      .sort();
  }
}

export interface RecordedQuery {
  query: string;
  start: number;
  end: number;
  limit?: number;
  direction?: QueryDirection;
}

/** Log backend answering every query with `response`, or rejecting with `error`. */
export class StubLogBackend implements LogQueryBackend {
  public readonly queries: RecordedQuery[] = [];
  public error?: Error;

  public constructor(public response: LokiQueryResponse) {}

  public async query(
    query: string,
    start: number,
    end: number,
    limit?: number,
    direction?: QueryDirection,
  ): Promise<LokiQueryResponse> {
    this.queries.push({ query, start, end, limit, direction });
    if (this.error) throw this.error;
    return this.response;
  }
}

/** Nanosecond timestamp string for an ISO date. */
export function isoToNanos(iso: string): string {
  return (BigInt(Date.parse(iso)) * 1_000_000n).toString();
}
