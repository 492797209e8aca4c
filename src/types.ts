/**
 * Shared document / record / chunk types used throughout the ingestion,
 * ledger and semantic index layers.
 */

/** Identity + version of one indexable unit, as reported by a content source. */
export interface DocumentRef {
  /** Source-local identity (file name, or `<hour>_<labels>` for log windows). */
  readonly id: string;
  /** Stable identity of the owning source instance. */
  readonly sourceId: string;
  /** Opaque change marker. Equal versions mean no re-index is needed. */
  readonly version: string;
}

/** Ledger-side pointer from a document to one chunk key in the semantic index. */
export interface IngestedRecord {
  /** Chunk key in the semantic index. */
  readonly id: string;
  readonly documentId: string;
  readonly documentSourceId: string;
}

/** A document as recorded in the ledger, together with the records it owns. */
export interface IngestedDocument extends DocumentRef {
  readonly records: readonly IngestedRecord[];
}

/**
 * The unit actually embedded and stored. Produced fresh on every (re-)index of
 * a document; never patched in place.
 */
export interface IndexChunk {
  /** Key derived from the document id and chunk ordinal, unique within its source. */
  readonly key: string;
  readonly sourceFileName: string;
  /** Page (PDF) or sequence (logs) number, starting at 1. */
  readonly pageNumber: number;
  readonly text: string;
  readonly vector: Float32Array;
}

/** Where a chunk lives in the index: its key within the owning source. */
export interface IndexedKey {
  readonly sourceId: string;
  readonly key: string;
}

/** A ranked search hit. */
export interface ScoredChunk {
  readonly sourceId: string;
  readonly chunk: IndexChunk;
  readonly score: number;
}

/** External `text -> vector` capability. Assume rate-limited, slow and fallible. */
export interface EmbeddingGenerator {
  embed(text: string): Promise<Float32Array>;
  getModelName(): string;
}

/**
 * Contract the pipeline requires of the vector store. Entries are partitioned
 * by owning source, so two sources may use the same chunk key.
 */
export interface SemanticIndex {
  /** Full replace of each chunk's key within `sourceId`. */
  upsert(sourceId: string, chunks: readonly IndexChunk[]): Promise<void>;
  delete(sourceId: string, keys: readonly string[]): Promise<void>;
  search(
    query: Float32Array,
    topK: number,
    filter?: (chunk: IndexChunk, sourceId: string) => boolean,
  ): Promise<ScoredChunk[]>;
  /** Every entry currently stored. */
  keys(): IndexedKey[];
}

/** Read-only, source-scoped view of the ledger handed to content sources. */
export interface ExistingDocuments {
  get(id: string): IngestedDocument | undefined;
  list(): IngestedDocument[];
}

/**
 * Pluggable content source. Implementations must not mutate the ledger; the
 * orchestrator owns every write.
 */
export interface ContentSource {
  /** Deterministic and stable across restarts; partitions the ledger. */
  identify(): string;
  /** Documents that are new or whose version differs from the ledger. */
  diff(existing: ExistingDocuments): Promise<DocumentRef[]>;
  /** Ledger documents that no longer exist at the source. */
  findDeleted(existing: ExistingDocuments): Promise<IngestedDocument[]>;
  /** Read, chunk and embed one document. Rejects if any chunk fails to embed. */
  materialize(embedder: EmbeddingGenerator, documentId: string): Promise<IndexChunk[]>;
}
