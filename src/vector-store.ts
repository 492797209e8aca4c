import fs from "node:fs/promises";
import fsSync from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { IndexChunk, IndexedKey, ScoredChunk, SemanticIndex } from "./types";

/**
 * On-disk layout. Vectors are serialized as base64-encoded 32-bit floats
 * (platform byte order, little-endian on every supported target).
 */
const StoredChunkSchema = z.object({
  sourceId: z.string(),
  key: z.string(),
  sourceFileName: z.string(),
  pageNumber: z.number(),
  text: z.string(),
  vector: z.string(),
});

const StoreFileSchema = z.object({
  version: z.literal(2),
  meta: z.object({
    modelName: z.string().optional(),
    savedAt: z.string().optional(),
    embEncoding: z.string().optional(),
  }),
  chunks: z.array(z.unknown()),
});

/** Outcome of {@link JsonVectorStore.load}. */
export type LoadResult = "loaded" | "missing" | "incompatible";

/**
 * Compute cosine similarity between two Float32 vectors. Length mismatch is
 * handled by comparing up to the shortest length.
 *
 * @returns Cosine similarity in range [-1, 1]
 */
export function cosine(a: Float32Array, b: Float32Array): number {
  let dot = 0,
    na = 0,
    nb = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const x = a[i],
      y = b[i];
    dot += x * y;
    na += x * x;
    nb += y * y;
  }
  return dot / (Math.sqrt(na) * Math.sqrt(nb) + 1e-10);
}

function encodeVector(v: Float32Array): string {
  return Buffer.from(v.buffer, v.byteOffset, v.byteLength).toString("base64");
}

function decodeVector(encoded: string): Float32Array | null {
  const buf = Buffer.from(encoded, "base64");
  if (buf.byteLength % 4 !== 0) return null;
  // Copy into a fresh buffer: pooled Buffers are not 4-byte aligned.
  return new Float32Array(new Uint8Array(buf).buffer);
}

/**
 * Key/value vector store with an in-memory working set, optionally persisted to
 * a single JSON file after every mutation. Chunks are held per owning source;
 * search is a linear cosine scan over all of them.
 *
 * Persistence failures are thrown, never swallowed: the ingestion orchestrator
 * relies on a rejected write to hold back the ledger commit.
 */
export class JsonVectorStore implements SemanticIndex {
  private readonly bySource = new Map<string, Map<string, IndexChunk>>();
  private readonly storePath?: string;
  private readonly modelName: string;
  private readonly verbose: boolean;

  /**
   * @param storePath File to persist to. Omit for a purely in-memory store.
   * @param modelName Embedding model the vectors come from (compatibility check).
   */
  public constructor(storePath?: string, modelName = "", verbose = false) {
    this.storePath = storePath;
    this.modelName = modelName;
    this.verbose = verbose;
  }

  /** Number of stored chunks. */
  public get size(): number {
    let n = 0;
    for (const chunks of this.bySource.values()) n += chunks.size;
    return n;
  }

  public keys(): IndexedKey[] {
    const out: IndexedKey[] = [];
    for (const [sourceId, chunks] of this.bySource) {
      for (const key of chunks.keys()) out.push({ sourceId, key });
    }
    return out;
  }

  public get(sourceId: string, key: string): IndexChunk | undefined {
    return this.bySource.get(sourceId)?.get(key);
  }

  /**
   * Hydrate from disk. A store written with a different embedding model is
   * reported as incompatible and left unloaded (the caller decides how to
   * rebuild). Unparseable entries are dropped.
   */
  public async load(): Promise<LoadResult> {
    if (!this.storePath || !fsSync.existsSync(this.storePath)) return "missing";
    const raw = await fs.readFile(this.storePath, "utf8");
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      json = null;
    }
    const parsed = StoreFileSchema.safeParse(json);
    if (!parsed.success) {
      console.error(`[Index] Store at ${this.storePath} is unreadable; starting empty.`);
      return "incompatible";
    }
    const { meta, chunks } = parsed.data;
    if (meta.modelName && this.modelName && meta.modelName !== this.modelName) {
      console.error(
        `[Index] Stored index built with ${meta.modelName}, current model is ${this.modelName}.`,
      );
      return "incompatible";
    }
    this.bySource.clear();
    let dropped = 0;
    for (const entry of chunks) {
      const c = StoredChunkSchema.safeParse(entry);
      const vector = c.success ? decodeVector(c.data.vector) : null;
      if (!c.success || !vector) {
        dropped++;
        continue;
      }
      const { sourceId, ...chunk } = c.data;
      this.partition(sourceId).set(chunk.key, { ...chunk, vector });
    }
    console.error(`[Index] Loaded persisted index: ${this.size} chunks.`);
    if (dropped > 0) console.error(`[Index] Dropped ${dropped} unreadable entries.`);
    return "loaded";
  }

  public async upsert(sourceId: string, chunks: readonly IndexChunk[]): Promise<void> {
    if (chunks.length === 0) return;
    const partition = this.partition(sourceId);
    for (const c of chunks) partition.set(c.key, c);
    await this.save();
  }

  public async delete(sourceId: string, keys: readonly string[]): Promise<void> {
    const partition = this.bySource.get(sourceId);
    if (!partition) return;
    let removed = 0;
    for (const k of keys) if (partition.delete(k)) removed++;
    if (partition.size === 0) this.bySource.delete(sourceId);
    if (removed > 0) await this.save();
  }

  /** Forget every chunk (and persist the empty store). */
  public async clear(): Promise<void> {
    this.bySource.clear();
    await this.save();
  }

  public async search(
    query: Float32Array,
    topK: number,
    filter?: (chunk: IndexChunk, sourceId: string) => boolean,
  ): Promise<ScoredChunk[]> {
    const scored: ScoredChunk[] = [];
    for (const [sourceId, chunks] of this.bySource) {
      for (const chunk of chunks.values()) {
        if (filter && !filter(chunk, sourceId)) continue;
        scored.push({ sourceId, chunk, score: cosine(chunk.vector, query) });
      }
    }
    scored.sort((a, b) => b.score - a.score); // descending score
    return scored.slice(0, Math.max(0, topK));
  }

  private partition(sourceId: string): Map<string, IndexChunk> {
    let chunks = this.bySource.get(sourceId);
    if (!chunks) {
      chunks = new Map();
      this.bySource.set(sourceId, chunks);
    }
    return chunks;
  }

  /** Write the whole store to a temp file and rename it over the old one. */
  private async save(): Promise<void> {
    if (!this.storePath) return; // in-memory only
    const out = {
      version: 2,
      meta: {
        modelName: this.modelName,
        savedAt: new Date().toISOString(),
        embEncoding: "f32-base64",
      },
      chunks: [...this.bySource].flatMap(([sourceId, chunks]) =>
        [...chunks.values()].map((c) => ({
          sourceId,
          key: c.key,
          sourceFileName: c.sourceFileName,
          pageNumber: c.pageNumber,
          text: c.text,
          vector: encodeVector(c.vector),
        })),
      ),
    };
    await fs.mkdir(path.dirname(this.storePath), { recursive: true });
    const tmp = `${this.storePath}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(out));
    await fs.rename(tmp, this.storePath);
    if (this.verbose) console.error(`[Index][verbose] Persisted ${out.chunks.length} chunks`);
  }
}
