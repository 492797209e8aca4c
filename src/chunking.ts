import { mapWithConcurrency } from "./concurrency";
import type { EmbeddingGenerator, IndexChunk } from "./types";

/** A chunk before its vector exists. */
export type ChunkDraft = Omit<IndexChunk, "vector">;

/** JSON log chunks flush at this many entries... */
export const LOG_CHUNK_MAX_ENTRIES = 10;
/** ...or once the newline-joined text grows past this many characters. */
export const LOG_CHUNK_MAX_CHARS = 1000;
/** Lines per chunk for windowed log buckets. */
export const LOG_LINES_PER_CHUNK = 10;

/**
 * Split arbitrary text into (roughly) fixed-size overlapping chunks. The
 * final chunk may be shorter. Overlap helps retain context continuity across
 * chunk boundaries for embedding similarity.
 *
 * @param size Target maximum characters per chunk (default 800).
 * @param overlap Characters of trailing overlap kept from the previous chunk
 * (default 120). Values >= size fall back to 15% of size.
 */
export function splitChunks(text: string, size = 800, overlap = 120): string[] {
  const step = overlap < size ? size - overlap : Math.max(1, size - Math.floor(size * 0.15));
  const out: string[] = [];
  let i = 0;
  while (i < text.length) {
    out.push(text.slice(i, i + size));
    if (i + size >= text.length) break;
    i += step;
  }
  return out;
}

/**
 * Group serialized log entries into chunk texts. Entries accumulate until
 * {@link LOG_CHUNK_MAX_ENTRIES} are held or the joined text exceeds
 * {@link LOG_CHUNK_MAX_CHARS}; the final partial group is always emitted.
 */
export function chunkLogEntries(
  entries: readonly string[],
  maxEntries = LOG_CHUNK_MAX_ENTRIES,
  maxChars = LOG_CHUNK_MAX_CHARS,
): string[] {
  const out: string[] = [];
  let current: string[] = [];
  for (const entry of entries) {
    current.push(entry);
    const joined = current.join("\n");
    if (current.length >= maxEntries || joined.length > maxChars) {
      out.push(joined);
      current = [];
    }
  }
  if (current.length > 0) out.push(current.join("\n"));
  return out;
}

/** Fixed-count line groups, joined by newline. */
export function chunkLines(lines: readonly string[], perChunk = LOG_LINES_PER_CHUNK): string[] {
  const out: string[] = [];
  for (let i = 0; i < lines.length; i += perChunk) {
    out.push(lines.slice(i, i + perChunk).join("\n"));
  }
  return out;
}

/**
 * Embed each draft once, at most `concurrency` calls in flight. Rejects on the
 * first failed embedding; nothing partial is returned.
 */
export async function embedChunks(
  embedder: EmbeddingGenerator,
  drafts: readonly ChunkDraft[],
  concurrency = 1,
): Promise<IndexChunk[]> {
  return mapWithConcurrency(drafts, concurrency, async (draft) => ({
    ...draft,
    vector: await embedder.embed(draft.text),
  }));
}
