import type { EmbeddingGenerator, SemanticIndex } from "./types";

export interface SearchHit {
  /** Source the chunk belongs to; keys are only unique within it. */
  sourceId: string;
  key: string;
  sourceFileName: string;
  pageNumber: number;
  text: string;
  /** Cosine similarity rounded to 4 decimals. */
  score: number;
}

export const MAX_TOP_K = 50;

/** Read side of the index: embed the query once, rank by cosine. */
export class SemanticSearch {
  public constructor(
    private readonly embedder: EmbeddingGenerator,
    private readonly index: SemanticIndex,
  ) {}

  /**
   * @param topK Clamped to 1..{@link MAX_TOP_K}.
   * @param sourceFileName Restrict hits to one document.
   */
  public async search(query: string, topK = 5, sourceFileName?: string): Promise<SearchHit[]> {
    const k = Math.max(1, Math.min(MAX_TOP_K, Math.floor(topK)));
    const vector = await this.embedder.embed(query);
    const filter = sourceFileName
      ? (c: { sourceFileName: string }) => c.sourceFileName === sourceFileName
      : undefined;
    const scored = await this.index.search(vector, k, filter);
    return scored.map(({ sourceId, chunk, score }) => ({
      sourceId,
      key: chunk.key,
      sourceFileName: chunk.sourceFileName,
      pageNumber: chunk.pageNumber,
      text: chunk.text,
      score: Number(score.toFixed(4)),
    }));
  }
}
