import fs from "node:fs/promises";
import { env, pipeline, type FeatureExtractionPipeline } from "@huggingface/transformers";
import { DEFAULT_MODEL_NAME } from "./config";
import type { EmbeddingGenerator } from "./types";

/** Error thrown when attempting to embed before initialization. */
export class EmbedderNotInitializedError extends Error {
  constructor() {
    super("Embedder not initialized. Call init() first.");
    this.name = "EmbedderNotInitializedError";
  }
}

/** The model produced something other than one float32 vector of the expected width. */
export class EmbeddingShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EmbeddingShapeError";
  }
}

/**
 * Local sentence-embedding model (mean pooled, L2 normalized). One instance
 * serves every source; calls may run concurrently.
 */
export class Embeddings implements EmbeddingGenerator {
  private readonly modelName: string;
  private extractor: FeatureExtractionPipeline | null = null;
  private width: number | null = null;

  public constructor(modelName: string = DEFAULT_MODEL_NAME) {
    this.modelName = modelName.trim() || DEFAULT_MODEL_NAME;
  }

  /**
   * Point the transformers model cache at `cacheDir` (created if missing).
   * Must run before {@link init}.
   */
  public static async configureCache(cacheDir: string): Promise<void> {
    await fs.mkdir(cacheDir, { recursive: true });
    env.useBrowserCache = false;
    env.allowLocalModels = true;
    env.cacheDir = cacheDir;
    console.error(`[Embed] Using TRANSFORMERS cache at: ${cacheDir}`);
  }

  public getModelName(): string {
    return this.modelName;
  }

  /** Load the pipeline once; later calls are no-ops. */
  public async init(): Promise<void> {
    if (this.extractor) return;
    console.error(`[Embed] Loading embedding model: ${this.modelName}`);
    this.extractor = await pipeline("feature-extraction", this.modelName);
    console.error(`[Embed] Model ready: ${this.modelName}`);
  }

  /**
   * @throws {EmbedderNotInitializedError} If {@link init} has not been called.
   * @throws {EmbeddingShapeError} If the model output is not a float32 vector of
   * the width seen so far.
   */
  public async embed(text: string): Promise<Float32Array> {
    if (!this.extractor) throw new EmbedderNotInitializedError();
    const output = await this.extractor(text, { pooling: "mean", normalize: true });
    const data: unknown = output.data;
    if (!(data instanceof Float32Array)) {
      throw new EmbeddingShapeError(`${this.modelName} returned a non-float32 embedding`);
    }
    if (this.width === null) this.width = data.length;
    else if (data.length !== this.width) {
      throw new EmbeddingShapeError(
        `${this.modelName} returned ${data.length} dimensions, expected ${this.width}`,
      );
    }
    return data;
  }
}
