import fs from "node:fs/promises";
import path from "node:path";
import { chunkLogEntries, embedChunks, type ChunkDraft } from "../chunking";
import { MalformedContentError } from "../errors";
import type {
  ContentSource,
  DocumentRef,
  EmbeddingGenerator,
  ExistingDocuments,
  IndexChunk,
  IngestedDocument,
} from "../types";
import { diffFiles, fileStem, findDeletedFiles, listSourceFiles } from "./directory";

export interface JsonLogDirectorySourceOptions {
  /** Concurrent embedding calls per document (default 1). */
  embedConcurrency?: number;
}

/**
 * Text used for one log entry: string entries as-is, anything else as compact
 * JSON.
 */
export function serializeLogEntry(entry: unknown): string {
  return typeof entry === "string" ? entry : JSON.stringify(entry);
}

/**
 * `*.json` files in one directory, each holding a JSON array of log entries.
 * Version is the file's mtime; entries are grouped into chunks keyed
 * `<file stem>_<page>`.
 */
export class JsonLogDirectorySource implements ContentSource {
  private readonly dir: string;
  private readonly embedConcurrency: number;

  public constructor(dir: string, opts: JsonLogDirectorySourceOptions = {}) {
    this.dir = path.resolve(dir);
    this.embedConcurrency = opts.embedConcurrency ?? 1;
  }

  public identify(): string {
    return `JsonLogDirectorySource:${this.dir}`;
  }

  public async diff(existing: ExistingDocuments): Promise<DocumentRef[]> {
    const files = await listSourceFiles(this.identify(), this.dir, "*.json");
    return diffFiles(this.identify(), files, existing);
  }

  public async findDeleted(existing: ExistingDocuments): Promise<IngestedDocument[]> {
    const files = await listSourceFiles(this.identify(), this.dir, "*.json");
    return findDeletedFiles(files, existing);
  }

  public async materialize(
    embedder: EmbeddingGenerator,
    documentId: string,
  ): Promise<IndexChunk[]> {
    const entries = await this.readEntries(documentId);
    const stem = fileStem(documentId);
    const drafts: ChunkDraft[] = chunkLogEntries(entries.map(serializeLogEntry)).map(
      (text, i) => ({
        key: `${stem}_${i + 1}`,
        sourceFileName: documentId,
        pageNumber: i + 1,
        text,
      }),
    );
    return embedChunks(embedder, drafts, this.embedConcurrency);
  }

  private async readEntries(documentId: string): Promise<unknown[]> {
    const raw = await fs.readFile(path.join(this.dir, documentId), "utf8");
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      throw new MalformedContentError(documentId, "not valid JSON", { cause: e });
    }
    if (parsed === null) return [];
    if (!Array.isArray(parsed)) {
      throw new MalformedContentError(documentId, "expected a JSON array of log entries");
    }
    return parsed;
  }
}
