import fs from "node:fs/promises";
import path from "node:path";
import { embedChunks, splitChunks, type ChunkDraft } from "../chunking";
import type { PdfPage, PdfPageExtractor } from "../pdf-extractor";
import type {
  ContentSource,
  DocumentRef,
  EmbeddingGenerator,
  ExistingDocuments,
  IndexChunk,
  IngestedDocument,
} from "../types";
import { diffFiles, fileStem, findDeletedFiles, listSourceFiles } from "./directory";

export interface PdfDirectorySourceOptions {
  chunkSize?: number;
  chunkOverlap?: number;
  embedConcurrency?: number;
}

/**
 * `*.pdf` files in one directory. Version is the file's mtime. Each page is
 * split into overlapping character windows keyed `<file stem>_<page>_<n>`.
 */
export class PdfDirectorySource implements ContentSource {
  private readonly dir: string;
  private readonly extractor: PdfPageExtractor;
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;
  private readonly embedConcurrency: number;

  public constructor(dir: string, extractor: PdfPageExtractor, opts: PdfDirectorySourceOptions = {}) {
    this.dir = path.resolve(dir);
    this.extractor = extractor;
    this.chunkSize = opts.chunkSize ?? 800;
    this.chunkOverlap = opts.chunkOverlap ?? 120;
    this.embedConcurrency = opts.embedConcurrency ?? 1;
  }

  public identify(): string {
    return `PdfDirectorySource:${this.dir}`;
  }

  public async diff(existing: ExistingDocuments): Promise<DocumentRef[]> {
    const files = await listSourceFiles(this.identify(), this.dir, "*.pdf");
    return diffFiles(this.identify(), files, existing);
  }

  public async findDeleted(existing: ExistingDocuments): Promise<IngestedDocument[]> {
    const files = await listSourceFiles(this.identify(), this.dir, "*.pdf");
    return findDeletedFiles(files, existing);
  }

  public async materialize(
    embedder: EmbeddingGenerator,
    documentId: string,
  ): Promise<IndexChunk[]> {
    const abs = path.join(this.dir, documentId);
    const st = await fs.stat(abs);
    const pages = await this.extractor.extractPages(abs, {
      size: st.size,
      mtime: st.mtime.toISOString(),
    });
    return embedChunks(embedder, this.draftChunks(documentId, pages), this.embedConcurrency);
  }

  private draftChunks(documentId: string, pages: readonly PdfPage[]): ChunkDraft[] {
    const stem = fileStem(documentId);
    const drafts: ChunkDraft[] = [];
    for (const page of pages) {
      const text = page.text.trim();
      if (!text) continue;
      splitChunks(text, this.chunkSize, this.chunkOverlap).forEach((piece, i) => {
        drafts.push({
          key: `${stem}_${page.pageNumber}_${i}`,
          sourceFileName: documentId,
          pageNumber: page.pageNumber,
          text: piece,
        });
      });
    }
    return drafts;
  }
}
