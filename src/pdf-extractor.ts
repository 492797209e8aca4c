/**
 * PDF text extraction and caching module.
 *
 * Page texts are extracted with pdf-parse and stored in a single JSON cache
 * file so a re-index of an unchanged PDF (e.g. after the semantic index was
 * discarded) does not parse it again.
 *
 * Cache structure:
 *   {
 *     "version": 2,
 *     "entries": {
 *       "/absolute/path/to/file.pdf": {
 *         "pdfSize": 12345,
 *         "pdfMtime": "2024-01-01T00:00:00.000Z",
 *         "extractedAt": "2024-01-01T00:00:00.000Z",
 *         "pages": ["page one text", "page two text"]
 *       }
 *     }
 *   }
 *
 * An entry is stale when the PDF's size or mtime differ from what was cached.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { PDFParse } from "pdf-parse";
import { z } from "zod";
import { MalformedContentError } from "./errors";

/** Text of one page; numbering starts at 1. */
export interface PdfPage {
  pageNumber: number;
  text: string;
}

/** File facts used for cache invalidation. */
export interface PdfFileStat {
  size: number;
  /** ISO-8601 last-modified time. */
  mtime: string;
}

/** What the PDF source needs from an extractor. */
export interface PdfPageExtractor {
  extractPages(pdfAbsPath: string, stat: PdfFileStat): Promise<PdfPage[]>;
}

const CacheEntrySchema = z.object({
  pdfSize: z.number(),
  pdfMtime: z.string(),
  extractedAt: z.string(),
  pages: z.array(z.string()),
});

const CacheStoreSchema = z.object({
  version: z.literal(2),
  entries: z.record(CacheEntrySchema),
});

type PdfCacheEntry = z.infer<typeof CacheEntrySchema>;
type PdfCacheStore = z.infer<typeof CacheStoreSchema>;

/**
 * PDF page-text extraction utility with automatic caching.
 */
export class PdfExtractor implements PdfPageExtractor {
  private readonly cacheFilePath: string;
  private readonly verbose: boolean;
  private cacheStore: PdfCacheStore | null = null;

  /**
   * @param cacheFilePath Location of the shared JSON cache file.
   * @param verbose Enable additional logging
   */
  public constructor(cacheFilePath: string, verbose = false) {
    this.cacheFilePath = cacheFilePath;
    this.verbose = verbose;
  }

  /** Load the unified cache store from disk (once). Corrupt caches start fresh. */
  private async loadCacheStore(): Promise<PdfCacheStore> {
    if (this.cacheStore) return this.cacheStore;
    let parsed: PdfCacheStore = { version: 2, entries: {} };
    try {
      const cacheJson = await fs.readFile(this.cacheFilePath, "utf8");
      const result = CacheStoreSchema.safeParse(JSON.parse(cacheJson));
      if (result.success) parsed = result.data;
      else console.error(`[PDF] Cache store has an unexpected shape; starting fresh.`);
    } catch (e) {
      const missing = e instanceof Error && "code" in e && e.code === "ENOENT";
      if (!missing) console.error(`[PDF] Cache store unreadable; starting fresh:`, e);
    }
    this.cacheStore = parsed;
    return parsed;
  }

  /** Save the unified cache store to disk. Failures are logged, not thrown. */
  private async saveCacheStore(store: PdfCacheStore): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.cacheFilePath), { recursive: true });
      await fs.writeFile(this.cacheFilePath, JSON.stringify(store), "utf8");
    } catch (e) {
      console.error(`[PDF] Failed to save cache store:`, e);
    }
  }

  private async getCached(pdfAbsPath: string, stat: PdfFileStat): Promise<PdfCacheEntry | null> {
    const store = await this.loadCacheStore();
    const entry = store.entries[pdfAbsPath];
    if (!entry) {
      if (this.verbose) console.error(`[PDF] Cache miss for ${path.basename(pdfAbsPath)}`);
      return null;
    }
    if (entry.pdfSize === stat.size && entry.pdfMtime === stat.mtime) {
      if (this.verbose) console.error(`[PDF] Cache hit for ${path.basename(pdfAbsPath)}`);
      return entry;
    }
    if (this.verbose) console.error(`[PDF] Cache stale for ${path.basename(pdfAbsPath)}`);
    return null;
  }

  /**
   * Extract per-page text, using the cache when the file is unchanged.
   *
   * @throws {MalformedContentError} If the file cannot be parsed as a PDF.
   */
  public async extractPages(pdfAbsPath: string, stat: PdfFileStat): Promise<PdfPage[]> {
    const cached = await this.getCached(pdfAbsPath, stat);
    if (cached) return toPages(cached.pages);

    if (this.verbose) console.error(`[PDF] Extracting text from ${path.basename(pdfAbsPath)}...`);
    const dataBuffer = await fs.readFile(pdfAbsPath);
    let pages: string[];
    const parser = new PDFParse({ data: dataBuffer });
    try {
      const textResult = await parser.getText();
      pages = textResult.pages.map((p) => p.text);
    } catch (e) {
      throw new MalformedContentError(path.basename(pdfAbsPath), "PDF text extraction failed", {
        cause: e,
      });
    } finally {
      await parser.destroy();
    }

    const store = await this.loadCacheStore();
    store.entries[pdfAbsPath] = {
      pdfSize: stat.size,
      pdfMtime: stat.mtime,
      extractedAt: new Date().toISOString(),
      pages,
    };
    await this.saveCacheStore(store);
    return toPages(pages);
  }
}

function toPages(texts: readonly string[]): PdfPage[] {
  return texts.map((text, i) => ({ pageNumber: i + 1, text }));
}
