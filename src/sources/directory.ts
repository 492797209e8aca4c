import fs from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import { SourceUnavailableError } from "../errors";
import type { DocumentRef, ExistingDocuments, IngestedDocument } from "../types";

/** One file in a watched directory, identified by its file name. */
export interface SourceFile {
  /** File name (document id). */
  readonly id: string;
  readonly abs: string;
  readonly size: number;
  /** Last-modified time, ISO-8601 (the document version). */
  readonly version: string;
}

/**
 * List the files directly inside `dir` matching `pattern` (non-recursive). A
 * missing or unreadable directory aborts the source rather than looking like
 * "every file was deleted".
 */
export async function listSourceFiles(
  sourceId: string,
  dir: string,
  pattern: string,
): Promise<SourceFile[]> {
  try {
    const st = await fs.stat(dir);
    if (!st.isDirectory()) throw new Error("not a directory");
  } catch (e) {
    throw new SourceUnavailableError(sourceId, `cannot read directory ${dir}`, { cause: e });
  }
  const names = await fg(pattern, { cwd: dir, onlyFiles: true, dot: false, deep: 1 });
  const files: SourceFile[] = [];
  for (const name of names.sort()) {
    const abs = path.join(dir, name);
    const st = await fs.stat(abs);
    files.push({ id: path.basename(name), abs, size: st.size, version: st.mtime.toISOString() });
  }
  return files;
}

/** Files that are new, or whose mtime differs from the ledger's version. */
export function diffFiles(
  sourceId: string,
  files: readonly SourceFile[],
  existing: ExistingDocuments,
): DocumentRef[] {
  const out: DocumentRef[] = [];
  for (const f of files) {
    const known = existing.get(f.id);
    if (!known || known.version !== f.version) {
      out.push({ id: f.id, sourceId, version: f.version });
    }
  }
  return out;
}

/** Ledger documents whose file is gone. */
export function findDeletedFiles(
  files: readonly SourceFile[],
  existing: ExistingDocuments,
): IngestedDocument[] {
  const present = new Set(files.map((f) => f.id));
  return existing.list().filter((d) => !present.has(d.id));
}

/** File name without its extension; the prefix of every chunk key. */
export function fileStem(fileName: string): string {
  return path.basename(fileName, path.extname(fileName));
}
