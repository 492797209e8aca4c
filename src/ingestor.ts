import { describeError, LedgerError, MalformedContentError } from "./errors";
import type { IngestionLedger } from "./ledger/ledger";
import { emptyReport, type SourceReport, type StatusManager } from "./status";
import type {
  ContentSource,
  DocumentRef,
  EmbeddingGenerator,
  IndexChunk,
  IngestedDocument,
  SemanticIndex,
} from "./types";

/** The ledger operations the orchestrator depends on. */
export type LedgerStore = Pick<
  IngestionLedger,
  | "viewFor"
  | "find"
  | "listSources"
  | "listBySource"
  | "recordsWithKeys"
  | "upsert"
  | "delete"
  | "counts"
>;

export interface DataIngestorOptions {
  ledger: LedgerStore;
  index: SemanticIndex;
  embedder: EmbeddingGenerator;
  verbose?: boolean;
  status?: StatusManager;
}

/**
 * Drives the diff / delete / materialize / upsert / commit cycle for every
 * registered source.
 *
 * Per changed document the order is: materialize the new chunk set, upsert it
 * into the index, drop the previous version's keys that the new set does not
 * reuse, then commit document and records to the ledger in one transaction. A
 * failure anywhere before the commit leaves the ledger on the old version, so
 * the document is retried whole on the next pass while its old chunks keep
 * being served.
 */
export class DataIngestor {
  private readonly ledger: LedgerStore;
  private readonly index: SemanticIndex;
  private readonly embedder: EmbeddingGenerator;
  private readonly verbose: boolean;
  private readonly status?: StatusManager;
  private inFlight?: Promise<SourceReport[]>;

  public constructor(opts: DataIngestorOptions) {
    this.ledger = opts.ledger;
    this.index = opts.index;
    this.embedder = opts.embedder;
    this.verbose = !!opts.verbose;
    this.status = opts.status;
  }

  /** Whether a pass started by {@link ingestAll} is still running. */
  public get running(): boolean {
    return this.inFlight !== undefined;
  }

  /**
   * One pass over `sources`, in order. Calls made while a pass is running
   * join that pass instead of starting another.
   *
   * @throws LedgerError when the ledger fails; the pass stops there.
   */
  public ingestAll(sources: readonly ContentSource[]): Promise<SourceReport[]> {
    if (this.inFlight) return this.inFlight;
    const pass = this.runPass(sources).finally(() => {
      this.inFlight = undefined;
    });
    this.inFlight = pass;
    return pass;
  }

  /**
   * Bring the ledger and index up to date with one source. Source-level
   * failures are recorded on the report; only ledger failures reject.
   */
  public async ingest(source: ContentSource): Promise<SourceReport> {
    const sourceId = source.identify();
    const report = emptyReport(sourceId);
    try {
      const existing = await this.ledger.viewFor(sourceId);

      for (const doc of await source.findDeleted(existing)) {
        await this.removeDocument(doc, report);
      }

      const changed = await source.diff(existing);
      if (this.verbose) {
        console.error(`[verbose] ${sourceId}: ${changed.length} new or modified document(s)`);
      }
      for (const ref of changed) {
        await this.indexDocument(source, ref, report);
      }
    } catch (e) {
      if (e instanceof LedgerError) throw e;
      report.error = describeError(e);
      console.error(`[Ingest] Source ${sourceId} skipped this pass: ${report.error}`);
    }
    this.status?.recordSource(report);
    console.error(
      `[Ingest] ${sourceId}: +${report.added} ~${report.updated} -${report.deleted}` +
        ` failed=${report.failed} chunks=${report.chunksWritten}`,
    );
    return report;
  }

  private async runPass(sources: readonly ContentSource[]): Promise<SourceReport[]> {
    this.status?.beginPass();
    const started = Date.now();
    const reports: SourceReport[] = [];
    try {
      for (const source of sources) {
        reports.push(await this.ingest(source));
      }
    } catch (e) {
      this.status?.endPass(undefined, describeError(e));
      throw e;
    }
    const counts = await this.ledger.counts();
    this.status?.endPass({ documents: counts.documents, chunks: counts.records });
    console.error(
      `[Ingest] Pass complete in ${Date.now() - started}ms: ${counts.documents} document(s), ${counts.records} chunk(s) indexed`,
    );
    return reports;
  }

  /**
   * Bring ledger and index back into one-to-one correspondence, e.g. after a
   * restart with a stale or partial index file. A document with chunks missing
   * from the index is forgotten (its remaining chunks dropped) so the next pass
   * indexes it again; index entries no document owns are deleted.
   *
   * @throws LedgerError when the ledger fails; index failures reject as well.
   */
  public async reconcile(): Promise<{ forgotten: number; orphaned: number }> {
    const indexed = new Map<string, Set<string>>();
    for (const { sourceId, key } of this.index.keys()) {
      let keys = indexed.get(sourceId);
      if (!keys) {
        keys = new Set();
        indexed.set(sourceId, keys);
      }
      keys.add(key);
    }

    let forgotten = 0;
    for (const sourceId of await this.ledger.listSources()) {
      const present = indexed.get(sourceId) ?? new Set<string>();
      for (const doc of await this.ledger.listBySource(sourceId)) {
        const keys = doc.records.map((r) => r.id);
        const complete = keys.every((k) => present.has(k));
        for (const k of keys) present.delete(k);
        if (complete) continue;
        await this.index.delete(sourceId, keys);
        await this.ledger.delete(doc.id, sourceId);
        forgotten++;
      }
    }

    let orphaned = 0;
    for (const [sourceId, keys] of indexed) {
      if (keys.size === 0) continue;
      await this.index.delete(sourceId, [...keys]);
      orphaned += keys.size;
    }
    if (forgotten > 0 || orphaned > 0) {
      console.error(
        `[Index] Reconciled with ledger: forgot ${forgotten} document(s), removed ${orphaned} orphaned chunk(s)`,
      );
    }
    return { forgotten, orphaned };
  }

  /** Index entries first; the ledger row survives a failed index delete. */
  private async removeDocument(doc: IngestedDocument, report: SourceReport): Promise<void> {
    try {
      await this.index.delete(doc.sourceId, doc.records.map((r) => r.id));
    } catch (e) {
      report.failed++;
      console.error(`[Ingest] Could not remove chunks of ${doc.id}: ${describeError(e)}`);
      return;
    }
    await this.ledger.delete(doc.id, doc.sourceId);
    report.deleted++;
    if (this.verbose) console.error(`[verbose] Removed ${doc.id} (${doc.records.length} chunks)`);
  }

  private async indexDocument(
    source: ContentSource,
    ref: DocumentRef,
    report: SourceReport,
  ): Promise<void> {
    const previous = await this.ledger.find(ref.id, ref.sourceId);
    if (previous && previous.version === ref.version) {
      report.unchanged++;
      return;
    }

    let chunks: IndexChunk[];
    try {
      chunks = await source.materialize(this.embedder, ref.id);
    } catch (e) {
      if (e instanceof LedgerError) throw e;
      report.failed++;
      if (e instanceof MalformedContentError) {
        console.error(`[Ingest] Warning: skipping ${ref.id}: ${e.message}`);
      } else {
        console.error(`[Ingest] Failed to materialize ${ref.id}, retrying next pass: ${describeError(e)}`);
      }
      return;
    }

    const keys = chunks.map((c) => c.key);
    const fresh = new Set(keys);
    if (fresh.size !== keys.length) {
      report.failed++;
      console.error(`[Ingest] Warning: skipping ${ref.id}: it produced duplicate chunk keys`);
      return;
    }
    const taken = (await this.ledger.recordsWithKeys(ref.sourceId, keys)).find(
      (r) => r.documentId !== ref.id,
    );
    if (taken) {
      report.failed++;
      console.error(
        `[Ingest] Warning: skipping ${ref.id}: chunk key ${taken.id} already belongs to ${taken.documentId}`,
      );
      return;
    }

    const stale = (previous?.records ?? []).map((r) => r.id).filter((k) => !fresh.has(k));
    try {
      await this.index.upsert(ref.sourceId, chunks);
      if (stale.length > 0) await this.index.delete(ref.sourceId, stale);
    } catch (e) {
      report.failed++;
      console.error(`[Ingest] Index write failed for ${ref.id}, retrying next pass: ${describeError(e)}`);
      return;
    }

    await this.ledger.upsert(ref, keys);
    if (previous) report.updated++;
    else report.added++;
    report.chunksWritten += chunks.length;
    if (this.verbose) {
      console.error(`[verbose] Indexed ${ref.id} v${ref.version} (${chunks.length} chunks)`);
    }
  }
}
