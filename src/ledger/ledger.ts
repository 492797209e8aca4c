import fs from "node:fs";
import path from "node:path";
import { createClient, type Client } from "@libsql/client";
import { and, asc, count, eq, inArray } from "drizzle-orm";
import { drizzle, type LibSQLDatabase } from "drizzle-orm/libsql";
import { LedgerError } from "../errors";
import type { DocumentRef, ExistingDocuments, IngestedDocument, IngestedRecord } from "../types";
import * as schema from "./schema";

type LedgerDb = LibSQLDatabase<typeof schema>;
type DocumentRow = typeof schema.documents.$inferSelect;
type RecordRow = typeof schema.records.$inferSelect;

function toRecord(row: RecordRow): IngestedRecord {
  return { id: row.id, documentId: row.documentId, documentSourceId: row.documentSourceId };
}

function toDocument(row: DocumentRow, recordRows: RecordRow[]): IngestedDocument {
  return {
    id: row.id,
    sourceId: row.sourceId,
    version: row.version,
    records: recordRows.map(toRecord),
  };
}

/**
 * Durable bookkeeping of every ingested document and the index keys it owns.
 * Two relational tables (documents, records) in SQLite; the only transactional
 * boundary is {@link upsert}, which replaces a document and its full record set
 * atomically.
 *
 * All public methods reject with {@link LedgerError} on storage failure.
 */
export class IngestionLedger {
  private constructor(
    private readonly client: Client,
    private readonly db: LedgerDb,
  ) {}

  /**
   * Open (creating if needed) a ledger at `filePath`. Pass `":memory:"` for a
   * throw-away ledger.
   */
  public static async open(filePath: string): Promise<IngestionLedger> {
    try {
      const inMemory = filePath === ":memory:";
      if (!inMemory) fs.mkdirSync(path.dirname(filePath), { recursive: true });
      const client = createClient({ url: inMemory ? ":memory:" : `file:${path.resolve(filePath)}` });
      if (!inMemory) await client.execute("PRAGMA journal_mode = WAL");
      await client.execute("PRAGMA foreign_keys = ON");
      await client.executeMultiple(schema.CREATE_SCHEMA_SQL);
      return new IngestionLedger(client, drizzle(client, { schema }));
    } catch (e) {
      throw new LedgerError(`Failed to open ledger at ${filePath}`, { cause: e });
    }
  }

  public close(): void {
    this.client.close();
  }

  /** Point lookup by `(id, sourceId)`. */
  public find(id: string, sourceId: string): Promise<IngestedDocument | undefined> {
    return this.run("find", async () => {
      const row = await this.db
        .select()
        .from(schema.documents)
        .where(and(eq(schema.documents.id, id), eq(schema.documents.sourceId, sourceId)))
        .get();
      if (!row) return undefined;
      const recordRows = await this.db
        .select()
        .from(schema.records)
        .where(
          and(eq(schema.records.documentId, id), eq(schema.records.documentSourceId, sourceId)),
        )
        .orderBy(asc(schema.records.ordinal))
        .all();
      return toDocument(row, recordRows);
    });
  }

  /** Every document of one source, with records, ordered by document id. */
  public listBySource(sourceId: string): Promise<IngestedDocument[]> {
    return this.run("listBySource", async () => {
      const rows = await this.db
        .select()
        .from(schema.documents)
        .where(eq(schema.documents.sourceId, sourceId))
        .orderBy(asc(schema.documents.id))
        .all();
      const recordRows = await this.db
        .select()
        .from(schema.records)
        .where(eq(schema.records.documentSourceId, sourceId))
        .orderBy(asc(schema.records.documentId), asc(schema.records.ordinal))
        .all();
      const byDocument = new Map<string, RecordRow[]>();
      for (const r of recordRows) {
        let arr = byDocument.get(r.documentId);
        if (!arr) {
          arr = [];
          byDocument.set(r.documentId, arr);
        }
        arr.push(r);
      }
      return rows.map((row) => toDocument(row, byDocument.get(row.id) ?? []));
    });
  }

  /** Distinct source ids present in the ledger. */
  public listSources(): Promise<string[]> {
    return this.run("listSources", async () => {
      const rows = await this.db
        .selectDistinct({ sourceId: schema.documents.sourceId })
        .from(schema.documents)
        .orderBy(asc(schema.documents.sourceId))
        .all();
      return rows.map((r) => r.sourceId);
    });
  }

  /** Records of `sourceId` whose chunk key is one of `keys`, whichever document owns them. */
  public recordsWithKeys(sourceId: string, keys: readonly string[]): Promise<IngestedRecord[]> {
    if (keys.length === 0) return Promise.resolve([]);
    return this.run("recordsWithKeys", async () => {
      const rows = await this.db
        .select()
        .from(schema.records)
        .where(
          and(eq(schema.records.documentSourceId, sourceId), inArray(schema.records.id, [...keys])),
        )
        .all();
      return rows.map(toRecord);
    });
  }

  /**
   * Detached, read-only snapshot of one source's documents. Content sources
   * receive this instead of the ledger itself so they cannot write to it.
   */
  public async viewFor(sourceId: string): Promise<ExistingDocuments> {
    const docs = await this.listBySource(sourceId);
    const byId = new Map(docs.map((d) => [d.id, d]));
    return {
      get: (id) => byId.get(id),
      list: () => [...docs],
    };
  }

  /**
   * Insert or replace a document together with its complete record set. The
   * statements run as one batch, so readers see either the old set or the new
   * one.
   *
   * @param recordKeys Chunk keys in chunk order.
   */
  public upsert(doc: DocumentRef, recordKeys: readonly string[]): Promise<void> {
    return this.run("upsert", async () => {
      const writeDocument = this.db
        .insert(schema.documents)
        .values({ id: doc.id, sourceId: doc.sourceId, version: doc.version })
        .onConflictDoUpdate({
          target: [schema.documents.id, schema.documents.sourceId],
          set: { version: doc.version },
        });
      const dropRecords = this.db
        .delete(schema.records)
        .where(
          and(
            eq(schema.records.documentId, doc.id),
            eq(schema.records.documentSourceId, doc.sourceId),
          ),
        );
      if (recordKeys.length === 0) {
        await this.db.batch([writeDocument, dropRecords]);
        return;
      }
      const writeRecords = this.db.insert(schema.records).values(
        recordKeys.map((key, ordinal) => ({
          id: key,
          documentId: doc.id,
          documentSourceId: doc.sourceId,
          ordinal,
        })),
      );
      await this.db.batch([writeDocument, dropRecords, writeRecords]);
    });
  }

  /** Delete a document and its records. Missing keys are a no-op. */
  public delete(id: string, sourceId: string): Promise<void> {
    return this.run("delete", async () => {
      await this.db.batch([
        this.db
          .delete(schema.records)
          .where(
            and(eq(schema.records.documentId, id), eq(schema.records.documentSourceId, sourceId)),
          ),
        this.db
          .delete(schema.documents)
          .where(and(eq(schema.documents.id, id), eq(schema.documents.sourceId, sourceId))),
      ]);
    });
  }

  /** Document / record totals across all sources. */
  public counts(): Promise<{ documents: number; records: number }> {
    return this.run("counts", async () => {
      const documents = await this.db.select({ n: count() }).from(schema.documents).get();
      const records = await this.db.select({ n: count() }).from(schema.records).get();
      return { documents: documents?.n ?? 0, records: records?.n ?? 0 };
    });
  }

  private async run<T>(op: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (e) {
      if (e instanceof LedgerError) throw e;
      throw new LedgerError(`Ledger ${op} failed: ${e instanceof Error ? e.message : String(e)}`, {
        cause: e,
      });
    }
  }
}
