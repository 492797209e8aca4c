import { foreignKey, integer, primaryKey, sqliteTable, text } from "drizzle-orm/sqlite-core";

export const documents = sqliteTable(
  "documents",
  {
    id: text("id").notNull(),
    sourceId: text("source_id").notNull(),
    version: text("version").notNull(),
  },
  (t) => [primaryKey({ columns: [t.id, t.sourceId] })],
);

export const records = sqliteTable(
  "records",
  {
    id: text("id").notNull(), // chunk key in the semantic index
    documentId: text("document_id").notNull(),
    documentSourceId: text("document_source_id").notNull(),
    ordinal: integer("ordinal").notNull(), // 0..N-1 within the document
  },
  (t) => [
    primaryKey({ columns: [t.documentId, t.documentSourceId, t.id] }),
    foreignKey({
      columns: [t.documentId, t.documentSourceId],
      foreignColumns: [documents.id, documents.sourceId],
    }).onDelete("cascade"),
  ],
);

/**
 * DDL matching the tables above. Applied once when the ledger is opened; there
 * is no migration history beyond "create if missing".
 */
export const CREATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS documents (
  id TEXT NOT NULL,
  source_id TEXT NOT NULL,
  version TEXT NOT NULL,
  PRIMARY KEY (id, source_id)
);
CREATE TABLE IF NOT EXISTS records (
  id TEXT NOT NULL,
  document_id TEXT NOT NULL,
  document_source_id TEXT NOT NULL,
  ordinal INTEGER NOT NULL,
  PRIMARY KEY (document_id, document_source_id, id),
  FOREIGN KEY (document_id, document_source_id)
    REFERENCES documents (id, source_id) ON DELETE CASCADE
);
`;
