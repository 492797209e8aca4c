/**
 * Application entry point.
 *
 * 1. Load configuration (.env + environment).
 * 2. Configure the transformers cache and initialize the embedding model.
 * 3. Open the ingestion ledger and the persisted semantic index, then
 *    reconcile them: documents whose chunks the index lacks (missing,
 *    unreadable or other-model store) are forgotten and embedded again.
 * 4. Register sources in order: PDF directory, JSON log directory, Loki window.
 * 5. Run one ingestion pass (blocking), then optionally every
 *    INGEST_INTERVAL_MINUTES.
 * 6. Serve MCP tools over stdio (default) or streamable HTTP.
 */
import { getConfig } from "./config";
import { Embeddings } from "./embeddings";
import { describeError } from "./errors";
import { DataIngestor } from "./ingestor";
import { IngestionLedger } from "./ledger/ledger";
import { LokiClient } from "./loki/client";
import { SampleLogData } from "./loki/sample-data";
import { PdfExtractor } from "./pdf-extractor";
import { SemanticSearch } from "./semantic-search";
import { createServerFactory } from "./server";
import { JsonLogDirectorySource } from "./sources/json-log-directory";
import { LokiLogSource } from "./sources/loki-log-source";
import { PdfDirectorySource } from "./sources/pdf-directory";
import { statusManager } from "./status";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";
import type { ContentSource } from "./types";
import { JsonVectorStore } from "./vector-store";

const config = getConfig();
const { VERBOSE, LOKI } = config;

await Embeddings.configureCache(config.TRANSFORMERS_CACHE);

const embeddings = new Embeddings(config.MODEL_NAME);
await embeddings.init();
statusManager.setModelName(embeddings.getModelName());

const ledger = await IngestionLedger.open(config.LEDGER_PATH);
const store = new JsonVectorStore(config.VECTOR_STORE_PATH, embeddings.getModelName(), VERBOSE);
const loaded = await store.load();
if (loaded === "incompatible") await store.clear();

const ingestor = new DataIngestor({
  ledger,
  index: store,
  embedder: embeddings,
  verbose: VERBOSE,
  status: statusManager,
});
await ingestor.reconcile();

const sources: ContentSource[] = [];
if (config.PDF_DIRECTORY) {
  sources.push(
    new PdfDirectorySource(config.PDF_DIRECTORY, new PdfExtractor(config.PDF_TEXT_CACHE_PATH, VERBOSE), {
      chunkSize: config.CHUNK_SIZE,
      chunkOverlap: config.CHUNK_OVERLAP,
      embedConcurrency: config.EMBED_CONCURRENCY,
    }),
  );
}
if (config.LOGS_DIRECTORY) {
  sources.push(
    new JsonLogDirectorySource(config.LOGS_DIRECTORY, { embedConcurrency: config.EMBED_CONCURRENCY }),
  );
}
if (LOKI.ENABLED) {
  const client = new LokiClient({
    endpoint: LOKI.ENDPOINT,
    username: LOKI.USERNAME,
    password: LOKI.PASSWORD,
    sampleData: LOKI.USE_SAMPLE_DATA ? new SampleLogData(LOKI.SAMPLE_SEED) : undefined,
  });
  if (client.usesSampleData) console.error(`[Loki] Using sample data (seed ${LOKI.SAMPLE_SEED})`);
  sources.push(
    new LokiLogSource(client, {
      query: LOKI.QUERY,
      lookbackHours: LOKI.LOOKBACK_HOURS,
      limit: LOKI.QUERY_LIMIT,
      embedConcurrency: config.EMBED_CONCURRENCY,
    }),
  );
}
console.error(`[Ingest] Sources: ${sources.map((s) => s.identify()).join(", ") || "(none)"}`);

// A ledger failure here is fatal: the process exits with the error.
await ingestor.ingestAll(sources);

if (config.INGEST_INTERVAL_MINUTES > 0) {
  const everyMs = config.INGEST_INTERVAL_MINUTES * 60_000;
  console.error(`[Ingest] Re-ingesting every ${config.INGEST_INTERVAL_MINUTES} minute(s)`);
  setInterval(() => {
    if (ingestor.running) return;
    ingestor.ingestAll(sources).catch((e: unknown) => {
      console.error(`[Ingest] Periodic pass aborted: ${describeError(e)}`);
    });
  }, everyMs).unref();
}

const createServer = createServerFactory({
  search: new SemanticSearch(embeddings, store),
  ledger,
  ingestor,
  sources,
});

const useHttp = config.MCP_TRANSPORT === "http" || config.MCP_TRANSPORT === "streamable-http";
if (useHttp) {
  statusManager.markTransport("http");
  await startHttpTransport(createServer);
} else {
  statusManager.markTransport("stdio");
  await startStdioTransport(createServer);
}
