import path from "node:path";
import { describe, expect, it } from "vitest";
import { DEFAULT_MODEL_NAME, getConfig } from "./config";

describe("getConfig", () => {
  it("applies defaults", () => {
    const c = getConfig({});

    expect(path.isAbsolute(c.LEDGER_PATH)).toBe(true);
    expect(path.basename(c.LEDGER_PATH)).toBe("ingestioncache.db");
    expect(c.VECTOR_STORE_PATH?.endsWith(path.join("vector-store", "index.json"))).toBe(true);
    expect(c.PDF_TEXT_CACHE_PATH).toBe(
      path.join(path.dirname(c.VECTOR_STORE_PATH ?? ""), "pdf-text-cache.json"),
    );
    expect(c.PDF_DIRECTORY?.endsWith(path.join("data", "pdf"))).toBe(true);
    expect(c.LOGS_DIRECTORY?.endsWith(path.join("data", "logs"))).toBe(true);
    expect(c.MODEL_NAME).toBe(DEFAULT_MODEL_NAME);
    expect(c.CHUNK_SIZE).toBe(800);
    expect(c.CHUNK_OVERLAP).toBe(120);
    expect(c.EMBED_CONCURRENCY).toBe(4);
    expect(c.INGEST_INTERVAL_MINUTES).toBe(0);
    expect(c.VERBOSE).toBe(false);
    expect(c.MCP_TRANSPORT).toBe("");
    expect(c.TRANSFORMERS_CACHE.endsWith(path.join(".cache", "transformers"))).toBe(true);
    expect(c.LOKI).toEqual({
      ENABLED: false,
      ENDPOINT: "http://localhost:3100",
      USERNAME: undefined,
      PASSWORD: undefined,
      QUERY: '{app=~".+"}',
      LOOKBACK_HOURS: 24,
      QUERY_LIMIT: 5000,
      USE_SAMPLE_DATA: false,
      SAMPLE_SEED: 42,
    });
  });

  it("reads explicit values", () => {
    const c = getConfig({
      PDF_DIRECTORY: "/srv/pdf",
      LEDGER_PATH: "/var/lib/rag/ledger.db",
      MODEL_NAME: "Xenova/bge-small-en-v1.5",
      CHUNK_SIZE: "400",
      EMBED_CONCURRENCY: "2",
      VERBOSE: "yes",
      MCP_TRANSPORT: " HTTP ",
      LOKI_ENABLED: "1",
      LOKI_USERNAME: "reader",
      LOKI_PASSWORD: "test-secret",
      LOKI_LOOKBACK_HOURS: "6",
      LOKI_USE_SAMPLE_DATA: "true",
      LOKI_SAMPLE_SEED: "7",
    });

    expect(c.PDF_DIRECTORY).toBe("/srv/pdf");
    expect(c.LEDGER_PATH).toBe("/var/lib/rag/ledger.db");
    expect(c.MODEL_NAME).toBe("Xenova/bge-small-en-v1.5");
    expect(c.CHUNK_SIZE).toBe(400);
    expect(c.EMBED_CONCURRENCY).toBe(2);
    expect(c.VERBOSE).toBe(true);
    expect(c.MCP_TRANSPORT).toBe("http");
    expect(c.LOKI).toMatchObject({
      ENABLED: true,
      USERNAME: "reader",
      PASSWORD: "test-secret",
      LOOKBACK_HOURS: 6,
      USE_SAMPLE_DATA: true,
      SAMPLE_SEED: 7,
    });
  });

  it("disables a directory source with an empty value", () => {
    const c = getConfig({ LOGS_DIRECTORY: "", PDF_DIRECTORY: "  " });
    expect(c.LOGS_DIRECTORY).toBeUndefined();
    expect(c.PDF_DIRECTORY).toBeUndefined();
  });

  it("keeps the index in memory when VECTOR_STORE_PATH is empty", () => {
    const c = getConfig({ VECTOR_STORE_PATH: "", LEDGER_PATH: "/data/ledger.db" });
    expect(c.VECTOR_STORE_PATH).toBeUndefined();
    expect(c.PDF_TEXT_CACHE_PATH).toBe(path.join("/data", "pdf-text-cache.json"));
  });

  it("falls back on invalid numbers and clamps large ones", () => {
    const c = getConfig({ CHUNK_SIZE: "abc", CHUNK_OVERLAP: "-5", EMBED_CONCURRENCY: "500" });
    expect(c.CHUNK_SIZE).toBe(800);
    expect(c.CHUNK_OVERLAP).toBe(120);
    expect(c.EMBED_CONCURRENCY).toBe(32);
    expect(getConfig({ CHUNK_SIZE: "0" }).CHUNK_SIZE).toBe(800);
  });
});
