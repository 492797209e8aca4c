import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
// Import version directly from package.json (requires tsconfig "resolveJsonModule": true)
import pkg from "../package.json" with { type: "json" };

// Centralized single dotenv.config() call. Prefer the .env at the project root
// (one level above src/), otherwise fall back to the working directory.
const PROJECT_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");
(() => {
  const rootEnv = path.join(PROJECT_ROOT, ".env");
  if (fsSync.existsSync(rootEnv)) {
    dotenv.config({ path: rootEnv });
    return;
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

/** Default embedding model; small enough for log lines and short PDF windows. */
export const DEFAULT_MODEL_NAME = "Xenova/all-MiniLM-L6-v2";

export interface LokiConfig {
  ENABLED: boolean;
  ENDPOINT: string;
  USERNAME: string | undefined;
  PASSWORD: string | undefined;
  QUERY: string;
  LOOKBACK_HOURS: number;
  QUERY_LIMIT: number;
  USE_SAMPLE_DATA: boolean;
  SAMPLE_SEED: number;
}

export interface Config {
  PDF_DIRECTORY: string | undefined;
  LOGS_DIRECTORY: string | undefined;
  LEDGER_PATH: string;
  VECTOR_STORE_PATH: string | undefined;
  PDF_TEXT_CACHE_PATH: string;
  MODEL_NAME: string;
  CHUNK_SIZE: number;
  CHUNK_OVERLAP: number;
  EMBED_CONCURRENCY: number;
  INGEST_INTERVAL_MINUTES: number;
  VERBOSE: boolean;
  MCP_TRANSPORT: string;
  TRANSFORMERS_CACHE: string;
  LOKI: LokiConfig;
}

type Env = Record<string, string | undefined>;

/** Tolerant truthy parsing (supports several common forms). */
function parseFlag(raw: string | undefined): boolean {
  const v = (raw ?? "").trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

/** Integer knob with a default and an inclusive clamp. */
function parseInteger(raw: string | undefined, fallback: number, min: number, max: number): number {
  const s = raw?.trim();
  if (!s) return fallback;
  const n = Number(s);
  if (!Number.isFinite(n) || n < min) return fallback;
  return Math.min(max, Math.floor(n));
}

/**
 * Directory knob: unset uses the default, an explicit empty string disables the
 * source. Relative paths resolve against the project root.
 */
function parseDirectory(raw: string | undefined, fallback: string): string | undefined {
  if (raw !== undefined && raw.trim() === "") return undefined;
  const dir = raw?.trim() || fallback;
  return path.resolve(PROJECT_ROOT, dir);
}

export function getConfig(env: Env = process.env): Config {
  const LEDGER_PATH = path.resolve(PROJECT_ROOT, env.LEDGER_PATH?.trim() || "ingestioncache.db");

  // An explicit empty VECTOR_STORE_PATH keeps the semantic index in memory only.
  const VECTOR_STORE_PATH =
    env.VECTOR_STORE_PATH !== undefined && env.VECTOR_STORE_PATH.trim() === ""
      ? undefined
      : path.resolve(PROJECT_ROOT, env.VECTOR_STORE_PATH?.trim() || "vector-store/index.json");

  const PDF_TEXT_CACHE_PATH = env.PDF_TEXT_CACHE_PATH?.trim()
    ? path.resolve(PROJECT_ROOT, env.PDF_TEXT_CACHE_PATH.trim())
    : path.join(path.dirname(VECTOR_STORE_PATH ?? LEDGER_PATH), "pdf-text-cache.json");

  // Window sizing for PDF pages; overlap preserves context across windows.
  const CHUNK_SIZE = parseInteger(env.CHUNK_SIZE, 800, 1, 8000);
  const CHUNK_OVERLAP = parseInteger(env.CHUNK_OVERLAP, 120, 0, 4000);

  return {
    PDF_DIRECTORY: parseDirectory(env.PDF_DIRECTORY, "data/pdf"),
    LOGS_DIRECTORY: parseDirectory(env.LOGS_DIRECTORY, "data/logs"),
    LEDGER_PATH,
    VECTOR_STORE_PATH,
    PDF_TEXT_CACHE_PATH,
    MODEL_NAME: env.MODEL_NAME?.trim() || DEFAULT_MODEL_NAME,
    CHUNK_SIZE,
    CHUNK_OVERLAP,
    // Embedding calls per document in flight at once; keep low for hosted rate limits.
    EMBED_CONCURRENCY: parseInteger(env.EMBED_CONCURRENCY, 4, 1, 32),
    INGEST_INTERVAL_MINUTES: parseInteger(env.INGEST_INTERVAL_MINUTES, 0, 0, 7 * 24 * 60),
    VERBOSE: parseFlag(env.VERBOSE),
    // Transport mode: 'stdio' (default) or 'http'/'streamable-http'.
    MCP_TRANSPORT: (env.MCP_TRANSPORT ?? "").trim().toLowerCase(),
    TRANSFORMERS_CACHE: path.resolve(
      PROJECT_ROOT,
      env.TRANSFORMERS_CACHE?.trim() || ".cache/transformers",
    ),
    LOKI: {
      ENABLED: parseFlag(env.LOKI_ENABLED),
      ENDPOINT: env.LOKI_ENDPOINT?.trim() || "http://localhost:3100",
      USERNAME: env.LOKI_USERNAME?.trim() || undefined,
      PASSWORD: env.LOKI_PASSWORD?.trim() || undefined,
      QUERY: env.LOKI_QUERY?.trim() || '{app=~".+"}',
      LOOKBACK_HOURS: parseInteger(env.LOKI_LOOKBACK_HOURS, 24, 1, 24 * 30),
      QUERY_LIMIT: parseInteger(env.LOKI_QUERY_LIMIT, 5000, 1, 50000),
      USE_SAMPLE_DATA: parseFlag(env.LOKI_USE_SAMPLE_DATA),
      SAMPLE_SEED: parseInteger(env.LOKI_SAMPLE_SEED, 42, 0, 2 ** 31 - 1),
    },
  };
}
