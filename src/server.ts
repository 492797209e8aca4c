import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { APP_VERSION } from "./config";
import type { DataIngestor } from "./ingestor";
import type { IngestionLedger } from "./ledger/ledger";
import { MAX_TOP_K, type SemanticSearch } from "./semantic-search";
import type { ContentSource } from "./types";

export interface ServerDeps {
  search: SemanticSearch;
  ledger: Pick<IngestionLedger, "listSources" | "listBySource">;
  ingestor: DataIngestor;
  sources: readonly ContentSource[];
}

const SemanticSearchArgs = z.object({
  query: z.string().min(1, "Missing query"),
  top_k: z.number().int().optional(),
  file_name: z.string().optional(),
});

const ListDocumentsArgs = z.object({
  source_id: z.string().optional(),
});

function parseArgs<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
  const parsed = schema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new McpError(
      ErrorCode.InvalidParams,
      parsed.error.issues.map((i) => `${i.path.join(".") || "arguments"}: ${i.message}`).join("; "),
    );
  }
  return parsed.data;
}

function jsonResult(value: unknown) {
  return { content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }] };
}

/**
 * Factory producing a fresh MCP server per transport session. The index,
 * ledger and ingestor are shared across sessions.
 *
 * Tools:
 *  semantic_search  { query, top_k?, file_name? } -> { matches: SearchHit[] }
 *  list_documents   { source_id? } -> { sources: [{ sourceId, documents }] }
 *  reingest         {} -> { reports: SourceReport[] }
 */
export function createServerFactory(deps: ServerDeps): () => Server {
  return () => {
    const server = new Server(
      { name: "log-rag-ingest", version: APP_VERSION },
      { capabilities: { tools: {} } },
    );

    server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: [
        {
          name: "semantic_search",
          description:
            "Semantically search ingested PDF pages and log chunks. Returns matches with sourceId, key, sourceFileName, pageNumber, text and score.",
          inputSchema: {
            type: "object",
            properties: {
              query: { type: "string", description: "Natural language search query." },
              top_k: {
                type: "number",
                description: `Maximum number of matches (1-${MAX_TOP_K}). Defaults to 5.`,
                minimum: 1,
                maximum: MAX_TOP_K,
              },
              file_name: {
                type: "string",
                description: "Only return chunks of this document (file name or log bucket id).",
              },
            },
            required: ["query"],
          },
        },
        {
          name: "list_documents",
          description: "List ingested documents with their version and chunk count, per source.",
          inputSchema: {
            type: "object",
            properties: {
              source_id: { type: "string", description: "Restrict the listing to one source." },
            },
          },
        },
        {
          name: "reingest",
          description:
            "Run one ingestion pass over every source now. Joins the running pass if one is in progress.",
          inputSchema: { type: "object", properties: {} },
        },
      ],
    }));

    server.setRequestHandler(CallToolRequestSchema, async (req) => {
      switch (req.params.name) {
        case "semantic_search": {
          const args = parseArgs(SemanticSearchArgs, req.params.arguments);
          const matches = await deps.search.search(args.query, args.top_k ?? 5, args.file_name);
          return jsonResult({ matches });
        }
        case "list_documents": {
          const args = parseArgs(ListDocumentsArgs, req.params.arguments);
          const ids = args.source_id ? [args.source_id] : await deps.ledger.listSources();
          const sources = await Promise.all(
            ids.map(async (sourceId) => ({
              sourceId,
              documents: (await deps.ledger.listBySource(sourceId)).map((d) => ({
                id: d.id,
                version: d.version,
                chunks: d.records.length,
              })),
            })),
          );
          return jsonResult({ sources });
        }
        case "reingest": {
          const reports = await deps.ingestor.ingestAll(deps.sources);
          return jsonResult({ reports });
        }
        default:
          throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${req.params.name}`);
      }
    });

    return server;
  };
}
