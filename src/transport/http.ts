/**
 * Streamable HTTP transport.
 *
 * Session model: a client sends a JSON-RPC `initialize` request to POST /mcp
 * without an `mcp-session-id` header; a new transport + MCP server pair is
 * created and the generated session id is returned in the response headers.
 * Every later request of that session carries the header and reuses the pair.
 * Closing the transport evicts the session.
 *
 * Endpoints:
 *  - POST   /mcp    JSON-RPC requests (initial + subsequent)
 *  - GET    /mcp    streaming channel of an existing session
 *  - DELETE /mcp    session teardown
 *  - GET    /health status snapshot from `statusManager` (ingestion progress included)
 *
 * Environment variables:
 *  MCP_PORT                         Port to bind (default 3000)
 *  HOST                             Interface to bind (default 127.0.0.1)
 *  ALLOWED_HOSTS                    Comma-separated host[:port] whitelist
 *  ENABLE_DNS_REBINDING_PROTECTION  "false" disables (not recommended)
 */
import express from "express";
import { randomUUID } from "node:crypto";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { describeError } from "../errors";
import { statusManager } from "../status";

function sessionIdOf(req: express.Request): string | undefined {
  const header = req.headers["mcp-session-id"];
  return typeof header === "string" ? header : undefined;
}

/**
 * Bootstraps the Express app and the per-session MCP transport layer.
 *
 * @param createServer Factory producing a new, unconnected MCP `Server` for each session.
 * @returns Resolves once the HTTP listener is bound.
 */
export async function startHttpTransport(createServer: () => Server): Promise<void> {
  const app = express();
  app.use(express.json({ limit: "2mb" }));

  const port = Number(process.env.MCP_PORT ?? 3000);
  const host = (process.env.HOST ?? "127.0.0.1").trim();
  const defaultAllowedHosts = Array.from(
    new Set([
      "127.0.0.1",
      `127.0.0.1:${port}`,
      "localhost",
      `localhost:${port}`,
      host,
      `${host}:${port}`,
    ]),
  );

  /** Active session transports mapped by session id. */
  const transports: Record<string, StreamableHTTPServerTransport> = {};

  const openSession = async (): Promise<StreamableHTTPServerTransport> => {
    const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (sid: string) => {
        transports[sid] = transport;
      },
      enableDnsRebindingProtection:
        (process.env.ENABLE_DNS_REBINDING_PROTECTION ?? "true") !== "false",
      allowedHosts: (process.env.ALLOWED_HOSTS ?? defaultAllowedHosts.join(","))
        .split(",")
        .map((s) => s.trim())
        .filter(Boolean),
    });

    const server = createServer();
    let closing = false;
    transport.onclose = () => {
      if (closing) return;
      closing = true;
      if (transport.sessionId) delete transports[transport.sessionId];
      // server.close() closes the transport again; detach first.
      transport.onclose = undefined;
      server.close().catch((e: unknown) => {
        console.error(`[MCP] Error closing session server: ${describeError(e)}`);
      });
    };
    await server.connect(transport);
    return transport;
  };

  app.post("/mcp", async (req: express.Request, res: express.Response) => {
    try {
      const sessionId = sessionIdOf(req);
      let transport = sessionId ? transports[sessionId] : undefined;

      if (!transport && !sessionId && isInitializeRequest(req.body)) {
        transport = await openSession();
      }

      if (!transport) {
        res.status(400).json({
          jsonrpc: "2.0",
          error: { code: -32000, message: "Bad Request: No valid session ID provided" },
          id: null,
        });
        return;
      }

      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      console.error("[MCP] HTTP POST error:", err);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  /** GET and DELETE /mcp: only valid for an existing session. */
  const handleSessionRequest = async (req: express.Request, res: express.Response) => {
    const sessionId = sessionIdOf(req);
    const transport = sessionId ? transports[sessionId] : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    try {
      await transport.handleRequest(req, res);
    } catch (err) {
      console.error("[MCP] HTTP session request error:", err);
      if (!res.headersSent) res.status(500).send("Internal server error");
    }
  };

  app.get("/mcp", handleSessionRequest);
  app.delete("/mcp", handleSessionRequest);

  app.get("/health", (_req, res) => {
    res.json(statusManager.getStatus());
  });

  await new Promise<void>((resolve) => {
    app.listen(port, host, () => {
      console.error(`[MCP] Streamable HTTP listening at http://${host}:${port}/mcp`);
      resolve();
    });
  });
}
