import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

/**
 * Start the MCP stdio transport. stdout belongs to the protocol from here on;
 * all logging goes to stderr.
 *
 * @param createServer Factory returning a new, unconnected MCP Server instance.
 */
export async function startStdioTransport(createServer: () => Server): Promise<void> {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("[MCP] Listening on stdio");
}
