import { Server, StdioServerTransport } from "../mcp-sdk";

/**
 * Start the MCP stdio transport. stdout carries JSON-RPC from here on, so
 * all logging stays on stderr.
 *
 * @param createServer Factory returning a new, unconnected MCP Server instance.
 */
export async function startStdioTransport(createServer: () => Server) {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
