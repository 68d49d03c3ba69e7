/**
 * Streamable HTTP transport.
 *
 * Session model: a client starts with a JSON-RPC `initialize` POST to /mcp
 * without an `mcp-session-id` header; a new transport + MCP Server pair is
 * created and the SDK returns the generated session id. Every later request
 * for that session carries the same header. Closing the transport evicts
 * the session.
 *
 * Endpoints:
 *  - POST /mcp    : JSON-RPC requests (initial + subsequent).
 *  - GET  /mcp    : streaming channel of an existing session.
 *  - DELETE /mcp  : session teardown.
 *  - GET  /health : status snapshot (artifacts, providers, query counters).
 *
 * DNS rebinding protection is on, with allowed hosts limited to localhost
 * and the bound host/port.
 */
import express from "express";
import { randomUUID } from "node:crypto";
import { describeError } from "../errors";
import { logError, logInfo } from "../logger";
import { isInitializeRequest, Server, StreamableHTTPServerTransport } from "../mcp-sdk";
import { statusManager } from "../status";

export interface HttpTransportOptions {
  port: number;
  host: string;
}

function sessionIdOf(req: express.Request): string | undefined {
  const header = req.headers["mcp-session-id"];
  return typeof header === "string" ? header : undefined;
}

/**
 * Bootstraps the Express HTTP server and the per-session MCP transport layer.
 *
 * @param createServer Factory producing a new, unconnected MCP `Server` instance for each session.
 * @returns Resolves once the HTTP listener is bound.
 */
export async function startHttpTransport(createServer: () => Server, options: HttpTransportOptions) {
  const { port, host } = options;
  const app = express();
  app.use(express.json({ limit: "2mb" }));

  const allowedHosts = Array.from(
    new Set(["127.0.0.1", `127.0.0.1:${port}`, "localhost", `localhost:${port}`, host, `${host}:${port}`]),
  );

  /** Active session transports mapped by session id. */
  const transports = new Map<string, StreamableHTTPServerTransport>();

  app.post("/mcp", async (req: express.Request, res: express.Response) => {
    try {
      const sessionId = sessionIdOf(req);
      let transport = sessionId ? transports.get(sessionId) : undefined;

      // Session creation: only without a header AND for an initialize request.
      if (!transport && !sessionId && isInitializeRequest(req.body)) {
        const created = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (sid: string) => {
            transports.set(sid, created);
          },
          enableDnsRebindingProtection: true,
          allowedHosts,
        });

        const server = createServer();
        let closing = false;
        created.onclose = () => {
          if (closing) return;
          closing = true;
          if (created.sessionId) transports.delete(created.sessionId);
          // server.close() closes the transport again; detach first.
          created.onclose = undefined;
          server.close().catch((e: unknown) => logError("Failed to close MCP session", { error: describeError(e) }));
        };
        await server.connect(created);
        transport = created;
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
      logError("HTTP POST error", { error: describeError(err) });
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  /** GET and DELETE /mcp are only valid for an existing session. */
  const handleSessionRequest = async (req: express.Request, res: express.Response) => {
    const sessionId = sessionIdOf(req);
    const transport = sessionId ? transports.get(sessionId) : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    try {
      await transport.handleRequest(req, res);
    } catch (err) {
      logError(`HTTP ${req.method} error`, { error: describeError(err) });
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
      logInfo(`Streamable HTTP listening at http://${host}:${port}/mcp`);
      resolve();
    });
  });
}
