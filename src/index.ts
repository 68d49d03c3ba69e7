/**
 * Application entry point.
 *
 * 1. Parse configuration (dotenv + environment) into one Config object.
 * 2. Create the LLM and embedding provider clients and load the artifacts
 *    written by `npm run build-index`: the knowledge store and the
 *    unsafe-intent matrix. Missing or incompatible artifacts abort startup.
 * 3. Start an MCP server over stdio (default) or streamable HTTP
 *    (MCP_TRANSPORT=http|streamable-http, which also serves /health).
 *
 * Tools: process_query, answer_question, route_query, search_knowledge,
 * check_safety (see server.ts).
 */
import { getConfig } from "./config";
import { loadEngine } from "./engine";
import { describeError } from "./errors";
import { logError, setVerboseLogging } from "./logger";
import { createServer } from "./server";
import { statusManager } from "./status";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";

try {
  const config = getConfig();
  setVerboseLogging(config.VERBOSE);
  const engine = await loadEngine(config, statusManager);

  const useHttp = config.MCP_TRANSPORT === "http" || config.MCP_TRANSPORT === "streamable-http";
  if (useHttp) {
    statusManager.markTransport("http");
    await startHttpTransport(() => createServer(engine), { port: config.MCP_PORT, host: config.HOST });
  } else {
    statusManager.markTransport("stdio");
    await startStdioTransport(() => createServer(engine));
  }
} catch (e) {
  logError("Startup failed", { error: describeError(e) });
  process.exitCode = 1;
}
