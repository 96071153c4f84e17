/**
 * Application entry point.
 *
 * High-level flow:
 * 1. Load environment configuration (.env at the project root, then process env).
 * 2. Load the corpus (bundled data/documents.json unless CORPUS_PATH is set).
 * 3. Embed every document into an in-memory flat index (blocking: no request
 *    is served before it is ready).
 * 4. Serve the query pipeline over either:
 *      - HTTP (default): POST /query, GET /, GET /health.
 *      - MCP stdio (TRANSPORT=stdio): rag_query, rag_search, list_documents tools.
 * 5. On SIGINT / SIGTERM close the listener / MCP server and exit.
 *
 * ENVIRONMENT VARIABLES (see .env.example): OPENAI_API_KEY (required),
 * OPENAI_MODEL, OPENAI_TIMEOUT_MS, MAX_TOKENS, TEMPERATURE, MODEL_NAME,
 * EMBEDDING_DIMENSIONS, CORPUS_PATH, TOP_K, SIMILARITY_THRESHOLD, PORT, HOST,
 * CORS_ORIGIN, TRANSPORT, VERBOSE.
 */
import { getConfig } from "./config";
import { createContext } from "./context";
import { createMcpServer } from "./mcp";
import { createHttpApp, startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";

type Shutdown = () => Promise<void>;

async function main(): Promise<Shutdown> {
  const config = getConfig();
  const ctx = await createContext(config);

  if (config.TRANSPORT === "stdio") {
    ctx.status.markTransport("stdio");
    const server = createMcpServer(ctx);
    await startStdioTransport(server);
    return () => server.close();
  }

  ctx.status.markTransport("http");
  const http = await startHttpTransport(createHttpApp(ctx), config.PORT, config.HOST);
  return () =>
    new Promise<void>((resolve, reject) => {
      http.close((e) => (e ? reject(e) : resolve()));
    });
}

let shutdown: Shutdown;
try {
  shutdown = await main();
} catch (e) {
  console.error("[RAG] Startup failed:", e);
  process.exit(1);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    console.error(`[RAG] ${signal} received, shutting down`);
    shutdown().then(
      () => process.exit(0),
      (e: unknown) => {
        console.error("[RAG] Shutdown error:", e);
        process.exit(1);
      },
    );
  });
}
