/**
 * HTTP transport for the RAG query server.
 *
 * Endpoints:
 *  - GET  /        : Liveness check, plain text.
 *  - POST /query   : `{ query, top_k?, threshold? }` -> `{ retrieved_docs, response }`.
 *  - GET  /health  : Status snapshot (model names, corpus counters, readiness).
 *
 * Error handling:
 *  - Missing / blank query            => 400 { error: "Query is required" }
 *  - Invalid top_k / threshold        => 400 { error: "Invalid request body" }
 *  - Malformed JSON body              => 400 { error: "Invalid JSON body" }
 *  - Pipeline failure (any stage)     => 500 { error: "Internal server error" }
 *
 * CORS is enabled for the configured origins (default any) so a browser
 * frontend served elsewhere can call /query directly.
 *
 * Keep this file free of pipeline logic; it only maps HTTP onto RagContext.
 */
import type { Server as HttpServer } from "node:http";
import cors from "cors";
import express from "express";
import type { RagContext } from "../context";
import { parseQueryRequest } from "../requests";

export const INTERNAL_ERROR = "Internal server error";
export const INVALID_JSON = "Invalid JSON body";

function corsOrigin(origins: readonly string[]): string | string[] {
  if (origins.length === 0 || origins.includes("*")) return "*";
  return [...origins];
}

/** body-parser marks JSON syntax errors with this type. */
function isJsonParseError(e: unknown): boolean {
  return e instanceof SyntaxError && "type" in e && e.type === "entity.parse.failed";
}

/** Build the Express application (not yet listening). */
export function createHttpApp(ctx: RagContext): express.Express {
  const app = express();
  app.use(cors({ origin: corsOrigin(ctx.config.CORS_ORIGIN) }));
  app.use(express.json({ limit: "1mb" }));

  app.get("/", (_req, res) => {
    res.status(200).type("text/plain").send("RAG API is running!");
  });

  app.get("/health", (_req, res) => {
    res.json(ctx.status.getStatus());
  });

  app.post(
    "/query",
    async (req: express.Request, res: express.Response, next: express.NextFunction) => {
      const parsed = parseQueryRequest(req.body);
      if (!parsed.ok) {
        res.status(400).json({ error: parsed.message });
        return;
      }

      try {
        const result = await ctx.pipeline.answer(parsed.value.query, parsed.value.options);
        if (!result.ok) {
          res.status(500).json({ error: INTERNAL_ERROR });
          return;
        }
        res.json(result.value);
      } catch (e) {
        // Express 4 does not observe rejected handler promises.
        next(e);
      }
    },
  );

  app.use(
    (e: unknown, _req: express.Request, res: express.Response, next: express.NextFunction) => {
      if (res.headersSent) {
        next(e);
        return;
      }
      if (isJsonParseError(e)) {
        res.status(400).json({ error: INVALID_JSON });
        return;
      }
      console.error("[RAG] HTTP error:", e);
      res.status(500).json({ error: INTERNAL_ERROR });
    },
  );

  return app;
}

/**
 * Bind the app to host:port.
 *
 * @returns The listening server (close it on shutdown).
 */
export async function startHttpTransport(
  app: express.Express,
  port: number,
  host: string,
): Promise<HttpServer> {
  return new Promise<HttpServer>((resolve, reject) => {
    const server = app.listen(port, host);
    server.once("listening", () => {
      console.error(`[RAG] HTTP listening at http://${host}:${port}`);
      resolve(server);
    });
    server.once("error", reject);
  });
}
