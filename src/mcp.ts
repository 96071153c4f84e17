import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  type CallToolResult,
} from "@modelcontextprotocol/sdk/types.js";
import { APP_NAME, APP_VERSION, MAX_TOP_K } from "./config";
import type { RagContext } from "./context";
import { parseQueryRequest } from "./requests";

const queryInputSchema = {
  type: "object" as const,
  properties: {
    query: {
      type: "string",
      description: "Natural language question. Must not be blank.",
    },
    top_k: {
      type: "number",
      description: `Number of nearest documents to consider (1-${MAX_TOP_K}). Defaults to the server setting.`,
      minimum: 1,
      maximum: MAX_TOP_K,
    },
    threshold: {
      type: "number",
      description:
        "Cosine similarity a document must exceed to be used as context (-1..1). The nearest document is always kept.",
      minimum: -1,
      maximum: 1,
    },
  },
  required: ["query"],
};

function textResult(payload: unknown, isError = false): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
    ...(isError ? { isError: true } : {}),
  };
}

/**
 * Build an MCP server exposing the query pipeline as tools. The context is
 * shared; the server itself holds no per-session state.
 *
 * Tools:
 *  rag_query       { query, top_k?, threshold? } -> { retrieved_docs, response }
 *  rag_search      { query, top_k?, threshold? } -> { matches: [{ id, text, similarity, distance }] }
 *  list_documents  {}                            -> { documents: [{ id, text }] }
 */
export function createMcpServer(ctx: RagContext): Server {
  const server = new Server(
    { name: APP_NAME, version: APP_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [
      {
        name: "rag_query",
        description:
          "Answer a question using the most relevant corpus documents as context for the language model.",
        inputSchema: queryInputSchema,
      },
      {
        name: "rag_search",
        description:
          "Return the corpus documents that would be used as context for a question, with similarity scores. Does not call the language model.",
        inputSchema: queryInputSchema,
      },
      {
        name: "list_documents",
        description: `List all ${ctx.documents.length} documents in the corpus.`,
        inputSchema: { type: "object" as const, properties: {} },
      },
    ],
  }));

  server.setRequestHandler(CallToolRequestSchema, async (req): Promise<CallToolResult> => {
    const { name, arguments: args } = req.params;

    if (name === "list_documents") {
      return textResult({ documents: ctx.documents });
    }

    if (name === "rag_query" || name === "rag_search") {
      const parsed = parseQueryRequest(args ?? {});
      if (!parsed.ok) throw new McpError(ErrorCode.InvalidParams, parsed.message);
      const { query, options } = parsed.value;

      if (name === "rag_search") {
        const hits = await ctx.pipeline.retrieve(query, options);
        if (!hits.ok) return textResult({ error: hits.error.message, stage: hits.error.stage }, true);
        return textResult({
          matches: hits.value.map((h) => ({
            id: h.document.id,
            text: h.document.text,
            similarity: Number(h.similarity.toFixed(4)),
            distance: Number(h.distance.toFixed(4)),
          })),
        });
      }

      const answer = await ctx.pipeline.answer(query, options);
      if (!answer.ok) return textResult({ error: answer.error.message, stage: answer.error.stage }, true);
      return textResult(answer.value);
    }

    throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
  });

  return server;
}
