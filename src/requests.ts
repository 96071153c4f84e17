import { z } from "zod";
import { MAX_TOP_K } from "./config";
import type { RetrievalOptions } from "./pipeline";

export const QUERY_REQUIRED = "Query is required";
export const INVALID_BODY = "Invalid request body";

const QueryField = z.object({
  query: z.string().refine((q) => q.trim().length > 0),
});

const RetrievalFields = z.object({
  top_k: z.number().int().min(1).max(MAX_TOP_K).optional(),
  threshold: z.number().min(-1).max(1).optional(),
});

export interface ParsedQuery {
  query: string;
  options: RetrievalOptions;
}

/**
 * Validate a query request shared by POST /query and the MCP tools.
 * The query text is kept verbatim (it is only checked for non-blank content).
 */
export function parseQueryRequest(body: unknown): { ok: true; value: ParsedQuery } | { ok: false; message: string } {
  const q = QueryField.safeParse(body);
  if (!q.success) return { ok: false, message: QUERY_REQUIRED };
  const r = RetrievalFields.safeParse(body);
  if (!r.success) return { ok: false, message: INVALID_BODY };
  return {
    ok: true,
    value: { query: q.data.query, options: { topK: r.data.top_k, threshold: r.data.threshold } },
  };
}
