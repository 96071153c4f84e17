/**
 * Shared document / retrieval types used by the indexer, the query pipeline
 * and both transports.
 */

/** A single corpus entry. `id` is its position in the fixed, ordered corpus. */
export interface Document {
  readonly id: number;
  readonly text: string;
}

/** Anything that can turn text into a fixed-length embedding vector. */
export interface Embedder {
  /** Identifier of the underlying model (reported by /health). */
  getModelName(): string;
  embed(text: string): Promise<Float32Array>;
}

/** One scored candidate produced by a nearest-neighbour search. */
export interface RetrievalHit {
  readonly document: Document;
  /** Squared Euclidean distance between query and document vectors. */
  readonly distance: number;
  /** Cosine similarity between query and document vectors, in [-1, 1]. */
  readonly similarity: number;
}

/** Wire shape returned by POST /query and the rag_query tool. */
export interface Answer {
  retrieved_docs: string[];
  response: string;
}

/** Explicit success / failure value for fallible upstream calls. */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });
export const err = <E>(error: E): { ok: false; error: E } => ({ ok: false, error });
