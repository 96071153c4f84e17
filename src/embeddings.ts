import OpenAI from "openai";
import type { EmbeddingCreateParams } from "openai/resources/embeddings";
import type { Embedder } from "./types";

/** Error thrown when the embeddings endpoint answers without a vector. */
export class EmptyEmbeddingError extends Error {
  constructor(model: string) {
    super(`Embedding response from ${model} contained no vector`);
    this.name = "EmptyEmbeddingError";
  }
}

export const DEFAULT_MODEL_NAME = "text-embedding-3-small";
export const DEFAULT_DIMENSIONS = 384;

/**
 * The slice of the OpenAI client used for embeddings. The SDK client
 * satisfies it structurally; tests pass a scripted stand-in.
 */
export interface EmbeddingsClient {
  embeddings: {
    create(body: EmbeddingCreateParams): Promise<{ data: Array<{ embedding: number[] }> }>;
  };
}

export interface EmbeddingsOptions {
  apiKey: string;
  /** Embedding model (default text-embedding-3-small). */
  model?: string;
  /** Requested vector length; 0 keeps the model's native size. Default 384. */
  dimensions?: number;
  timeoutMs?: number;
  client?: EmbeddingsClient;
}

/**
 * Sentence embedder backed by the hosted embeddings endpoint. The same
 * instance embeds the corpus and every query so both live in one vector
 * space.
 */
export class Embeddings implements Embedder {
  private readonly modelName: string;
  private readonly dimensions: number;
  private readonly client: EmbeddingsClient;

  public constructor(opts: EmbeddingsOptions) {
    this.modelName = opts.model?.trim() || DEFAULT_MODEL_NAME;
    this.dimensions = opts.dimensions ?? DEFAULT_DIMENSIONS;
    this.client =
      opts.client ??
      new OpenAI({ apiKey: opts.apiKey, timeout: opts.timeoutMs ?? 60_000, maxRetries: 0 });
  }

  /** @returns Resolved (possibly defaulted) model identifier. */
  public getModelName(): string {
    return this.modelName;
  }

  /**
   * Embed a single text and L2-normalize the result.
   *
   * @throws {EmptyEmbeddingError} If the response carries no vector.
   */
  public async embed(text: string): Promise<Float32Array> {
    const res = await this.client.embeddings.create({
      model: this.modelName,
      input: text,
      ...(this.dimensions > 0 ? { dimensions: this.dimensions } : {}),
    });
    const vector = res.data[0]?.embedding;
    if (!vector || vector.length === 0) throw new EmptyEmbeddingError(this.modelName);
    return Embeddings.normalize(Float32Array.from(vector));
  }

  /**
   * Scale a vector to unit length. A zero vector is returned unchanged (as a
   * copy) since it has no direction.
   */
  public static normalize(v: Float32Array): Float32Array {
    let sum = 0;
    for (let i = 0; i < v.length; i++) sum += v[i] * v[i];
    const norm = Math.sqrt(sum);
    const out = new Float32Array(v.length);
    if (norm === 0) return out;
    for (let i = 0; i < v.length; i++) out[i] = v[i] / norm;
    return out;
  }

  /**
   * Cosine similarity between two vectors. Length mismatch is handled by
   * comparing up to the shortest length.
   *
   * @returns Similarity in [-1, 1]; 0 when either vector is all zeros.
   */
  public static cosine(a: Float32Array, b: Float32Array): number {
    let dot = 0,
      na = 0,
      nb = 0;
    const n = Math.min(a.length, b.length);
    for (let i = 0; i < n; i++) {
      const x = a[i],
        y = b[i];
      dot += x * y;
      na += x * x;
      nb += y * y;
    }
    return dot / (Math.sqrt(na) * Math.sqrt(nb) + 1e-10);
  }
}
