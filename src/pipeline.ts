import { Embeddings } from "./embeddings";
import type { GenerationError, TextGenerator } from "./generator";
import type { CorpusIndex } from "./indexer";
import { StatusManager } from "./status";
import { err, ok, type Answer, type Embedder, type Result, type RetrievalHit } from "./types";

export const SYSTEM_INSTRUCTION = "You are a helpful assistant.";

/** Stage at which a pipeline run failed. */
export type PipelineStage = "embedding" | "search" | "generation";

export interface PipelineError {
  stage: PipelineStage;
  message: string;
  cause?: unknown;
}

/** Per-call retrieval knobs; omitted fields use the pipeline defaults. */
export interface RetrievalOptions {
  topK?: number;
  threshold?: number;
}

export interface QueryPipelineOptions {
  embedder: Embedder;
  index: CorpusIndex;
  generator: TextGenerator;
  status?: StatusManager;
  /** Default top_k (3). */
  topK?: number;
  /** Default similarity threshold (0.6). */
  threshold?: number;
  /** Generation length cap (150). */
  maxTokens?: number;
  /** Sampling temperature (0.7). */
  temperature?: number;
  verbose?: boolean;
}

/**
 * Keep hits whose similarity is strictly above `threshold`, in the order
 * given. When none pass, keep only the first (nearest) hit so a non-empty
 * search always yields context.
 */
export function selectHits(hits: readonly RetrievalHit[], threshold: number): RetrievalHit[] {
  const kept = hits.filter((h) => h.similarity > threshold);
  if (kept.length === 0 && hits.length > 0) return [hits[0]];
  return kept;
}

/** Prompt sent as the user message. Documents are joined by single spaces. */
export function buildPrompt(query: string, docs: readonly string[]): string {
  return [
    "You are an AI assistant. Answer the question with well-structured details.",
    "",
    `Question: ${query}`,
    `Retrieved Information: ${docs.join(" ")}`,
    "",
    "Explain the answer clearly, expanding when necessary.",
    "Answer:",
  ].join("\n");
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Embed, retrieve, filter and generate. Stateless per call: the only shared
 * state is the read-only index and the status counters.
 */
export class QueryPipeline {
  private readonly embedder: Embedder;
  private readonly index: CorpusIndex;
  private readonly generator: TextGenerator;
  private readonly status: StatusManager;
  private readonly topK: number;
  private readonly threshold: number;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly verbose: boolean;

  public constructor(opts: QueryPipelineOptions) {
    this.embedder = opts.embedder;
    this.index = opts.index;
    this.generator = opts.generator;
    this.status = opts.status ?? new StatusManager();
    this.topK = opts.topK ?? 3;
    this.threshold = opts.threshold ?? 0.6;
    this.maxTokens = opts.maxTokens ?? 150;
    this.temperature = opts.temperature ?? 0.7;
    this.verbose = !!opts.verbose;
  }

  /**
   * Retrieval half of {@link answer}: embed + normalize the query, take the
   * `topK` nearest documents and apply the threshold / fallback policy.
   * Never calls the generator.
   */
  public async retrieve(
    query: string,
    opts: RetrievalOptions = {},
  ): Promise<Result<RetrievalHit[], PipelineError>> {
    const topK = opts.topK ?? this.topK;
    const threshold = opts.threshold ?? this.threshold;

    let vector: Float32Array;
    try {
      vector = Embeddings.normalize(await this.embedder.embed(query));
    } catch (e) {
      return err({ stage: "embedding", message: errorMessage(e), cause: e });
    }

    let hits: RetrievalHit[];
    try {
      hits = this.index.search(vector, topK);
    } catch (e) {
      return err({ stage: "search", message: errorMessage(e), cause: e });
    }

    if (this.verbose) {
      for (const h of hits) {
        console.error(
          `[RAG][verbose] #${h.document.id} sim=${h.similarity.toFixed(4)} dist=${h.distance.toFixed(4)}`,
        );
      }
    }
    return ok(selectHits(hits, threshold));
  }

  /** Full pipeline. Failures come back as a PipelineError, never thrown. */
  public async answer(
    query: string,
    opts: RetrievalOptions = {},
  ): Promise<Result<Answer, PipelineError>> {
    const result = await this.run(query, opts);
    this.status.recordQuery(!result.ok);
    if (!result.ok) {
      console.error(`[RAG] Query failed at ${result.error.stage}: ${result.error.message}`);
    }
    return result;
  }

  private async run(query: string, opts: RetrievalOptions): Promise<Result<Answer, PipelineError>> {
    const retrieved = await this.retrieve(query, opts);
    if (!retrieved.ok) return retrieved;

    const docs = retrieved.value.map((h) => h.document.text);
    const generated = await this.generator.generate({
      system: SYSTEM_INSTRUCTION,
      prompt: buildPrompt(query, docs),
      maxTokens: this.maxTokens,
      temperature: this.temperature,
    });
    if (!generated.ok) return err(QueryPipeline.fromGenerationError(generated.error));

    return ok({ retrieved_docs: docs, response: generated.value.trim() });
  }

  private static fromGenerationError(e: GenerationError): PipelineError {
    return { stage: "generation", message: e.message, cause: e.cause };
  }
}
