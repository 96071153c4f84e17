import type { Config } from "./config";
import { loadCorpus } from "./corpus";
import { Embeddings } from "./embeddings";
import { OpenAIGenerator, type TextGenerator } from "./generator";
import { CorpusIndex, Indexer } from "./indexer";
import { QueryPipeline } from "./pipeline";
import { StatusManager } from "./status";
import type { Document, Embedder } from "./types";

/**
 * Everything a transport needs to serve queries. Built once at startup and
 * read-only afterwards; replaces module-level singletons.
 */
export interface RagContext {
  readonly config: Config;
  readonly documents: readonly Document[];
  readonly embedder: Embedder;
  readonly index: CorpusIndex;
  readonly generator: TextGenerator;
  readonly pipeline: QueryPipeline;
  readonly status: StatusManager;
}

/** Collaborators that may be swapped out (tests, alternative providers). */
export interface ContextOverrides {
  embedder?: Embedder;
  generator?: TextGenerator;
}

/**
 * Load the corpus, embed it into the index and wire the query pipeline. Any
 * failure here is fatal for the process.
 */
export async function createContext(
  config: Config,
  overrides: ContextOverrides = {},
): Promise<RagContext> {
  const status = new StatusManager();

  const documents = await loadCorpus(config.CORPUS_PATH);
  console.error(`[RAG] Loaded ${documents.length} documents from ${config.CORPUS_PATH}`);

  const embedder =
    overrides.embedder ??
    new Embeddings({
      apiKey: config.OPENAI_API_KEY,
      model: config.MODEL_NAME,
      dimensions: config.EMBEDDING_DIMENSIONS,
      timeoutMs: config.OPENAI_TIMEOUT_MS,
    });
  status.setModelName(embedder.getModelName());

  const index = await new Indexer({ embedder, status, verbose: config.VERBOSE }).build(documents);

  const generator =
    overrides.generator ??
    new OpenAIGenerator({
      apiKey: config.OPENAI_API_KEY,
      model: config.OPENAI_MODEL,
      timeoutMs: config.OPENAI_TIMEOUT_MS,
    });
  status.setGenerationModel(generator.getModelName());

  const pipeline = new QueryPipeline({
    embedder,
    index,
    generator,
    status,
    topK: config.TOP_K,
    threshold: config.SIMILARITY_THRESHOLD,
    maxTokens: config.MAX_TOKENS,
    temperature: config.TEMPERATURE,
    verbose: config.VERBOSE,
  });

  return Object.freeze({ config, documents, embedder, index, generator, pipeline, status });
}
