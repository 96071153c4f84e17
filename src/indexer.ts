import { Embeddings } from "./embeddings";
import { StatusManager } from "./status";
import type { Document, Embedder, RetrievalHit } from "./types";
import { FlatIndex } from "./vector-index";

/** Options required to construct an {@link Indexer}. */
export interface IndexerOptions {
  embedder: Embedder;
  status?: StatusManager;
  verbose?: boolean;
}

/**
 * Read-only view over the built index. Exactly one vector per corpus
 * document, addressed by document id.
 */
export class CorpusIndex {
  private readonly docs: readonly Document[];
  private readonly index: FlatIndex;

  public constructor(docs: readonly Document[], index: FlatIndex) {
    this.docs = docs;
    this.index = index;
  }

  public get size(): number {
    return this.index.size;
  }

  public get dimension(): number | null {
    return this.index.dimension;
  }

  /** Corpus documents in id order (a copy; the corpus is never mutated). */
  public documents(): Document[] {
    return [...this.docs];
  }

  /**
   * Nearest `k` documents to `query`, ascending by distance, each with its
   * cosine similarity to the query computed from the stored vectors.
   */
  public search(query: Float32Array, k: number): RetrievalHit[] {
    const { distances, indices } = this.index.search(query, k);
    const hits: RetrievalHit[] = [];
    indices.forEach((position, i) => {
      const document = this.docs[position];
      const vector = this.index.vector(position);
      if (!document || !vector) return;
      hits.push({ document, distance: distances[i], similarity: Embeddings.cosine(query, vector) });
    });
    return hits;
  }
}

/**
 * Builds the nearest-neighbour index over a fixed corpus. Embedding happens
 * once, sequentially, in corpus order; the result is never updated.
 */
export class Indexer {
  private readonly embedder: Embedder;
  private readonly status: StatusManager;
  private readonly verbose: boolean;

  public constructor(opts: IndexerOptions) {
    this.embedder = opts.embedder;
    this.status = opts.status ?? new StatusManager();
    this.verbose = !!opts.verbose;
  }

  /**
   * Embed every document and load the vectors into a flat index. Embedding
   * failures propagate to the caller (fatal at startup).
   */
  public async build(documents: readonly Document[]): Promise<CorpusIndex> {
    if (documents.length === 0) throw new Error("Cannot build an index over an empty corpus");

    console.error(`[RAG] Embedding ${documents.length} documents with ${this.embedder.getModelName()}`);
    this.status.setCorpusTotal(documents.length);

    const vectors: Float32Array[] = [];
    for (const doc of documents) {
      vectors.push(await this.embedder.embed(doc.text));
      this.status.incEmbedded();
      if (this.verbose) {
        console.error(`[RAG][verbose] Embedded ${vectors.length}/${documents.length}: ${doc.text.slice(0, 60)}`);
      }
    }

    const index = new FlatIndex();
    index.add(vectors);
    console.error(`[RAG] Index ready: ${index.size} vectors (dim ${index.dimension}).`);
    this.status.markReady();
    return new CorpusIndex([...documents], index);
  }
}
