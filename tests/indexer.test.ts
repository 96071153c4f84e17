import { describe, it, expect } from "vitest";
import { toDocuments } from "../src/corpus";
import { Indexer } from "../src/indexer";
import { StatusManager } from "../src/status";
import { DEFAULT_VOCABULARY, KeywordEmbedder } from "./helpers/fakes";

describe("Indexer", () => {
  const docs = toDocuments(["Magellan the explorer", "Paris and the Eiffel tower", "Water boils"]);

  it("embeds each document exactly once and indexes one vector per document", async () => {
    const embedder = new KeywordEmbedder(DEFAULT_VOCABULARY);
    const index = await new Indexer({ embedder }).build(docs);
    expect(embedder.calls).toBe(3);
    expect(index.size).toBe(3);
    expect(index.dimension).toBe(DEFAULT_VOCABULARY.length);
    expect(index.documents()).toEqual(docs);
  });

  it("reports progress and readiness", async () => {
    const status = new StatusManager();
    await new Indexer({ embedder: new KeywordEmbedder(DEFAULT_VOCABULARY), status }).build(docs);
    const snapshot = status.getStatus();
    expect(snapshot.corpus).toEqual({ documents: 3, embedded: 3 });
    expect(snapshot.ready).toBe(true);
  });

  it("propagates embedding failures and stays not ready", async () => {
    const embedder = new KeywordEmbedder(DEFAULT_VOCABULARY);
    embedder.failWith = new Error("model exploded");
    const status = new StatusManager();
    await expect(new Indexer({ embedder, status }).build(docs)).rejects.toThrow("model exploded");
    expect(status.getStatus().ready).toBe(false);
  });

  it("rejects an empty corpus", async () => {
    const embedder = new KeywordEmbedder(DEFAULT_VOCABULARY);
    await expect(new Indexer({ embedder }).build([])).rejects.toThrow(
      "Cannot build an index over an empty corpus",
    );
  });

  it("hands out copies of the corpus", async () => {
    const index = await new Indexer({ embedder: new KeywordEmbedder(DEFAULT_VOCABULARY) }).build(docs);
    index.documents().pop();
    expect(index.documents()).toHaveLength(3);
  });

  it("searches by document id with cosine similarity", async () => {
    const embedder = new KeywordEmbedder(DEFAULT_VOCABULARY);
    const index = await new Indexer({ embedder }).build(docs);
    const hits = index.search(await embedder.embed("eiffel paris"), 2);
    expect(hits.map((h) => h.document.id)).toEqual([1, 0]);
    expect(hits[0].similarity).toBeCloseTo(1, 6);
    expect(hits[1].similarity).toBe(0);
  });
});
