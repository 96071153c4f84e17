import { APP_VERSION } from "./config";

/** Corpus / index build progress. */
export interface CorpusStatus {
  /** Documents in the loaded corpus. */
  documents: number;
  /** Documents embedded and inserted into the index so far. */
  embedded: number;
}

/** Per-process request counters (both transports). */
export interface QueryStatus {
  /** Pipeline invocations started. */
  total: number;
  /** Invocations that ended in a PipelineError. */
  failures: number;
}

/**
 * In-memory snapshot of server lifecycle, served by GET /health.
 *
 * ready = true ONLY after every corpus document has been embedded and the
 * index is built.
 */
export interface ServerStatus {
  version: string;
  /** Embedding model identifier (empty before init). */
  modelName: string;
  /** Chat-completion model used for answers. */
  generationModel: string;
  /** 'http' | 'stdio' | 'unknown'. */
  transport: string;
  ready: boolean;
  /** ISO timestamp when the StatusManager was created. */
  startedAt: string;
  corpus: CorpusStatus;
  queries: QueryStatus;
}

/**
 * Owner of the mutable status object. One instance lives on the RagContext;
 * the indexer and the pipeline report through it.
 */
export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      modelName: initial?.modelName ?? "",
      generationModel: initial?.generationModel ?? "",
      transport: initial?.transport ?? "unknown",
      ready: initial?.ready ?? false,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      corpus: initial?.corpus ?? { documents: 0, embedded: 0 },
      queries: initial?.queries ?? { total: 0, failures: 0 },
    };
  }

  public markTransport(t: string) {
    this.data.transport = t;
  }

  public setModelName(name: string) {
    this.data.modelName = name;
  }

  public setGenerationModel(name: string) {
    this.data.generationModel = name;
  }

  public setCorpusTotal(documents: number) {
    this.data.corpus.documents = documents;
    this.data.corpus.embedded = 0;
  }

  public incEmbedded(count = 1) {
    this.data.corpus.embedded += count;
  }

  public markReady() {
    this.data.ready = true;
  }

  public recordQuery(failed: boolean) {
    this.data.queries.total++;
    if (failed) this.data.queries.failures++;
  }

  /** Deep copy of the current status. */
  public getStatus(): ServerStatus {
    return {
      ...this.data,
      corpus: { ...this.data.corpus },
      queries: { ...this.data.queries },
    };
  }

  public toJSON() {
    return this.getStatus();
  }
}
