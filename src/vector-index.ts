/** Raised when a vector's length differs from the index dimension. */
export class DimensionMismatchError extends Error {
  constructor(expected: number, actual: number) {
    super(`Vector dimension mismatch: expected ${expected}, got ${actual}`);
    this.name = "DimensionMismatchError";
  }
}

/** Parallel arrays, nearest first (same shape FAISS returns). */
export interface SearchResult {
  distances: number[];
  indices: number[];
}

/**
 * Exact (brute-force) nearest-neighbour index over squared Euclidean
 * distance. Vectors are addressed by insertion position. Linear scan is
 * plenty for corpora of a few thousand entries.
 */
export class FlatIndex {
  private readonly vectors: Float32Array[] = [];
  private dim: number | null;

  public constructor(dim?: number) {
    this.dim = dim ?? null;
  }

  /** Vector length, fixed by the constructor or by the first vector added. */
  public get dimension(): number | null {
    return this.dim;
  }

  public get size(): number {
    return this.vectors.length;
  }

  public add(vectors: readonly Float32Array[]): void {
    for (const v of vectors) {
      if (this.dim === null) this.dim = v.length;
      if (v.length !== this.dim) throw new DimensionMismatchError(this.dim, v.length);
    }
    for (const v of vectors) this.vectors.push(Float32Array.from(v));
  }

  /** Stored vector at `position` (undefined when out of range). */
  public vector(position: number): Float32Array | undefined {
    return this.vectors[position];
  }

  /**
   * Return the `k` nearest vectors to `query`, ascending by distance. Equal
   * distances keep insertion order. `k` is clamped to the index size.
   */
  public search(query: Float32Array, k: number): SearchResult {
    if (this.dim !== null && query.length !== this.dim) {
      throw new DimensionMismatchError(this.dim, query.length);
    }
    const limit = Math.min(Math.max(0, Math.floor(k)), this.vectors.length);
    if (limit === 0) return { distances: [], indices: [] };

    const scored = this.vectors.map((v, index) => ({ index, distance: FlatIndex.l2sq(v, query) }));
    scored.sort((a, b) => a.distance - b.distance || a.index - b.index);
    const top = scored.slice(0, limit);
    return { distances: top.map((s) => s.distance), indices: top.map((s) => s.index) };
  }

  public static l2sq(a: Float32Array, b: Float32Array): number {
    let sum = 0;
    for (let i = 0; i < a.length; i++) {
      const d = a[i] - b[i];
      sum += d * d;
    }
    return sum;
  }
}
