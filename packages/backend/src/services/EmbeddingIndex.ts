import type { Chunk } from "@docchat/shared";
import { appConfig } from "../config.js";
import { EmbeddingUnavailableError, errorMessage } from "../errors.js";
import { runWithConcurrency } from "../utils/concurrency.js";
import type { EmbeddingProvider } from "./llmTypes.js";

export interface ScoredChunk {
  chunk: Chunk;
  /** Cosine distance; lower is more similar. */
  distance: number;
}

interface IndexEntry {
  id: number;
  vector: number[];
  chunk: Chunk;
}

export function cosineDistance(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new RangeError(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) {
    return 1;
  }
  return 1 - dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** Append-only set of (vector, chunk) pairs searchable by cosine distance. */
export class EmbeddingIndex {
  private readonly entries: IndexEntry[] = [];
  private readonly chunksById = new Map<number, Chunk>();
  private dimensions: number | null = null;

  get size(): number {
    return this.entries.length;
  }

  describe(): { size: number; dimensions: number | null } {
    return { size: this.entries.length, dimensions: this.dimensions };
  }

  append(vector: number[], chunk: Chunk): number {
    if (this.dimensions === null) {
      this.dimensions = vector.length;
    } else if (vector.length !== this.dimensions) {
      throw new RangeError(
        `Vector dimension mismatch: index holds ${this.dimensions}, got ${vector.length}`
      );
    }

    const id = this.entries.length;
    this.entries.push({ id, vector: [...vector], chunk });
    this.chunksById.set(id, chunk);
    return id;
  }

  getChunk(id: number): Chunk | undefined {
    return this.chunksById.get(id);
  }

  chunks(): Chunk[] {
    return this.entries.map((entry) => entry.chunk);
  }

  search(queryVector: readonly number[], k: number): ScoredChunk[] {
    if (k < 1 || this.entries.length === 0) {
      return [];
    }

    return this.entries
      .map((entry) => ({
        id: entry.id,
        chunk: entry.chunk,
        distance: cosineDistance(queryVector, entry.vector)
      }))
      .sort((a, b) => a.distance - b.distance || a.id - b.id)
      .slice(0, Math.floor(k))
      .map(({ chunk, distance }) => ({ chunk, distance }));
  }
}

interface IndexerOptions {
  concurrency: number;
}

/** Embeds chunks through the embedding provider and maintains indexes built from them. */
export class Indexer {
  private readonly options: IndexerOptions;

  constructor(
    private readonly embeddings: EmbeddingProvider,
    options: Partial<IndexerOptions> = {}
  ) {
    this.options = {
      concurrency: appConfig.EMBEDDING_CONCURRENCY,
      ...options
    };
  }

  /** All-or-nothing: any embedding failure fails the build. */
  async build(chunks: readonly Chunk[]): Promise<EmbeddingIndex> {
    const index = new EmbeddingIndex();
    await this.addChunks(index, chunks);
    return index;
  }

  /** Embeds every new chunk first so a failure leaves the index untouched. */
  async addChunks(index: EmbeddingIndex, chunks: readonly Chunk[]): Promise<void> {
    const vectors = await this.embedAll(chunks);
    const expected = index.describe().dimensions ?? vectors[0]?.length;
    if (vectors.some((vector) => vector.length !== expected)) {
      throw new EmbeddingUnavailableError("Embedding provider returned vectors of inconsistent dimensions");
    }

    chunks.forEach((chunk, position) => {
      const vector = vectors[position];
      if (vector) {
        index.append(vector, chunk);
      }
    });
  }

  async query(index: EmbeddingIndex, text: string, k: number): Promise<ScoredChunk[]> {
    if (k < 1 || index.size === 0) {
      return [];
    }
    const vector = await this.embed(text);
    return index.search(vector, k);
  }

  private async embedAll(chunks: readonly Chunk[]): Promise<number[][]> {
    const vectors: number[][] = new Array<number[]>(chunks.length);
    await runWithConcurrency(chunks, this.options.concurrency, async (chunk, position) => {
      vectors[position] = await this.embed(chunk.text);
    });
    return vectors;
  }

  private async embed(text: string): Promise<number[]> {
    let vector: number[];
    try {
      vector = await this.embeddings.generateEmbedding(text);
    } catch (error) {
      if (error instanceof EmbeddingUnavailableError) {
        throw error;
      }
      throw new EmbeddingUnavailableError(`Embedding service unavailable: ${errorMessage(error)}`, {
        cause: error
      });
    }

    if (vector.length === 0 || vector.some((value) => !Number.isFinite(value))) {
      throw new EmbeddingUnavailableError("Embedding service returned an empty or invalid vector");
    }
    return vector;
  }
}
