import type { EmbeddingsInterface } from "@langchain/core/embeddings";

import { EmbeddingProviderError, InvalidArgumentError } from "../errors.js";
import { topKNearest } from "./search.js";
import type { Chunk, DistanceMetric, IndexEntry, RetrievalHit, StoredChunk } from "./types.js";
import { toUnitVector } from "./vectorMath.js";

/**
 * Nearest-neighbour index over the chunks of one session.
 *
 * Entries are append-only. `search` returns hits by ascending `distance` under
 * `metric`; turning distances into similarities is the caller's job.
 */
export interface IndexStore {
  readonly metric: DistanceMetric;
  /** 0 until the first successful `add`. */
  readonly dimension: number;
  add(chunks: readonly Chunk[]): Promise<void>;
  search(queryText: string, k: number): Promise<RetrievalHit[]>;
  size(): number;
  /** Entries with their (unit-length) embeddings, for session files. */
  toStored(): StoredChunk[];
}

export class InMemoryIndexStore implements IndexStore {
  private entries: IndexEntry[] = [];
  private dim = 0;

  constructor(
    private readonly embeddings: EmbeddingsInterface,
    readonly metric: DistanceMetric = "l2"
  ) {}

  static fromStored(params: {
    embeddings: EmbeddingsInterface;
    metric: DistanceMetric;
    dimension: number;
    chunks: readonly StoredChunk[];
  }): InMemoryIndexStore {
    const store = new InMemoryIndexStore(params.embeddings, params.metric);
    for (const [i, c] of params.chunks.entries()) {
      if (c.embedding.length !== params.dimension) {
        throw new Error(
          `Stored embedding dimension mismatch at chunk ${i}: expected=${params.dimension} actual=${c.embedding.length}`
        );
      }
    }
    store.dim = params.chunks.length > 0 ? params.dimension : 0;
    store.entries = params.chunks.map((c) => ({
      chunk: {
        text: c.text,
        sourceId: c.sourceId,
        positionIndex: c.positionIndex,
        pageNumber: c.pageNumber
      },
      embedding: c.embedding
    }));
    return store;
  }

  get dimension(): number {
    return this.dim;
  }

  size(): number {
    return this.entries.length;
  }

  async add(chunks: readonly Chunk[]): Promise<void> {
    if (chunks.length === 0) return;

    let vectors: number[][];
    try {
      vectors = await this.embeddings.embedDocuments(chunks.map((c) => c.text));
    } catch (err: unknown) {
      throw new EmbeddingProviderError("Embedding provider failed while indexing chunks", {
        cause: err
      });
    }

    if (vectors.length !== chunks.length) {
      throw new EmbeddingProviderError(
        `Embedding count mismatch: chunks=${chunks.length} embeddings=${vectors.length}`
      );
    }

    const expectedDim = this.dim > 0 ? this.dim : (vectors[0]?.length ?? 0);
    if (expectedDim <= 0) {
      throw new EmbeddingProviderError(`Embedding dimension invalid (${expectedDim})`);
    }
    for (const [i, v] of vectors.entries()) {
      if (v.length !== expectedDim) {
        throw new EmbeddingProviderError(
          `Embedding dimension mismatch at chunk ${i}: expected=${expectedDim} actual=${v.length}`
        );
      }
    }

    // Everything is validated; append in one step.
    const added: IndexEntry[] = chunks.map((chunk, i) => ({
      chunk,
      embedding: toUnitVector(vectors[i] ?? [])
    }));
    this.entries = [...this.entries, ...added];
    this.dim = expectedDim;
  }

  async search(queryText: string, k: number): Promise<RetrievalHit[]> {
    if (!Number.isInteger(k) || k <= 0) {
      throw new InvalidArgumentError(`k must be a positive integer (got ${k})`);
    }
    if (this.entries.length === 0) return [];

    let queryEmbedding: number[];
    try {
      queryEmbedding = await this.embeddings.embedQuery(queryText);
    } catch (err: unknown) {
      throw new EmbeddingProviderError("Embedding provider failed while embedding the query", {
        cause: err
      });
    }

    if (queryEmbedding.length !== this.dim) {
      throw new EmbeddingProviderError(
        `Embedding dimension mismatch: index=${this.dim} query=${queryEmbedding.length}`
      );
    }

    return topKNearest({
      queryEmbedding: toUnitVector(queryEmbedding),
      entries: this.entries,
      metric: this.metric,
      k
    });
  }

  toStored(): StoredChunk[] {
    return this.entries.map((e) => ({
      text: e.chunk.text,
      sourceId: e.chunk.sourceId,
      positionIndex: e.chunk.positionIndex,
      pageNumber: e.chunk.pageNumber,
      embedding: [...e.embedding]
    }));
  }
}
