import type { DistanceMetric, IndexEntry, RetrievalHit } from "./types.js";
import { distance } from "./vectorMath.js";

export function topKNearest(params: {
  queryEmbedding: readonly number[];
  entries: readonly IndexEntry[];
  metric: DistanceMetric;
  k: number;
}): RetrievalHit[] {
  const expectedDim = params.queryEmbedding.length;
  const valid = params.entries.filter((e) => e.embedding.length === expectedDim);

  if (expectedDim === 0 || valid.length !== params.entries.length) {
    throw new Error(
      `Query embedding dimension ${expectedDim} does not match the index`
    );
  }

  // Array#sort is stable, so equal distances keep insertion order.
  return valid
    .map((entry) => ({
      chunk: entry.chunk,
      distance: distance(params.metric, params.queryEmbedding, entry.embedding)
    }))
    .sort((a, b) => a.distance - b.distance)
    .slice(0, params.k);
}
