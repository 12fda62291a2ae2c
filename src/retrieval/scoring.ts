import type { RetrievalHit } from "./types.js";

/**
 * Maps a raw store score to a similarity in [0, 1], 1 being identical.
 *
 * Scores in [0, 2] are distances between unit vectors (0 identical, 2 opposite).
 * Negative scores are cosine similarities in [-1, 1]. Anything above 2 is clamped.
 *
 * This measures closeness in embedding space only. It says nothing about whether
 * the chunk answers the question.
 */
export function normalizeSimilarity(raw: number): number {
  let similarity: number;
  if (raw >= 0 && raw <= 2.0) {
    similarity = 1.0 - raw / 2.0;
  } else if (raw < 0) {
    similarity = (raw + 1) / 2;
  } else {
    similarity = raw;
  }
  return Math.min(1.0, Math.max(0.0, similarity));
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function toSimilarityPct(similarity: number): number {
  return roundTo(similarity * 100, 1);
}

export type ScoredHit = RetrievalHit & { similarity: number };

export function scoreHits(hits: readonly RetrievalHit[]): ScoredHit[] {
  return hits.map((hit) => ({ ...hit, similarity: normalizeSimilarity(hit.distance) }));
}

/** Drops hits below `threshold`; order is kept. A null threshold keeps everything. */
export function filterBySimilarity<T extends { similarity: number }>(
  hits: readonly T[],
  threshold: number | null
): T[] {
  if (threshold == null) return hits.slice();
  return hits.filter((h) => h.similarity >= threshold);
}
