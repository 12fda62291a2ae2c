import type { DistanceMetric } from "./types.js";

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error("Embedding dimension mismatch");
  }
  let dot = 0;
  let a2 = 0;
  let b2 = 0;
  for (let i = 0; i < a.length; i += 1) {
    const av = a[i] ?? 0;
    const bv = b[i] ?? 0;
    dot += av * bv;
    a2 += av * av;
    b2 += bv * bv;
  }
  const denom = Math.sqrt(a2) * Math.sqrt(b2);
  return denom === 0 ? 0 : dot / denom;
}

export function toUnitVector(v: readonly number[]): number[] {
  let norm = 0;
  for (const x of v) norm += x * x;
  norm = Math.sqrt(norm);
  if (norm === 0) return v.slice();
  return v.map((x) => x / norm);
}

export function euclideanDistance(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error("Embedding dimension mismatch");
  }
  let sum = 0;
  for (let i = 0; i < a.length; i += 1) {
    const d = (a[i] ?? 0) - (b[i] ?? 0);
    sum += d * d;
  }
  return Math.sqrt(sum);
}

/**
 * Distance between two unit vectors under `metric`, in [0, 2]. 0 means identical
 * direction for both metrics; the clamp only absorbs rounding.
 */
export function distance(metric: DistanceMetric, a: readonly number[], b: readonly number[]): number {
  const raw = metric === "l2" ? euclideanDistance(a, b) : 1 - cosineSimilarity(a, b);
  return Math.min(2, Math.max(0, raw));
}
