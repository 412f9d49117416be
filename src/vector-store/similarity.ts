import type { DistanceMetric } from "../types/vector-store.js";

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  return denom === 0 ? 0 : dot / denom;
}

export function dotProduct(a: number[], b: number[]): number {
  let dot = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
  }
  return dot;
}

export function euclideanDistance(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = a[i] - b[i];
    sum += diff * diff;
  }
  return Math.sqrt(sum);
}

/** Maps a distance onto (0, 1] so that closer points score higher. */
export function distanceToScore(distance: number): number {
  return 1 / (1 + distance);
}

export function similarity(
  metric: DistanceMetric,
  a: number[],
  b: number[],
): number {
  switch (metric) {
    case "cosine":
      return cosineSimilarity(a, b);
    case "dot":
      return dotProduct(a, b);
    case "euclid":
      return distanceToScore(euclideanDistance(a, b));
  }
}
