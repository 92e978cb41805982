/**
 * Cosine similarity between two dense vectors, in [-1, 1].
 * Returns 0 when the dimensions differ or either vector has zero magnitude.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  if (denom === 0) {
    return 0;
  }

  return Math.max(-1, Math.min(1, dot / denom));
}

/**
 * Similarity used for thresholding: negatives count as unrelated.
 */
export function clampSimilarity(similarity: number): number {
  if (!Number.isFinite(similarity) || similarity <= 0) return 0;
  return similarity >= 1 ? 1 : similarity;
}

export function normalizeVector(vector: number[]): number[] {
  const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  if (norm === 0) return vector;
  return vector.map(v => v / norm);
}
