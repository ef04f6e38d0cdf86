// Keeps zero-norm vectors finite: their similarity to anything is 0.
const NORM_EPSILON = 1e-12;

export function dot(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}

export function norm(vector: ArrayLike<number>): number {
  return Math.sqrt(dot(vector, vector));
}

/**
 * Cosine similarity in [-1, 1]. Callers are expected to compare vectors of
 * equal length; zero vectors score 0 instead of NaN.
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length || a.length === 0) {
    return 0;
  }
  return dot(a, b) / (norm(a) * norm(b) + NORM_EPSILON);
}
