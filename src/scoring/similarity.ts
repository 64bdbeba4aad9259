/**
 * Cosine similarity with the shorter vector zero-padded to the longer one.
 * Empty or zero-norm input yields 0, never NaN.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || b.length === 0) return 0;

  const length = Math.max(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function roundScore(score: number, decimals: number = 4): number {
  const factor = 10 ** decimals;
  return Math.round(score * factor) / factor;
}
