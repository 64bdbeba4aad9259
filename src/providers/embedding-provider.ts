/*
 * Embedding provider interface used by the re-ranker.
 * embed() resolves to null for text that cannot be embedded (empty input) and
 * never rejects; remote failures fall back to a local vector.
 */
export interface EmbeddingProvider {
  readonly name: string;
  embed(text: string): Promise<number[] | null>;
}

// Unicode-aware \w: letters, digits, underscore
const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;

/**
 * Deterministic bag-of-words vector: term frequency divided by the highest
 * frequency, one dimension per distinct lowercase token in sorted order.
 * Text without any word token yields [0].
 *
 * Vectors of different texts have different lengths and dimensions are not
 * aligned by term; similarity over them is a rough signal only.
 */
export function termFrequencyVector(text: string): number[] {
  const counts = new Map<string, number>();
  for (const token of text.toLowerCase().match(WORD_PATTERN) ?? []) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }

  if (counts.size === 0) return [0];

  const maxFreq = Math.max(...counts.values());
  return [...counts.keys()].sort().map((token) => (counts.get(token) ?? 0) / maxFreq);
}

export class LocalEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'local';

  embed(text: string): Promise<number[] | null> {
    if (!text.trim()) return Promise.resolve(null);
    return Promise.resolve(termFrequencyVector(text));
  }
}
