import type { EmbeddingProvider } from '../providers/embedding-provider';
import type { SearchHit } from '../schemas/search-schemas';
import type { ScoredHit } from '../retrieval/types';
import { cosineSimilarity, roundScore } from './similarity';
import { documentTypeBoost, domainPrior } from './priors';
import { log } from '../output/logger';

// Hits below this similarity are treated as absent, not as low-ranked
export const SIMILARITY_THRESHOLD = 0.3;

/**
 * Drops hits without a link and keeps the first hit seen for each link.
 */
export function dedupeByLink<T extends Pick<SearchHit, 'link'>>(hits: readonly T[]): T[] {
  const seen = new Set<string>();
  const unique: T[] = [];
  for (const hit of hits) {
    if (!hit.link || seen.has(hit.link)) continue;
    seen.add(hit.link);
    unique.push(hit);
  }
  return unique;
}

/**
 * Re-ranks search hits by semantic similarity to the query plus static
 * domain and document-type priors.
 */
export class Reranker {
  constructor(private readonly embedder: EmbeddingProvider) {}

  async rerank(query: string, hits: readonly SearchHit[]): Promise<ScoredHit[]> {
    if (hits.length === 0) return [];

    const unique = dedupeByLink(hits);

    const queryVector = await this.embedder.embed(query);
    if (!queryVector) {
      return unique.map((hit) => ({ ...hit, similarityScore: null }));
    }

    const snippetVectors = await Promise.all(unique.map((hit) => this.embedder.embed(hit.snippet)));

    const scored: ScoredHit[] = [];
    unique.forEach((hit, i) => {
      const vector = snippetVectors[i];
      if (!vector) {
        // Unembeddable snippet: keep the hit at the bottom
        scored.push({ ...hit, similarityScore: 0 });
        return;
      }

      const similarity = cosineSimilarity(queryVector, vector);
      if (similarity < SIMILARITY_THRESHOLD) return;

      const score = similarity + domainPrior(hit) + documentTypeBoost(hit.link);
      scored.push({ ...hit, similarityScore: roundScore(score) });
    });

    // Array.prototype.sort is stable: ties keep their input order
    scored.sort((a, b) => (b.similarityScore ?? 0) - (a.similarityScore ?? 0));

    log(`Re-ranked ${scored.length} documents after filtering and deduplication`);
    return scored;
  }
}
