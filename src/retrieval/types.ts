import type { SearchMode } from '../cache/types';
import type { SearchHit } from '../schemas/search-schemas';

export type { SearchHit };

/**
 * A hit after re-ranking. similarityScore is null only when the query could
 * not be embedded and hits were passed through unranked.
 */
export interface ScoredHit extends SearchHit {
  readonly similarityScore: number | null;
}

/**
 * Evidence handed to the verification pipeline.
 */
export interface Evidence {
  url: string;
  title: string;
  text: string;
}

export interface RetrieveOptions {
  /** Number of evidence items to return. */
  topK?: number | undefined;
  /** Number of raw results to request from the search API (max 10 per call). */
  searchResults?: number | undefined;
  mode?: SearchMode | undefined;
}

export interface BatchRetrieveOptions {
  topK?: number | undefined;
  concurrency?: number | undefined;
}
