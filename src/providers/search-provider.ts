import type { SearchMode } from '../cache/types';
import type { SearchHit } from '../schemas/search-schemas';

/*
 * Search provider interface for evidence retrieval.
 * Implementations query an external search API and return canonical hits;
 * failures surface as an empty list, never as a rejection.
 */
export interface SearchProvider {
  searchWeb(query: string, numResults?: number, mode?: SearchMode): Promise<SearchHit[]>;
}
