import type { SearchProvider } from '../providers/search-provider';
import type { Reranker } from '../scoring/reranker';
import type { BatchRetrieveOptions, Evidence, RetrieveOptions, ScoredHit } from './types';
import { runWithConcurrency } from './concurrency';
import { handleUnknownError } from '../errors/index';
import { DEFAULT_BATCH_TOP_K, DEFAULT_CONCURRENCY, DEFAULT_SEARCH_RESULTS, DEFAULT_TOP_K } from '../config/constants';
import { error, log, warn } from '../output/logger';

export interface RetrievalDefaults {
  topK: number;
  searchResults: number;
  concurrency: number;
}

export interface EvidenceEngineDependencies {
  search: SearchProvider;
  reranker: Reranker;
  defaults?: Partial<RetrievalDefaults> | undefined;
}

export function toEvidence(hit: ScoredHit): Evidence {
  return { url: hit.link, title: hit.title, text: hit.snippet };
}

/**
 * Search, re-rank and truncate. Failures never escape: a query that cannot be
 * served yields an empty list so callers can move on to other claims.
 */
export class EvidenceEngine {
  private readonly search: SearchProvider;
  private readonly reranker: Reranker;
  private readonly defaults: RetrievalDefaults;

  constructor(deps: EvidenceEngineDependencies) {
    this.search = deps.search;
    this.reranker = deps.reranker;
    this.defaults = {
      topK: deps.defaults?.topK ?? DEFAULT_TOP_K,
      searchResults: deps.defaults?.searchResults ?? DEFAULT_SEARCH_RESULTS,
      concurrency: deps.defaults?.concurrency ?? DEFAULT_CONCURRENCY,
    };
  }

  /**
   * Ranked hits with their scores, at most topK of them.
   */
  async retrieveHits(query: string, options: RetrieveOptions = {}): Promise<ScoredHit[]> {
    const topK = Math.max(0, options.topK ?? this.defaults.topK);
    const searchResults = options.searchResults ?? this.defaults.searchResults;
    const mode = options.mode ?? 'sync';

    log(`Retrieving evidence for query: ${query}`);
    try {
      const hits = await this.search.searchWeb(query, searchResults, mode);
      if (hits.length === 0) {
        warn('No search results found');
        return [];
      }

      const reranked = await this.reranker.rerank(query, hits);
      const top = reranked.slice(0, topK);
      log(`Retrieved ${top.length} evidence documents`);
      return top;
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'Evidence retrieval');
      error(`Error retrieving evidence for query '${query}': ${err.message}`);
      return [];
    }
  }

  async retrieve(query: string, options: RetrieveOptions = {}): Promise<Evidence[]> {
    const hits = await this.retrieveHits(query, options);
    return hits.map(toEvidence);
  }

  /**
   * Evidence for several queries, run with bounded concurrency on the
   * concurrent-safe search path. One query failing records an empty list
   * for it and does not abort the batch.
   */
  async batchRetrieve(queries: readonly string[], options: BatchRetrieveOptions = {}): Promise<Map<string, Evidence[]>> {
    const topK = options.topK ?? DEFAULT_BATCH_TOP_K;
    const concurrency = options.concurrency ?? this.defaults.concurrency;

    const lists = await runWithConcurrency(queries, concurrency, async (query) => {
      try {
        return await this.retrieve(query, { topK, mode: 'async' });
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Batch retrieval');
        error(`Error retrieving evidence for query '${query}': ${err.message}`);
        return [];
      }
    });

    const results = new Map<string, Evidence[]>();
    queries.forEach((query, i) => {
      results.set(query, lists[i] ?? []);
    });
    return results;
  }
}
