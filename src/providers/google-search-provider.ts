import type { SearchProvider } from './search-provider';
import type { SearchMode } from '../cache/types';
import type { ResultCache } from '../cache/result-cache';
import type { QuotaManager } from '../quota/quota-manager';
import { createCacheKeyString } from '../cache/cache-key';
import { callWithRetry } from './retry';
import {
  GOOGLE_SEARCH_RESPONSE_SCHEMA,
  type GoogleSearchItem,
  type SearchHit,
} from '../schemas/search-schemas';
import { ConfigError, SearchRequestError, handleUnknownError, isRetryableSearchError } from '../errors/index';
import { debug, error, log, warn } from '../output/logger';

export interface GoogleSearchConfig {
  apiKey: string | undefined;
  cx: string | undefined;
  endpoint?: string | undefined;
  timeoutMs?: number | undefined;
  retryDelayMs?: number | undefined;
}

export interface GoogleSearchDependencies {
  quota: QuotaManager;
  cache: ResultCache;
}

export const GoogleSearchDefaultConfig = {
  endpoint: 'https://www.googleapis.com/customsearch/v1',
  timeoutMs: 30_000,
  retryDelayMs: 1_500,
  // Custom Search JSON API caps `num` at 10 per request
  maxResultsPerRequest: 10,
  source: 'google_custom_search',
};

/**
 * Google Programmable Search (Custom Search JSON API) client.
 *
 * Cache first, then quota, then one HTTP round trip with a single retry on
 * 429/5xx. Every failure degrades to an empty result.
 */
export class GoogleSearchProvider implements SearchProvider {
  private readonly apiKey: string;
  private readonly cx: string;
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly retryDelayMs: number;
  private readonly quota: QuotaManager;
  private readonly cache: ResultCache;
  private readonly inFlight = new Map<string, Promise<SearchHit[]>>();

  constructor(config: GoogleSearchConfig, deps: GoogleSearchDependencies) {
    if (!config.apiKey?.trim()) {
      throw new ConfigError('Google Custom Search API key is required (GCP_SEARCH_API_KEY)');
    }
    if (!config.cx?.trim()) {
      throw new ConfigError('Custom Search Engine ID is required (GCP_CUSTOM_SEARCH_ENGINE_ID)');
    }

    this.apiKey = config.apiKey;
    this.cx = config.cx;
    this.endpoint = config.endpoint ?? GoogleSearchDefaultConfig.endpoint;
    this.timeoutMs = config.timeoutMs ?? GoogleSearchDefaultConfig.timeoutMs;
    this.retryDelayMs = config.retryDelayMs ?? GoogleSearchDefaultConfig.retryDelayMs;
    this.quota = deps.quota;
    this.cache = deps.cache;
  }

  /**
   * Query the search API and return canonical hits.
   *
   * `async` mode shares one in-flight request between concurrent callers
   * asking for the same key, so duplicates cost a single quota unit.
   */
  async searchWeb(query: string, numResults: number = 10, mode: SearchMode = 'sync'): Promise<SearchHit[]> {
    const key = createCacheKeyString({ mode, query, count: numResults });

    const cached = this.cache.get(key);
    if (cached) {
      debug(`Cache hit for query: ${query}`);
      return cached;
    }

    if (mode === 'sync') {
      return this.fetchAndStore(key, query, numResults);
    }

    let request = this.inFlight.get(key);
    if (!request) {
      request = this.fetchAndStore(key, query, numResults).finally(() => {
        this.inFlight.delete(key);
      });
      this.inFlight.set(key, request);
    }

    // Each caller of a shared request gets its own array
    const hits = await request;
    return [...hits];
  }

  private async fetchAndStore(key: string, query: string, numResults: number): Promise<SearchHit[]> {
    if (!this.quota.canConsume(1)) {
      warn('Daily API quota reached. Skipping Google Custom Search call.');
      return [];
    }

    let items: GoogleSearchItem[];
    try {
      items = await callWithRetry(() => this.request(query, numResults), {
        attempts: 2,
        delayMs: this.retryDelayMs,
        isRetryable: isRetryableSearchError,
        onRetry: (e) => {
          const err = handleUnknownError(e, 'Google Custom Search');
          warn(`Retrying Google Custom Search after transient failure: ${err.message}`);
        },
      });
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'Google Custom Search');
      error(`Error in Google Custom Search: ${err.message}`);
      return [];
    }

    const hits = items.map((item) => this.toSearchHit(item));

    // Only a completed round trip spends quota and fills the cache
    this.quota.consume(1);
    log(`Retrieved ${hits.length} results for query: ${query}`);
    this.cache.put(key, hits);
    return hits;
  }

  private async request(query: string, numResults: number): Promise<GoogleSearchItem[]> {
    const url = new URL(this.endpoint);
    url.searchParams.set('q', query);
    url.searchParams.set('key', this.apiKey);
    url.searchParams.set('cx', this.cx);
    url.searchParams.set(
      'num',
      String(Math.min(numResults, GoogleSearchDefaultConfig.maxResultsPerRequest))
    );

    const response = await fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    if (!response.ok) {
      await response.body?.cancel();
      throw new SearchRequestError(
        `Google Custom Search request failed: ${response.status} ${response.statusText}`,
        response.status
      );
    }

    const raw: unknown = await response.json();
    return GOOGLE_SEARCH_RESPONSE_SCHEMA.parse(raw).items;
  }

  private toSearchHit(item: GoogleSearchItem): SearchHit {
    return {
      title: item.title,
      link: item.link,
      snippet: item.snippet,
      displayLink: item.displayLink,
      source: GoogleSearchDefaultConfig.source,
    };
  }
}
