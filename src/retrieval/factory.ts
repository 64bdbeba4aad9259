import type { EngineConfig } from '../config/config';
import { CACHE_FILE_SCHEMA, QUOTA_STATE_SCHEMA, type CacheFile, type QuotaState } from '../schemas/cache-schema';
import { JsonFileStore, type StateStore } from '../storage/state-store';
import type { Clock } from '../storage/clock';
import { QuotaManager } from '../quota/quota-manager';
import { ResultCache } from '../cache/result-cache';
import { GoogleSearchProvider } from '../providers/google-search-provider';
import { createEmbeddingProvider } from '../providers/gemini-embedding-provider';
import type { EmbeddingProvider } from '../providers/embedding-provider';
import { Reranker } from '../scoring/reranker';
import { EvidenceEngine } from './evidence-engine';

export interface EngineOverrides {
  quotaStore?: StateStore<QuotaState> | undefined;
  cacheStore?: StateStore<CacheFile> | undefined;
  embedder?: EmbeddingProvider | undefined;
  now?: Clock | undefined;
  cwd?: string | undefined;
}

export interface EngineComponents {
  engine: EvidenceEngine;
  quota: QuotaManager;
  cache: ResultCache;
  search: GoogleSearchProvider;
  embedder: EmbeddingProvider;
}

export function createQuotaManager(config: EngineConfig, overrides: EngineOverrides = {}): QuotaManager {
  return new QuotaManager({
    limit: config.quota.dailyLimit,
    store:
      overrides.quotaStore ??
      new JsonFileStore<QuotaState>(config.quota.storePath, QUOTA_STATE_SCHEMA, overrides.cwd),
    now: overrides.now,
  });
}

/**
 * Wires the engine from an explicit configuration. Throws ConfigError when
 * the search credentials are missing.
 */
export function createEngineComponents(config: EngineConfig, overrides: EngineOverrides = {}): EngineComponents {
  const quota = createQuotaManager(config, overrides);
  const cache = new ResultCache({
    store:
      overrides.cacheStore ?? new JsonFileStore<CacheFile>(config.cache.path, CACHE_FILE_SCHEMA, overrides.cwd),
    now: overrides.now,
  });

  const search = new GoogleSearchProvider(
    { apiKey: config.search.apiKey, cx: config.search.cx, endpoint: config.search.endpoint },
    { quota, cache }
  );

  const embedder =
    overrides.embedder ??
    createEmbeddingProvider({ apiKey: config.embedding.apiKey, model: config.embedding.model });

  const engine = new EvidenceEngine({
    search,
    reranker: new Reranker(embedder),
    defaults: config.retrieval,
  });

  return { engine, quota, cache, search, embedder };
}

export function createEvidenceEngine(config: EngineConfig, overrides: EngineOverrides = {}): EvidenceEngine {
  return createEngineComponents(config, overrides).engine;
}
