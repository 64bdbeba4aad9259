export { EvidenceEngine, toEvidence, type EvidenceEngineDependencies, type RetrievalDefaults } from './retrieval/evidence-engine';
export {
  createEvidenceEngine,
  createEngineComponents,
  createQuotaManager,
  type EngineComponents,
  type EngineOverrides,
} from './retrieval/factory';
export type { BatchRetrieveOptions, Evidence, RetrieveOptions, ScoredHit, SearchHit } from './retrieval/types';
export { runWithConcurrency } from './retrieval/concurrency';

export { loadEngineConfig, toEngineConfig, type EngineConfig } from './config/config';
export { parseEnvironment } from './boundaries/env-parser';

export { QuotaManager, type QuotaOptions, type QuotaUsage } from './quota/quota-manager';
export { ResultCache, type ResultCacheOptions } from './cache/result-cache';
export { createCacheKeyString } from './cache/cache-key';
export type { CacheKey, SearchMode } from './cache/types';
export { JsonFileStore, MemoryStore, type StateStore } from './storage/state-store';
export { utcDay, systemClock, type Clock } from './storage/clock';

export type { SearchProvider } from './providers/search-provider';
export {
  GoogleSearchProvider,
  GoogleSearchDefaultConfig,
  type GoogleSearchConfig,
  type GoogleSearchDependencies,
} from './providers/google-search-provider';
export { LocalEmbeddingProvider, termFrequencyVector, type EmbeddingProvider } from './providers/embedding-provider';
export {
  GeminiEmbeddingProvider,
  createEmbeddingProvider,
  normalizeEmbedding,
  type GeminiEmbeddingConfig,
} from './providers/gemini-embedding-provider';

export * from './scoring/index';
export * from './errors/index';
