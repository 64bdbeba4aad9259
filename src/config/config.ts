import { parseEnvironment } from '../boundaries/env-parser';
import type { EnvConfig } from '../schemas/env-schemas';
import type { LogLevel } from '../output/logger';

/**
 * Everything the engine needs, enumerated once at the composition root.
 * Nothing below createEvidenceEngine() reads process.env.
 */
export interface EngineConfig {
  search: {
    apiKey: string | undefined;
    cx: string | undefined;
    endpoint: string;
  };
  quota: {
    dailyLimit: number;
    storePath: string;
  };
  cache: {
    path: string;
  };
  embedding: {
    apiKey: string | undefined;
    model: string;
  };
  retrieval: {
    topK: number;
    searchResults: number;
    concurrency: number;
  };
  logLevel: LogLevel;
}

export function toEngineConfig(env: EnvConfig): EngineConfig {
  return {
    search: {
      apiKey: env.GCP_SEARCH_API_KEY,
      cx: env.GCP_CUSTOM_SEARCH_ENGINE_ID,
      endpoint: env.GCP_SEARCH_ENDPOINT,
    },
    quota: {
      dailyLimit: env.GCP_DAILY_QUERY_LIMIT,
      storePath: env.GCP_QUOTA_STORE,
    },
    cache: {
      path: env.GCP_SEARCH_CACHE,
    },
    embedding: {
      apiKey: env.GOOGLE_API_KEY,
      model: env.EMBEDDING_MODEL,
    },
    retrieval: {
      topK: env.DEFAULT_TOP_K,
      searchResults: env.DEFAULT_SEARCH_RESULTS,
      concurrency: env.RETRIEVAL_CONCURRENCY,
    },
    logLevel: env.LOG_LEVEL,
  };
}

// Parse and map the environment in one step
export function loadEngineConfig(env: unknown = process.env): EngineConfig {
  return toEngineConfig(parseEnvironment(env));
}
