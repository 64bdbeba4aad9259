import { z } from 'zod';
import { LOG_LEVELS } from '../output/logger';
import { GoogleSearchDefaultConfig } from '../providers/google-search-provider';
import { GeminiEmbeddingDefaultConfig } from '../providers/gemini-embedding-provider';
import {
  DEFAULT_CACHE_PATH,
  DEFAULT_CONCURRENCY,
  DEFAULT_DAILY_QUERY_LIMIT,
  DEFAULT_QUOTA_PATH,
  DEFAULT_SEARCH_RESULTS,
  DEFAULT_TOP_K,
} from '../config/constants';

// `KEY=` lines in .env files arrive as empty strings; treat them as unset
function blankAsUndefined(value: unknown): unknown {
  if (typeof value === 'string' && value.trim() === '') return undefined;
  return value;
}

const optionalString = () => z.preprocess(blankAsUndefined, z.string().trim().optional());

export const ENV_SCHEMA = z.object({
  // Search credentials: optional here, required when the search client is built
  GCP_SEARCH_API_KEY: optionalString(),
  GCP_CUSTOM_SEARCH_ENGINE_ID: optionalString(),
  GCP_SEARCH_ENDPOINT: z.preprocess(
    blankAsUndefined,
    z.string().url().default(GoogleSearchDefaultConfig.endpoint)
  ),

  // Quota and cache
  GCP_DAILY_QUERY_LIMIT: z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().default(DEFAULT_DAILY_QUERY_LIMIT)
  ),
  GCP_SEARCH_CACHE: z.preprocess(blankAsUndefined, z.string().default(DEFAULT_CACHE_PATH)),
  GCP_QUOTA_STORE: z.preprocess(blankAsUndefined, z.string().default(DEFAULT_QUOTA_PATH)),

  // Embeddings
  GOOGLE_API_KEY: optionalString(),
  EMBEDDING_MODEL: z.preprocess(
    blankAsUndefined,
    z.string().default(GeminiEmbeddingDefaultConfig.model)
  ),

  // Retrieval defaults
  DEFAULT_TOP_K: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(DEFAULT_TOP_K)),
  DEFAULT_SEARCH_RESULTS: z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().positive().default(DEFAULT_SEARCH_RESULTS)
  ),
  RETRIEVAL_CONCURRENCY: z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().positive().default(DEFAULT_CONCURRENCY)
  ),

  LOG_LEVEL: z.preprocess(
    (v) => (typeof v === 'string' ? blankAsUndefined(v.trim().toLowerCase()) : v),
    z.enum(LOG_LEVELS).default('info')
  ),
});

// Inferred types
export type EnvConfig = z.infer<typeof ENV_SCHEMA>;
