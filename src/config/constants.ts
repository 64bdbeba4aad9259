/**
 * Configuration constants
 */

export const DEFAULT_DAILY_QUERY_LIMIT = 100;
export const DEFAULT_CACHE_PATH = 'logs/.google_search_cache.json';
export const DEFAULT_QUOTA_PATH = 'logs/.google_quota.json';

export const DEFAULT_TOP_K = 5;
export const DEFAULT_SEARCH_RESULTS = 10;
export const DEFAULT_BATCH_TOP_K = 3;
export const DEFAULT_CONCURRENCY = 4;

export const ENV_TEMPLATE_FILENAME = '.env.evidence';
