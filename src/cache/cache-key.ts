import type { CacheKey } from './types';

const SEPARATOR = '::';

/**
 * Renders a cache key as "mode::query::count".
 * Mode never contains the separator and count is an integer, so distinct
 * (mode, query, count) triples never collide even when the query does.
 */
export function createCacheKeyString({ mode, query, count }: CacheKey): string {
    return [mode, query, String(count)].join(SEPARATOR);
}
