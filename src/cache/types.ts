/**
 * Which search path produced a cached entry. `async` is the concurrent-safe
 * path; both modes cache under separate keys.
 */
export type SearchMode = 'sync' | 'async';

/**
 * Parts of a cache key before rendering.
 */
export interface CacheKey {
    mode: SearchMode;
    query: string;
    count: number;
}
