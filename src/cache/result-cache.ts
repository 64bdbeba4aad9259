import type { CacheFile } from '../schemas/cache-schema';
import type { SearchHit } from '../schemas/search-schemas';
import type { StateStore } from '../storage/state-store';
import { systemClock, utcDay, type Clock } from '../storage/clock';
import { warn } from '../output/logger';

export interface ResultCacheOptions {
    store: StateStore<CacheFile>;
    now?: Clock | undefined;
}

/**
 * Persistent cache of raw search results, keyed by createCacheKeyString().
 *
 * The whole cache is dropped when its date is not the current UTC day; there
 * is no per-entry expiry. The daily quota already bounds how large it grows.
 */
export class ResultCache {
    private readonly store: StateStore<CacheFile>;
    private readonly now: Clock;
    private data: CacheFile;

    constructor(options: ResultCacheOptions) {
        this.store = options.store;
        this.now = options.now ?? systemClock;
        this.data = this.load();
    }

    /**
     * Load cache from the store, or start empty when it is missing or from
     * an earlier day.
     */
    private load(): CacheFile {
        const today = this.today();
        const stored = this.store.load();
        if (stored && stored.date === today) {
            return stored;
        }
        return { date: today, data: {} };
    }

    // Entries are copied in and out; callers never hold the cached array
    get(key: string): SearchHit[] | undefined {
        this.rollover();
        const hits = this.data.data[key];
        return hits === undefined ? undefined : [...hits];
    }

    has(key: string): boolean {
        this.rollover();
        return this.data.data[key] !== undefined;
    }

    put(key: string, hits: readonly SearchHit[]): void {
        this.rollover();
        this.data.data[key] = [...hits];
        this.save();
    }

    size(): number {
        this.rollover();
        return Object.keys(this.data.data).length;
    }

    private save(): void {
        try {
            this.store.save(this.data);
        } catch (e) {
            // Don't fail the search if the cache can't be written
            const msg = e instanceof Error ? e.message : String(e);
            warn(`Failed to persist search cache: ${msg}`);
        }
    }

    private today(): string {
        return utcDay(this.now());
    }

    // A long-running process crossing UTC midnight starts a fresh cache
    private rollover(): void {
        const today = this.today();
        if (this.data.date !== today) {
            this.data = { date: today, data: {} };
        }
    }
}
