import type { QuotaState } from '../schemas/cache-schema';
import type { StateStore } from '../storage/state-store';
import { systemClock, utcDay, type Clock } from '../storage/clock';
import { DEFAULT_DAILY_QUERY_LIMIT } from '../config/constants';
import { warn } from '../output/logger';

export interface QuotaOptions {
    /** Daily call budget; zero or negative means unlimited. */
    limit?: number | undefined;
    store: StateStore<QuotaState>;
    now?: Clock | undefined;
}

export interface QuotaUsage {
    date: string;
    used: number;
    limit: number;
    /** null when unlimited */
    remaining: number | null;
}

/**
 * Daily budget of outbound search calls, reset on UTC date rollover.
 *
 * canConsume() followed by consume() is not atomic. Concurrent callers can
 * overshoot the limit slightly; treat it as a soft limit.
 */
export class QuotaManager {
    readonly limit: number;
    private readonly store: StateStore<QuotaState>;
    private readonly now: Clock;
    private state: QuotaState;

    constructor(options: QuotaOptions) {
        this.limit = options.limit ?? DEFAULT_DAILY_QUERY_LIMIT;
        this.store = options.store;
        this.now = options.now ?? systemClock;

        const today = this.today();
        const stored = this.store.load();
        this.state = stored && stored.date === today ? stored : { date: today, used: 0 };
    }

    get unlimited(): boolean {
        return this.limit <= 0;
    }

    canConsume(amount: number = 1): boolean {
        if (this.unlimited) return true;
        this.rollover();
        return this.state.used + amount <= this.limit;
    }

    consume(amount: number = 1): void {
        this.rollover();
        this.state = { date: this.state.date, used: this.state.used + amount };

        try {
            this.store.save(this.state);
        } catch (e: unknown) {
            // The in-memory count stays authoritative for this process
            const msg = e instanceof Error ? e.message : String(e);
            warn(`Failed to persist quota state: ${msg}`);
        }
    }

    usage(): QuotaUsage {
        this.rollover();
        return {
            date: this.state.date,
            used: this.state.used,
            limit: this.limit,
            remaining: this.unlimited ? null : Math.max(0, this.limit - this.state.used),
        };
    }

    private today(): string {
        return utcDay(this.now());
    }

    // Stale day reads as zero usage; nothing is written until the next consume()
    private rollover(): void {
        const today = this.today();
        if (this.state.date !== today) {
            this.state = { date: today, used: 0 };
        }
    }
}
