import { z } from 'zod';

import { SEARCH_HIT_SCHEMA } from './search-schemas';

// UTC calendar day, e.g. 2024-05-01
const DAY_SCHEMA = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

export const CACHE_FILE_SCHEMA = z.object({
    date: DAY_SCHEMA,
    data: z.record(z.string(), z.array(SEARCH_HIT_SCHEMA)),
});

export const QUOTA_STATE_SCHEMA = z.object({
    date: DAY_SCHEMA,
    used: z.number().int().nonnegative(),
});

export type CacheFile = z.infer<typeof CACHE_FILE_SCHEMA>;
export type QuotaState = z.infer<typeof QUOTA_STATE_SCHEMA>;
