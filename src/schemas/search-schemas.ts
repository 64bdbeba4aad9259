import { z } from 'zod';

// Google omits fields per item (e.g. no snippet for some PDFs); absent or null becomes ''
const text = () => z.string().nullish().transform((v) => v ?? '');

export const GOOGLE_SEARCH_ITEM_SCHEMA = z.object({
  title: text(),
  link: text(),
  snippet: text(),
  displayLink: text(),
});

export const GOOGLE_SEARCH_RESPONSE_SCHEMA = z.object({
  items: z.array(GOOGLE_SEARCH_ITEM_SCHEMA).nullish().transform((v) => v ?? []),
});

/**
 * Canonical hit record produced by the search client and stored in the cache.
 */
export const SEARCH_HIT_SCHEMA = z.object({
  title: z.string(),
  link: z.string(),
  snippet: z.string(),
  displayLink: z.string(),
  source: z.string(),
});

export type GoogleSearchItem = z.infer<typeof GOOGLE_SEARCH_ITEM_SCHEMA>;
export type SearchHit = Readonly<z.infer<typeof SEARCH_HIT_SCHEMA>>;
