import type { SearchHit } from '../schemas/search-schemas';

/*
 * Static trust priors added on top of semantic similarity.
 * Only the strongest domain boost applies; document-type boosts stack.
 */
export const DOMAIN_BOOSTS: ReadonlyArray<readonly [suffix: string, boost: number]> = [
  ['.gov', 0.08],
  ['.edu', 0.06],
  ['.org', 0.02],
];

export const PDF_BOOST = 0.02;
export const WIKIPEDIA_BOOST = 0.01;

/**
 * Highest matching domain boost for the hit's display host (or its link when
 * the provider sent no display host).
 */
export function domainPrior(hit: Pick<SearchHit, 'link' | 'displayLink'>): number {
  const host = (hit.displayLink || hit.link).toLowerCase();
  let prior = 0;
  for (const [suffix, boost] of DOMAIN_BOOSTS) {
    if (host.includes(suffix)) {
      prior = Math.max(prior, boost);
    }
  }
  return prior;
}

function isWikipediaHost(link: string): boolean {
  try {
    const { hostname } = new URL(link);
    return hostname === 'wikipedia.org' || hostname.endsWith('.wikipedia.org');
  } catch {
    // Not an absolute URL; fall back to a plain substring check
    return link.includes('wikipedia.org');
  }
}

export function documentTypeBoost(link: string): number {
  const lower = link.toLowerCase();
  let boost = 0;
  if (lower.endsWith('.pdf')) boost += PDF_BOOST;
  if (isWikipediaHost(lower)) boost += WIKIPEDIA_BOOST;
  return boost;
}
