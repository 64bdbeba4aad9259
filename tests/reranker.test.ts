import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Reranker, SIMILARITY_THRESHOLD, dedupeByLink } from '../src/scoring/reranker';
import { cosineSimilarity, roundScore } from '../src/scoring/similarity';
import { documentTypeBoost, domainPrior } from '../src/scoring/priors';
import { termFrequencyVector } from '../src/providers/embedding-provider';
import {
  QUERY_VECTOR,
  SIM_020,
  SIM_029,
  SIM_030,
  SIM_035,
  SIM_050,
  TableEmbedder,
  makeHit,
} from './utils';

const QUERY = 'Hittite beekeeping archaeology Turkey';

describe('cosineSimilarity', () => {
  it('is 1 for identical directions', () => {
    expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 10);
  });

  it('zero-pads the shorter vector', () => {
    expect(cosineSimilarity([1], [1, 0, 0])).toBe(1);
    expect(cosineSimilarity(QUERY_VECTOR, SIM_050)).toBe(0.5);
  });

  it('returns 0 for a zero vector instead of NaN', () => {
    expect(cosineSimilarity([0], [1, 2])).toBe(0);
    expect(cosineSimilarity([0, 0], [0, 0])).toBe(0);
  });

  it('returns 0 for empty vectors', () => {
    expect(cosineSimilarity([], [1])).toBe(0);
  });

  it('scores an empty snippet fallback embedding as 0 against any query', () => {
    const snippetVector = termFrequencyVector('');
    expect(snippetVector).toEqual([0.0]);
    expect(cosineSimilarity(termFrequencyVector(QUERY), snippetVector)).toBe(0);
  });
});

describe('roundScore', () => {
  it('rounds to 4 decimal places', () => {
    expect(roundScore(0.58000000000000007)).toBe(0.58);
    expect(roundScore(0.123456)).toBe(0.1235);
  });
});

describe('priors', () => {
  it('applies only the highest domain boost', () => {
    expect(domainPrior({ link: 'https://stats.gov.example.org/x', displayLink: 'stats.gov.example.org' })).toBe(0.08);
  });

  it('boosts .edu and .org hosts', () => {
    expect(domainPrior({ link: 'https://bees.example.edu', displayLink: 'bees.example.edu' })).toBe(0.06);
    expect(domainPrior({ link: 'https://bees.example.org', displayLink: 'bees.example.org' })).toBe(0.02);
    expect(domainPrior({ link: 'https://bees.example.com', displayLink: 'bees.example.com' })).toBe(0);
  });

  it('falls back to the link when there is no display host', () => {
    expect(domainPrior({ link: 'https://archive.example.gov/a', displayLink: '' })).toBe(0.08);
  });

  it('boosts PDF links and Wikipedia hosts additively', () => {
    expect(documentTypeBoost('https://example.com/report.PDF')).toBe(0.02);
    expect(documentTypeBoost('https://en.wikipedia.org/wiki/Beekeeping')).toBe(0.01);
    expect(documentTypeBoost('https://upload.wikipedia.org/paper.pdf')).toBeCloseTo(0.03, 10);
    expect(documentTypeBoost('https://notwikipedia.org.example.com/page')).toBe(0);
  });
});

describe('dedupeByLink', () => {
  it('keeps the first hit per link and drops hits without a link', () => {
    const first = makeHit({ link: 'https://a.example.com', title: 'First' });
    const duplicate = makeHit({ link: 'https://a.example.com', title: 'Second' });
    const noLink = { ...makeHit({ link: 'https://b.example.com' }), link: '' };

    expect(dedupeByLink([first, duplicate, noLink])).toEqual([first]);
  });
});

describe('Reranker', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns an empty list for no hits', async () => {
    const reranker = new Reranker(new TableEmbedder({}));
    expect(await reranker.rerank(QUERY, [])).toEqual([]);
  });

  it('uses 0.3 as the similarity threshold', () => {
    expect(SIMILARITY_THRESHOLD).toBe(0.3);
  });

  it('keeps a hit at exactly 0.30 and drops one at 0.29', async () => {
    const embedder = new TableEmbedder({ [QUERY]: QUERY_VECTOR, kept: SIM_030, dropped: SIM_029 });
    const reranker = new Reranker(embedder);

    const result = await reranker.rerank(QUERY, [
      makeHit({ link: 'https://dropped.example.com', snippet: 'dropped' }),
      makeHit({ link: 'https://kept.example.com', snippet: 'kept' }),
    ]);

    expect(result.map((h) => h.link)).toEqual(['https://kept.example.com']);
    expect(result[0]?.similarityScore).toBe(0.3);
  });

  it('adds only the .gov boost to a link matching both .gov and .org', async () => {
    const embedder = new TableEmbedder({ [QUERY]: QUERY_VECTOR, both: SIM_050 });
    const reranker = new Reranker(embedder);

    const [hit] = await reranker.rerank(QUERY, [
      makeHit({ link: 'https://stats.gov.example.org/bees', snippet: 'both' }),
    ]);

    expect(hit?.similarityScore).toBe(0.58);
  });

  it('stacks document-type boosts on the domain prior', async () => {
    const embedder = new TableEmbedder({ [QUERY]: QUERY_VECTOR, pdf: SIM_050 });
    const reranker = new Reranker(embedder);

    const [hit] = await reranker.rerank(QUERY, [
      makeHit({ link: 'https://research.example.edu/hives.pdf', snippet: 'pdf' }),
    ]);

    // 0.5 + 0.06 (.edu) + 0.02 (pdf)
    expect(hit?.similarityScore).toBe(0.58);
  });

  it('collapses duplicate links to the first-seen entry', async () => {
    const embedder = new TableEmbedder({ [QUERY]: QUERY_VECTOR, one: SIM_050, two: SIM_035 });
    const reranker = new Reranker(embedder);

    const result = await reranker.rerank(QUERY, [
      makeHit({ link: 'https://dup.example.com', title: 'First seen', snippet: 'one' }),
      makeHit({ link: 'https://dup.example.com', title: 'Second seen', snippet: 'two' }),
    ]);

    expect(result).toHaveLength(1);
    expect(result[0]?.title).toBe('First seen');
    expect(result[0]?.similarityScore).toBe(0.5);
  });

  it('sorts by score descending and keeps input order on ties', async () => {
    const embedder = new TableEmbedder({ [QUERY]: QUERY_VECTOR, high: SIM_050, mid: SIM_035 });
    const reranker = new Reranker(embedder);

    const result = await reranker.rerank(QUERY, [
      makeHit({ link: 'https://tie-a.example.com', snippet: 'mid' }),
      makeHit({ link: 'https://top.example.com', snippet: 'high' }),
      makeHit({ link: 'https://tie-b.example.com', snippet: 'mid' }),
    ]);

    expect(result.map((h) => [h.link, h.similarityScore])).toEqual([
      ['https://top.example.com', 0.5],
      ['https://tie-a.example.com', 0.35],
      ['https://tie-b.example.com', 0.35],
    ]);
  });

  it('keeps hits whose snippet cannot be embedded with score 0', async () => {
    const embedder = new TableEmbedder({ [QUERY]: QUERY_VECTOR, good: SIM_035 });
    const reranker = new Reranker(embedder);

    const result = await reranker.rerank(QUERY, [
      makeHit({ link: 'https://nosnippet.example.gov', snippet: '' }),
      makeHit({ link: 'https://good.example.com', snippet: 'good' }),
    ]);

    expect(result.map((h) => [h.link, h.similarityScore])).toEqual([
      ['https://good.example.com', 0.35],
      ['https://nosnippet.example.gov', 0],
    ]);
  });

  it('passes deduplicated hits through unranked when the query cannot be embedded', async () => {
    const reranker = new Reranker(new TableEmbedder({ low: SIM_020, high: SIM_050 }));
    const hits = [
      makeHit({ link: 'https://low.example.com', snippet: 'low' }),
      makeHit({ link: 'https://high.example.gov', snippet: 'high' }),
      makeHit({ link: 'https://low.example.com', snippet: 'high' }),
    ];

    const result = await reranker.rerank(QUERY, hits);

    expect(result).toEqual([
      { ...hits[0], similarityScore: null },
      { ...hits[1], similarityScore: null },
    ]);
  });

  it('embeds the query once and each surviving snippet once', async () => {
    const embedder = new TableEmbedder({ [QUERY]: QUERY_VECTOR, a: SIM_050, b: SIM_035 });
    const reranker = new Reranker(embedder);

    await reranker.rerank(QUERY, [
      makeHit({ link: 'https://a.example.com', snippet: 'a' }),
      makeHit({ link: 'https://a.example.com', snippet: 'b' }),
      makeHit({ link: 'https://b.example.com', snippet: 'b' }),
    ]);

    expect(embedder.calls).toEqual([QUERY, 'a', 'b']);
  });
});
