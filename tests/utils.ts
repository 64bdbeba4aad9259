import type { EmbeddingProvider } from '../src/providers/embedding-provider';
import type { SearchHit } from '../src/schemas/search-schemas';

/*
 * Vectors whose cosine similarity against QUERY_VECTOR is exact in floating
 * point: the first component over an integer norm.
 */
export const QUERY_VECTOR = [1];
export const SIM_050 = [5, 7, 5, 1]; // 5 / 10
export const SIM_035 = [35, 93, 11, 2, 1]; // 35 / 100
export const SIM_030 = [3, 9, 3, 1]; // 3 / 10
export const SIM_029 = [29, 95, 11, 3, 2]; // 29 / 100
export const SIM_020 = [2, 9, 3, 2, 1, 1]; // 2 / 10

/**
 * Embedding provider backed by a lookup table. Unknown or blank text embeds
 * to null.
 */
export class TableEmbedder implements EmbeddingProvider {
  readonly name = 'table';
  readonly calls: string[] = [];

  constructor(private readonly table: Record<string, number[]>) {}

  embed(text: string): Promise<number[] | null> {
    this.calls.push(text);
    if (!text.trim()) return Promise.resolve(null);
    return Promise.resolve(this.table[text] ?? null);
  }
}

export function makeHit(overrides: Partial<SearchHit> & Pick<SearchHit, 'link'>): SearchHit {
  return {
    title: overrides.title ?? `Title for ${overrides.link}`,
    link: overrides.link,
    snippet: overrides.snippet ?? '',
    displayLink: overrides.displayLink ?? new URL(overrides.link).hostname,
    source: overrides.source ?? 'google_custom_search',
  };
}
