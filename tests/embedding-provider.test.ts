import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { LocalEmbeddingProvider, termFrequencyVector } from '../src/providers/embedding-provider';
import {
  GeminiEmbeddingProvider,
  createEmbeddingProvider,
  normalizeEmbedding,
} from '../src/providers/gemini-embedding-provider';
import { ValidationError } from '../src/errors/index';

const SHARED_EMBED = vi.fn();
const MODEL_ARGS = vi.fn();

// Mock the Gemini SDK before importing SUT to avoid TDZ issues
vi.mock('@google/generative-ai', () => {
  return {
    GoogleGenerativeAI: class {
      getGenerativeModel(params: unknown) {
        MODEL_ARGS(params);
        return { embedContent: SHARED_EMBED };
      }
    },
  };
});

describe('termFrequencyVector', () => {
  it('normalizes counts by the most frequent token in sorted token order', () => {
    // bee:1, hive:1, the:2
    expect(termFrequencyVector('The bee, the hive')).toEqual([0.5, 0.5, 1]);
  });

  it('tokenizes non-ASCII words', () => {
    expect(termFrequencyVector('Çatalhöyük arı arı')).toEqual([1, 0.5]);
  });

  it('yields [0] when there are no word tokens', () => {
    expect(termFrequencyVector('')).toEqual([0]);
    expect(termFrequencyVector('!!! ...')).toEqual([0]);
  });

  it('is deterministic for the same text', () => {
    const text = 'Hittite beekeeping archaeology Turkey';
    expect(termFrequencyVector(text)).toEqual(termFrequencyVector(text));
  });
});

describe('LocalEmbeddingProvider', () => {
  it('returns null for whitespace-only text', async () => {
    expect(await new LocalEmbeddingProvider().embed('   \n')).toBeNull();
  });

  it('returns the term-frequency vector', async () => {
    expect(await new LocalEmbeddingProvider().embed('bee bee hive')).toEqual([1, 0.5]);
  });
});

describe('normalizeEmbedding', () => {
  it('accepts an inline vector', () => {
    expect(normalizeEmbedding([0.1, 0.2])).toEqual([0.1, 0.2]);
  });

  it('accepts values nested under embedding', () => {
    expect(normalizeEmbedding({ embedding: { values: [0.3, 0.4] } })).toEqual([0.3, 0.4]);
  });

  it('accepts a bare values object', () => {
    expect(normalizeEmbedding({ values: [0.5] })).toEqual([0.5]);
  });

  it('takes the first vector of a batch response', () => {
    expect(normalizeEmbedding({ embeddings: [{ values: [0.6] }, { values: [0.7] }] })).toEqual([0.6]);
  });

  it('rejects unknown or empty shapes', () => {
    expect(() => normalizeEmbedding({})).toThrow(ValidationError);
    expect(() => normalizeEmbedding({ embedding: { values: [] } })).toThrow(ValidationError);
  });
});

describe('GeminiEmbeddingProvider', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('uses text-embedding-004 by default', () => {
    new GeminiEmbeddingProvider({ apiKey: 'test-key' });
    expect(MODEL_ARGS).toHaveBeenCalledWith({ model: 'text-embedding-004' });
  });

  it('returns the vector from the SDK response', async () => {
    SHARED_EMBED.mockResolvedValueOnce({ embedding: { values: [0.25, 0.75] } });
    const provider = new GeminiEmbeddingProvider({ apiKey: 'test-key' });

    expect(await provider.embed('bees')).toEqual([0.25, 0.75]);
    expect(SHARED_EMBED).toHaveBeenCalledWith('bees');
  });

  it('returns null for empty text without calling the API', async () => {
    const provider = new GeminiEmbeddingProvider({ apiKey: 'test-key' });

    expect(await provider.embed('  ')).toBeNull();
    expect(SHARED_EMBED).not.toHaveBeenCalled();
  });

  it('falls back to the local vector when the API fails', async () => {
    SHARED_EMBED.mockRejectedValueOnce(new Error('quota exceeded'));
    const provider = new GeminiEmbeddingProvider({ apiKey: 'test-key' });

    expect(await provider.embed('bee bee hive')).toEqual([1, 0.5]);
    expect(console.warn).toHaveBeenCalledWith('[evidence]', 'Falling back to local embedding: quota exceeded');
  });

  it('falls back to the local vector on an unrecognized response', async () => {
    SHARED_EMBED.mockResolvedValueOnce({ unexpected: true });
    const provider = new GeminiEmbeddingProvider({ apiKey: 'test-key' });

    expect(await provider.embed('hive')).toEqual([1]);
  });
});

describe('createEmbeddingProvider', () => {
  it('uses Gemini when an API key is configured', () => {
    const provider = createEmbeddingProvider({ apiKey: 'test-key', model: 'text-embedding-004' });
    expect(provider).toBeInstanceOf(GeminiEmbeddingProvider);
    expect(provider.name).toBe('gemini');
  });

  it('uses local embeddings without an API key', () => {
    const provider = createEmbeddingProvider({});
    expect(provider).toBeInstanceOf(LocalEmbeddingProvider);
    expect(provider.name).toBe('local');
  });
});
