import { GoogleGenerativeAI, type GenerativeModel } from '@google/generative-ai';
import { LocalEmbeddingProvider, type EmbeddingProvider } from './embedding-provider';
import { EMBEDDING_RESPONSE_SCHEMA } from '../schemas/embedding-responses';
import { ValidationError, handleUnknownError } from '../errors/index';
import { debug, warn } from '../output/logger';

export interface GeminiEmbeddingConfig {
    apiKey: string;
    model?: string | undefined;
}

export const GeminiEmbeddingDefaultConfig = {
    model: 'text-embedding-004',
};

/**
 * Accepts any of the embedding response shapes the SDK and REST API return
 * and yields the vector. Throws ValidationError for anything else.
 */
export function normalizeEmbedding(raw: unknown): number[] {
    const result = EMBEDDING_RESPONSE_SCHEMA.safeParse(raw);
    if (!result.success) {
        throw new ValidationError(`Unrecognized embedding response: ${result.error.message}`);
    }
    return result.data;
}

/**
 * Gemini embeddings with the local term-frequency vector as fallback.
 */
export class GeminiEmbeddingProvider implements EmbeddingProvider {
    readonly name = 'gemini';
    private model: GenerativeModel;
    private fallback: EmbeddingProvider;

    constructor(config: GeminiEmbeddingConfig, fallback: EmbeddingProvider = new LocalEmbeddingProvider()) {
        const client = new GoogleGenerativeAI(config.apiKey);
        this.model = client.getGenerativeModel({
            model: config.model ?? GeminiEmbeddingDefaultConfig.model,
        });
        this.fallback = fallback;
    }

    async embed(text: string): Promise<number[] | null> {
        if (!text.trim()) return null;

        try {
            const response: unknown = await this.model.embedContent(text);
            return normalizeEmbedding(response);
        } catch (e: unknown) {
            const err = handleUnknownError(e, 'Gemini embedding');
            warn(`Falling back to local embedding: ${err.message}`);
            return this.fallback.embed(text);
        }
    }
}

export interface EmbeddingProviderConfig {
    apiKey?: string | undefined;
    model?: string | undefined;
}

export function createEmbeddingProvider(config: EmbeddingProviderConfig): EmbeddingProvider {
    if (config.apiKey) {
        debug('Gemini client initialized for embeddings');
        return new GeminiEmbeddingProvider({ apiKey: config.apiKey, model: config.model });
    }
    debug('Using local term-frequency embeddings');
    return new LocalEmbeddingProvider();
}
