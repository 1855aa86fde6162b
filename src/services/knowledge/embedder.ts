import OpenAI from 'openai';
import { DependencyUnavailableError, errorMessage } from '../../utils/errors';

export interface Embedder {
    /** Vector length; fixed for the lifetime of the embedder. */
    dimension(): Promise<number>;
    embed(text: string): Promise<number[]>;
    embedMany(texts: string[]): Promise<number[][]>;
}

export interface OpenAIEmbedderOptions {
    apiKey?: string;
    model: string;
    dimensions?: number;
}

/**
 * Embeddings come from the OpenAI API, so the CPU cost of the model never
 * lands on the event loop serving conversations.
 */
export class OpenAIEmbedder implements Embedder {
    private client: OpenAI | null = null;
    private cachedDimension: number | null = null;

    constructor(private readonly options: OpenAIEmbedderOptions) {
        if (options.dimensions) {
            this.cachedDimension = options.dimensions;
        }
    }

    private getClient(): OpenAI {
        if (!this.options.apiKey) {
            throw new DependencyUnavailableError('OPENAI_API_KEY is not configured');
        }
        if (!this.client) {
            this.client = new OpenAI({ apiKey: this.options.apiKey });
        }
        return this.client;
    }

    async dimension(): Promise<number> {
        if (this.cachedDimension === null) {
            const probe = await this.embed('dimension probe');
            this.cachedDimension = probe.length;
        }
        return this.cachedDimension;
    }

    async embed(text: string): Promise<number[]> {
        const [vector] = await this.embedMany([text]);
        return vector;
    }

    async embedMany(texts: string[]): Promise<number[][]> {
        if (texts.length === 0) return [];

        const client = this.getClient();
        try {
            const response = await client.embeddings.create({
                model: this.options.model,
                input: texts,
                ...(this.options.dimensions ? { dimensions: this.options.dimensions } : {}),
            });
            const ordered = [...response.data].sort((a, b) => a.index - b.index);
            const vectors = ordered.map(item => item.embedding);
            if (vectors.length > 0) {
                this.cachedDimension = vectors[0].length;
            }
            return vectors;
        } catch (error) {
            throw new DependencyUnavailableError(`Embedding request failed: ${errorMessage(error)}`, {
                model: this.options.model,
            });
        }
    }
}
