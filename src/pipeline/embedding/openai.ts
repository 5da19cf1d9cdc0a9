import type OpenAI from 'openai';
import { createOpenAIClient, mapOpenAIError } from '../openai_client';
import { debug } from '../log';
import type { Embedder, OpenAIEmbeddingSpec } from './index';
import { assertDimensions, inBatches } from './batch';

export class OpenAIEmbedder implements Embedder {
    readonly model: string;
    readonly dimension: number;
    private readonly client: OpenAI;

    constructor(private readonly spec: OpenAIEmbeddingSpec, client?: OpenAI) {
        this.model = spec.model;
        this.dimension = spec.dimension;
        this.client = client ?? createOpenAIClient(spec.apiKey);
    }

    async embed(text: string, signal?: AbortSignal): Promise<number[]> {
        const [vector] = await this.embedBatch([text], signal);
        return vector;
    }

    embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<number[][]> {
        return inBatches(texts, this.spec.batchSize, async (batch) => {
            const response = await this.client.embeddings
                .create(
                    {
                        model: this.model,
                        input: batch,
                        encoding_format: 'float',
                        // only the v3 family accepts a requested dimension
                        ...(this.model.startsWith('text-embedding-3') ? { dimensions: this.dimension } : {}),
                    },
                    { signal }
                )
                .catch((e: unknown) => {
                    throw mapOpenAIError(e, 'embedding');
                });
            const vectors = [...response.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
            assertDimensions(vectors, this.dimension, this.model);
            debug('embed.batch', { model: this.model, size: batch.length, tokens: response.usage?.total_tokens });
            return vectors;
        });
    }
}
