import type { KyInstance } from 'ky';
import { z } from 'zod';
import { BackendUnavailableError } from '../errors';
import { createHttpClient, requestJson } from '../http';
import type { Embedder, TeiEmbeddingSpec } from './index';
import { assertDimensions, inBatches } from './batch';

const teiResponseSchema = z.array(z.array(z.number().finite()));

/** text-embeddings-inference: `POST /embed {inputs}` returns one vector per input. */
export class TeiEmbedder implements Embedder {
    readonly model: string;
    readonly dimension: number;
    private readonly client: KyInstance;

    constructor(private readonly spec: TeiEmbeddingSpec, fetchImpl?: typeof fetch) {
        this.model = spec.model;
        this.dimension = spec.dimension;
        this.client = createHttpClient({ baseUrl: spec.url, fetch: fetchImpl });
    }

    async embed(text: string, signal?: AbortSignal): Promise<number[]> {
        const [vector] = await this.embedBatch([text], signal);
        return vector;
    }

    embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<number[][]> {
        return inBatches(texts, this.spec.batchSize, async (batch) => {
            const payload = await requestJson(
                this.client,
                'embed',
                { method: 'POST', json: { inputs: batch, truncate: true }, signal },
                'embedding'
            );
            const parsed = teiResponseSchema.safeParse(payload);
            if (!parsed.success || parsed.data.length !== batch.length) {
                throw new BackendUnavailableError(
                    `TEI returned an unexpected payload for a batch of ${batch.length}`,
                    'embedding'
                );
            }
            assertDimensions(parsed.data, this.dimension, this.model);
            return parsed.data;
        });
    }
}
