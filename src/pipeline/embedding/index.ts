import { OpenAIEmbedder } from './openai';
import { TeiEmbedder } from './tei';

/**
 * Converts text into vectors of a fixed dimension. Batching is only a transport
 * optimization: embedBatch(texts)[i] equals embed(texts[i]).
 */
export interface Embedder {
  readonly model: string;
  readonly dimension: number;
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
  embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<number[][]>;
}

export interface OpenAIEmbeddingSpec {
  kind: 'openai';
  apiKey: string;
  model: string;
  dimension: number;
  batchSize: number;
}

export interface TeiEmbeddingSpec {
  kind: 'tei';
  url: string;
  model: string;
  dimension: number;
  batchSize: number;
}

export type EmbeddingBackendSpec = OpenAIEmbeddingSpec | TeiEmbeddingSpec;

export function createEmbedder(spec: EmbeddingBackendSpec): Embedder {
  switch (spec.kind) {
    case 'openai':
      return new OpenAIEmbedder(spec);
    case 'tei':
      return new TeiEmbedder(spec);
  }
}

export { assertDimensions, inBatches } from './batch';
